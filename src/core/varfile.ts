import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseToml } from "smol-toml";
import { parse as parseYaml } from "yaml";
import { ConfigurationError, describeError } from "./errors.js";

export type VarFileFormat = "dotenv" | "yaml" | "toml";

/**
 * Pick the parser for an environment or replacements file by extension.
 * Anything that is not YAML or TOML is read as KEY=value lines.
 */
export function varFileFormat(filePath: string): VarFileFormat {
  switch (extname(filePath).toLowerCase()) {
    case ".yml":
    case ".yaml":
      return "yaml";
    case ".toml":
      return "toml";
    default:
      return "dotenv";
  }
}

/**
 * Parse KEY=value lines. Blank lines and `#` comments are skipped. The value
 * is everything after the first `=`, unmodified.
 */
export function parseDotenv(contents: string, source: string): Record<string, string> {
  const vars: Record<string, string> = {};
  const lines = contents.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith("\r") ? lines[i].slice(0, -1) : lines[i];
    if (line.trim() === "" || line.trimStart().startsWith("#")) continue;
    const eq = line.indexOf("=");
    if (eq === -1) {
      throw new ConfigurationError(`${source}:${i + 1}: line has no equals sign (=)`);
    }
    const key = line.slice(0, eq).trim();
    if (key === "") {
      throw new ConfigurationError(`${source}:${i + 1}: line has an empty key`);
    }
    vars[key] = line.slice(eq + 1);
  }
  return vars;
}

/**
 * Flatten a parsed YAML/TOML document into a string mapping. Only a single
 * level of string keys with scalar values is accepted.
 */
export function flatMapping(doc: unknown, source: string): Record<string, string> {
  if (doc === null || doc === undefined) return {};
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigurationError(`${source} does not contain a single mapping of strings`);
  }
  const vars: Record<string, string> = {};
  for (const [key, value] of Object.entries(doc)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      vars[key] = String(value);
    } else {
      throw new ConfigurationError(`${source}: value of "${key}" is not a string`);
    }
  }
  return vars;
}

export function parseVarFile(contents: string, format: VarFileFormat, source: string): Record<string, string> {
  switch (format) {
    case "dotenv":
      return parseDotenv(contents, source);
    case "yaml":
    case "toml": {
      let doc: unknown;
      try {
        doc = format === "yaml" ? parseYaml(contents) : parseToml(contents);
      } catch (err: unknown) {
        throw new ConfigurationError(`${source} is not valid ${format.toUpperCase()}: ${describeError(err)}`);
      }
      return flatMapping(doc, source);
    }
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported variable file format: ${exhaustive}`);
    }
  }
}

/**
 * Read an environment or replacements file. A null path yields an empty
 * mapping; an unreadable file is a ConfigurationError.
 */
export async function readVarFile(filePath: string | null): Promise<Record<string, string>> {
  if (filePath === null) return {};
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (err: unknown) {
    throw new ConfigurationError(`cannot read ${filePath}: ${describeError(err)}`, null, { cause: err });
  }
  return parseVarFile(contents, varFileFormat(filePath), filePath);
}
