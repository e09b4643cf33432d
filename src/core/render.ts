import { readFile, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { ConfigurationError, describeError } from "./errors.js";
import type { ApplicationSpec } from "./manifest.js";
import type { AppPaths } from "./paths.js";
import { DATA_DIR_NAME } from "./paths.js";
import { readVarFile } from "./varfile.js";

export const BUILTIN_NAMES = ["DATA_DIR", "CACHE_DIR", "REPO_DIR"] as const;
export type BuiltinName = (typeof BUILTIN_NAMES)[number];

export const INVALID_DEFAULT = "HM_INVALID_DEFAULT_VALUE";

/**
 * `{{ HM_NAME }}` or `{{ HM_NAME:default }}`, whitespace optional inside the
 * braces. Group 1 is the name, group 2 the raw default (if any).
 */
const TOKEN_RE = /\{\{\s*HM_([A-Za-z0-9_]+)(?::(.*?))?\s*\}\}/g;

export interface Fragment {
  source: string; // path as declared, relative to the checkout
  content: string;
}

export interface ResolvedVariables {
  environment: Record<string, string>; // file values overlaid by inline values
  replacements: Record<string, string>; // same, before built-ins
}

export interface RenderedArtifact {
  fragments: Fragment[]; // rendered, in declaration order
  content: string; // all rendered fragments concatenated
  replacements: Record<string, string>; // every value a token could resolve to
  environment: Record<string, string>; // what the executor process receives
}

/**
 * Interpret a token's default literal. Quoted literals yield their inner
 * text, bare ones their trimmed text; anything that still looks like
 * template syntax is rejected with the HM_INVALID_DEFAULT_VALUE marker.
 */
export function parseDefault(raw: string): string {
  const text = raw.trim();
  const quote = text[0];
  if (quote === '"' || quote === "'") {
    if (text.length < 2 || text[text.length - 1] !== quote) return INVALID_DEFAULT;
    const inner = text.slice(1, -1);
    if (quote === '"') {
      try {
        const decoded: unknown = JSON.parse(text);
        return typeof decoded === "string" ? decoded : INVALID_DEFAULT;
      } catch {
        return inner.includes('"') ? INVALID_DEFAULT : inner;
      }
    }
    return inner.includes("'") ? INVALID_DEFAULT : inner;
  }
  if (/[{}"']/.test(text)) return INVALID_DEFAULT;
  return text;
}

/**
 * Substitute replacement tokens in one piece of text, in a single pass.
 * - Resolved name → its value (any default is ignored).
 * - Unresolved name with a default → the default literal.
 * - Unresolved name without a default → the token is left byte-for-byte.
 */
export function renderTemplate(template: string, replacements: Record<string, string>): string {
  return template.replace(TOKEN_RE, (token: string, name: string, rawDefault: string | undefined) => {
    if (Object.prototype.hasOwnProperty.call(replacements, name)) {
      return replacements[name];
    }
    if (rawDefault !== undefined) {
      return parseDefault(rawDefault);
    }
    return token;
  });
}

/** Strip trailing path separators, keeping a bare root intact. */
export function stripTrailingSeparators(p: string): string {
  const stripped = p.replace(/[\\/]+$/, "");
  return stripped === "" ? p.slice(0, 1) : stripped;
}

/**
 * Values of the built-in replacements for an application. With a host data
 * root set (dockhand itself running in a container), DATA_DIR points at the
 * host-side path instead.
 */
export function builtinReplacements(
  name: string,
  paths: AppPaths,
  hostDataRoot: string | null = null,
): Record<BuiltinName, string> {
  const data = hostDataRoot ? join(hostDataRoot, DATA_DIR_NAME, name) : paths.data;
  return {
    DATA_DIR: stripTrailingSeparators(data),
    CACHE_DIR: stripTrailingSeparators(paths.cache),
    REPO_DIR: stripTrailingSeparators(paths.repo),
  };
}

export interface RenderInput {
  name: string;
  fragments: Fragment[];
  variables: ResolvedVariables;
  paths: AppPaths;
  hostDataRoot?: string | null;
}

/**
 * Render every fragment of an application. Pure: identical input gives
 * byte-identical output.
 *
 * Replacement precedence is inline > file > built-in. The resolved built-in
 * values are the single source for the DATA_DIR/CACHE_DIR/REPO_DIR
 * environment variables too, so a token and the variable of the same name
 * never disagree. The executor environment is the replacements, overlaid by
 * the environment, overlaid by those built-ins.
 */
export function renderArtifact(input: RenderInput): RenderedArtifact {
  const builtins = builtinReplacements(input.name, input.paths, input.hostDataRoot ?? null);
  const replacements: Record<string, string> = { ...builtins, ...input.variables.replacements };

  const canonical: Record<string, string> = {};
  for (const key of BUILTIN_NAMES) {
    canonical[key] = replacements[key];
  }

  const fragments = input.fragments.map((f) => ({
    source: f.source,
    content: renderTemplate(f.content, replacements),
  }));

  return {
    fragments,
    content: fragments.map((f) => f.content).join(""),
    replacements,
    environment: { ...input.variables.replacements, ...input.variables.environment, ...canonical },
  };
}

/**
 * Merge file-provided and inline variables for an application. Inline
 * values win key-wise.
 */
export async function resolveVariables(app: ApplicationSpec): Promise<ResolvedVariables> {
  try {
    const envFile = await readVarFile(app.environmentFile);
    const replFile = await readVarFile(app.replacementsFile);
    return {
      environment: { ...envFile, ...app.environment },
      replacements: { ...replFile, ...app.replacements },
    };
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(err.message, app.name, { cause: err });
    }
    throw err;
  }
}

/**
 * Read the declared compose fragments from the checkout, in order.
 */
export async function loadFragments(
  appName: string,
  repoDir: string,
  composeConfig: string[],
): Promise<Fragment[]> {
  const fragments: Fragment[] = [];
  for (const source of composeConfig) {
    const filePath = resolve(repoDir, source);
    try {
      fragments.push({ source, content: await readFile(filePath, "utf8") });
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new ConfigurationError(`compose file not found: ${filePath}`, appName);
      }
      throw new ConfigurationError(`cannot read ${filePath}: ${describeError(err)}`, appName, {
        cause: err,
      });
    }
  }
  return fragments;
}

/**
 * Where the rendered copy of a fragment lives: beside its source, so that
 * relative paths inside it (build contexts, env_file) resolve the same way.
 */
export function renderedPath(repoDir: string, appName: string, source: string): string {
  const sourcePath = resolve(repoDir, source);
  return join(dirname(sourcePath), `.dockhand-${appName}.${basename(sourcePath)}`);
}

/**
 * Write the rendered fragments for the executor. Called only once every
 * fragment rendered, so the executor never sees a partial set. Returns the
 * written paths in declaration order.
 */
export async function writeRendered(
  repoDir: string,
  appName: string,
  artifact: RenderedArtifact,
): Promise<string[]> {
  const written: string[] = [];
  for (const fragment of artifact.fragments) {
    const target = renderedPath(repoDir, appName, fragment.source);
    await writeFile(target, fragment.content, "utf8");
    written.push(target);
  }
  return written;
}
