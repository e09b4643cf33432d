import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../src/core/errors.js";
import { parseDotenv, parseVarFile, readVarFile, varFileFormat } from "../../src/core/varfile.js";

describe("varFileFormat", () => {
  it("picks the format by extension", () => {
    expect(varFileFormat("/x/vars.yml")).toBe("yaml");
    expect(varFileFormat("/x/vars.YAML")).toBe("yaml");
    expect(varFileFormat("/x/vars.toml")).toBe("toml");
    expect(varFileFormat("/x/vars.env")).toBe("dotenv");
    expect(varFileFormat("/x/.env")).toBe("dotenv");
  });
});

describe("parseDotenv", () => {
  it("reads KEY=value lines, skipping blanks and comments", () => {
    expect(parseDotenv("# comment\n\nA=1\n  B = two words\nC=x=y\r\nD=\n", "f")).toEqual({
      A: "1",
      B: " two words",
      C: "x=y",
      D: "",
    });
  });

  it("rejects a line without an equals sign", () => {
    expect(() => parseDotenv("A=1\nBROKEN\n", "vars.env")).toThrow(
      new ConfigurationError("vars.env:2: line has no equals sign (=)"),
    );
  });

  it("rejects an empty key", () => {
    expect(() => parseDotenv("=value\n", "vars.env")).toThrow("vars.env:1: line has an empty key");
  });
});

describe("parseVarFile", () => {
  it("reads a flat YAML mapping", () => {
    expect(parseVarFile("A: 1\nB: text\nC: true\n", "yaml", "f.yml")).toEqual({ A: "1", B: "text", C: "true" });
  });

  it("reads a flat TOML table", () => {
    expect(parseVarFile('A = "x"\nB = 2\n', "toml", "f.toml")).toEqual({ A: "x", B: "2" });
  });

  it("treats an empty YAML file as no variables", () => {
    expect(parseVarFile("", "yaml", "f.yml")).toEqual({});
  });

  it("rejects nested values", () => {
    expect(() => parseVarFile("A:\n  B: 1\n", "yaml", "f.yml")).toThrow('f.yml: value of "A" is not a string');
  });

  it("rejects a top-level list", () => {
    expect(() => parseVarFile("- a\n- b\n", "yaml", "f.yml")).toThrow(
      "f.yml does not contain a single mapping of strings",
    );
  });

  it("rejects invalid TOML", () => {
    expect(() => parseVarFile("A = \n", "toml", "f.toml")).toThrow(ConfigurationError);
  });
});

describe("readVarFile", () => {
  it("returns nothing for no file", async () => {
    expect(await readVarFile(null)).toEqual({});
  });

  it("reports an unreadable file", async () => {
    await expect(readVarFile("/nonexistent/dockhand/vars.env")).rejects.toBeInstanceOf(ConfigurationError);
  });
});
