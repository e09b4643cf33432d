import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { relativeTime, runList } from "../../src/commands/list.js";
import { createWorkStructure, workPaths } from "../../src/core/paths.js";
import { writeState } from "../../src/core/state.js";
import { cleanup, createTempDir } from "./helpers.js";

let root: string;
let written: string[];

beforeEach(async () => {
  root = await createTempDir();
  written = [];
  process.stdout.write = (chunk: string | Uint8Array): boolean => {
    written.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    return true;
  };
});

afterEach(async () => {
  await cleanup(root);
});

describe("relativeTime", () => {
  const now = new Date("2024-01-10T12:00:00.000Z");

  it.each([
    ["2024-01-10T11:59:30.000Z", "just now"],
    ["2024-01-10T11:45:00.000Z", "15m ago"],
    ["2024-01-10T09:00:00.000Z", "3h ago"],
    ["2024-01-08T12:00:00.000Z", "2d ago"],
  ])("%s → %s", (iso, expected) => {
    expect(relativeTime(iso, now)).toBe(expected);
  });
});

describe("runList", () => {
  it("prints one row per known app", async () => {
    const paths = workPaths(root);
    await createWorkStructure(paths);
    await writeState(paths.stateFile, {
      apps: {
        web: {
          fingerprint: "f",
          enabled: true,
          revision: "abc1234def",
          deployed_at: "2024-01-10T09:00:00.000Z",
          updated_at: "2024-01-10T09:00:00.000Z",
          paths: { data: path.join(root, "data", "web"), cache: "", repo: "" },
        },
        db: {
          fingerprint: "g",
          enabled: false,
          revision: null,
          deployed_at: "2024-01-08T12:00:00.000Z",
          updated_at: "2024-01-09T12:00:00.000Z",
          paths: { data: "", cache: "", repo: "" },
        },
      },
    });

    await runList({ cwd: root, now: () => new Date("2024-01-10T12:00:00.000Z") });

    const lines = written.join("").split("\n");
    expect(lines[0]).toBe("App         Enabled   Revision  Last Deploy");
    expect(lines[2]).toBe("db          no        -         2d ago");
    expect(lines[3]).toBe("web         yes       abc1234   3h ago");
  });

  it("says so when nothing was deployed", async () => {
    await createWorkStructure(workPaths(root));
    await runList({ cwd: root });
    expect(written.join("")).toBe("No apps deployed.\n");
  });

  it("refuses a directory that is not a working root", async () => {
    await expect(runList({ cwd: root })).rejects.toThrow(`${root} is not a dockhand working directory.`);
  });
});
