import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { acquireLock } from "../../src/core/lock.js";

const temps: string[] = [];

async function mktemp(): Promise<string> {
  const d = await fs.mkdtemp(path.join(os.tmpdir(), "dockhand-lock-test-"));
  temps.push(d);
  return d;
}

afterEach(async () => {
  for (const d of temps.splice(0)) {
    await fs.rm(d, { recursive: true, force: true });
  }
});

describe("acquireLock", () => {
  it("creates a lock file and returns a release function", async () => {
    const lockPath = path.join(await mktemp(), "dockhand.lock");

    const release = await acquireLock(lockPath);

    const stat = await fs.stat(lockPath);
    expect(stat.isFile()).toBe(true);
    expect(await fs.readFile(lockPath, "utf8")).toBe(String(process.pid));

    await release();
    await expect(fs.access(lockPath)).rejects.toThrow();
  });

  it("throws when lock is already held", async () => {
    const lockPath = path.join(await mktemp(), "dockhand.lock");

    const release = await acquireLock(lockPath);
    try {
      await expect(acquireLock(lockPath)).rejects.toThrow(
        `Another dockhand run is in progress. If this is stale, remove ${lockPath}.`,
      );
    } finally {
      await release();
    }
  });

  it("allows re-acquisition after release", async () => {
    const lockPath = path.join(await mktemp(), "dockhand.lock");

    const release1 = await acquireLock(lockPath);
    await release1();

    const release2 = await acquireLock(lockPath);
    await release2();
  });

  it("release is idempotent", async () => {
    const lockPath = path.join(await mktemp(), "dockhand.lock");
    const release = await acquireLock(lockPath);
    await release();
    await expect(release()).resolves.toBeUndefined();
  });
});
