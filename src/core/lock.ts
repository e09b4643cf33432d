import { constants } from "node:fs";
import { open, unlink } from "node:fs/promises";

/**
 * Acquire an advisory lock on the working root using O_EXCL (atomic create).
 * Two overlapping timer invocations must not reconcile the same root.
 * If the lock is already held, throws a user-facing error.
 * Returns a release function that removes the lock file.
 *
 * Usage:
 *   const release = await acquireLock(paths.lockFile);
 *   try { ... } finally { await release(); }
 */
export async function acquireLock(lockPath: string): Promise<() => Promise<void>> {
  let fd: Awaited<ReturnType<typeof open>>;
  try {
    fd = await open(lockPath, constants.O_WRONLY | constants.O_CREAT | constants.O_EXCL, 0o600);
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "EEXIST") {
      throw new Error(
        `Another dockhand run is in progress. If this is stale, remove ${lockPath}.`,
      );
    }
    throw err;
  }

  // PID for debugging
  try {
    await fd.writeFile(String(process.pid));
  } finally {
    await fd.close();
  }

  return async () => {
    try {
      await unlink(lockPath);
    } catch (err: unknown) {
      // Already removed
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    }
  };
}
