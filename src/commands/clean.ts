import * as fs from "node:fs/promises";
import { join, resolve } from "node:path";
import * as readline from "node:readline";
import type { ArchiveEntry } from "../core/directories.js";
import { deleteArchive, listArchives } from "../core/directories.js";
import { acquireLock } from "../core/lock.js";
import { isWorkRoot, workPaths } from "../core/paths.js";
import { relativeTime } from "./list.js";

export interface CleanOptions {
  cwd?: string;
  workingDir?: string;
  /** Skip interactive prompts (for testing). If set, selects every archive. */
  autoConfirm?: boolean;
}

/**
 * Total size of the files under a directory, human-readable.
 */
export async function archiveSize(dir: string): Promise<string> {
  let bytes = 0;
  const walk = async (d: string): Promise<void> => {
    for (const entry of await fs.readdir(d, { withFileTypes: true })) {
      const p = join(d, entry.name);
      if (entry.isDirectory()) {
        await walk(p);
      } else if (entry.isFile()) {
        bytes += (await fs.stat(p)).size;
      }
    }
  };
  try {
    await walk(dir);
  } catch {
    return "?";
  }
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Prompt for input via readline.
 */
async function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * `dockhand clean`: interactive review and deletion of archived data
 * directories. Archives are never deleted any other way.
 */
export async function runClean(options: CleanOptions = {}): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const root = resolve(cwd, options.workingDir ?? ".");
  if (!(await isWorkRoot(root))) {
    throw new Error(`${root} is not a dockhand working directory.`);
  }
  const paths = workPaths(root);

  const release = await acquireLock(paths.lockFile);
  try {
    const archives = await listArchives(paths);

    if (archives.length === 0) {
      process.stdout.write("No archived data to clean.\n");
      return;
    }

    process.stdout.write("Archived data:\n\n");
    for (let i = 0; i < archives.length; i++) {
      const a = archives[i];
      const age = relativeTime(a.archivedAt);
      const size = await archiveSize(a.path);
      process.stdout.write(`  [${i + 1}] ${a.name}  (${age}, ${size})\n`);
    }
    process.stdout.write("\n");

    let selected: ArchiveEntry[];

    if (options.autoConfirm) {
      selected = archives;
    } else {
      const answer = await prompt("Select archives to delete (comma-separated numbers, 'all', or 'none'): ");

      if (answer === "none" || answer === "") {
        process.stdout.write("Aborted.\n");
        return;
      }

      if (answer === "all") {
        selected = archives;
      } else {
        const indices = answer
          .split(",")
          .map((s) => parseInt(s.trim(), 10))
          .filter((n) => !isNaN(n) && n >= 1 && n <= archives.length)
          .map((n) => n - 1);

        if (indices.length === 0) {
          process.stdout.write("No valid selection. Aborted.\n");
          return;
        }

        selected = indices.map((i) => archives[i]);
      }

      const confirmAnswer = await prompt(
        `Delete ${selected.length} archive${selected.length === 1 ? "" : "s"}? This cannot be undone. [y/N] `,
      );

      if (confirmAnswer.toLowerCase() !== "y" && confirmAnswer.toLowerCase() !== "yes") {
        process.stdout.write("Aborted.\n");
        return;
      }
    }

    for (const a of selected) {
      await deleteArchive(paths, a.name);
    }

    process.stdout.write(`Deleted ${selected.length} archive${selected.length === 1 ? "" : "s"}.\n`);
  } finally {
    await release();
  }
}
