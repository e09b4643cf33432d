import { resolve } from "node:path";
import { isWorkRoot, workPaths } from "../core/paths.js";
import { readState } from "../core/state.js";

export interface ListOptions {
  cwd?: string;
  workingDir?: string;
  now?: () => Date;
}

/**
 * Relative time string from an ISO 8601 timestamp.
 */
export function relativeTime(iso: string, now: Date = new Date()): string {
  const ms = now.getTime() - new Date(iso).getTime();
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return "just now";
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;
  const days = Math.floor(hours / 24);
  return `${days}d ago`;
}

/**
 * `dockhand list`: applications known to the persisted state, with the
 * revision and time of their last deploy.
 */
export async function runList(options: ListOptions = {}): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const root = resolve(cwd, options.workingDir ?? ".");
  if (!(await isWorkRoot(root))) {
    throw new Error(`${root} is not a dockhand working directory.`);
  }
  const state = await readState(workPaths(root).stateFile);
  const now = options.now?.() ?? new Date();

  const names = Object.keys(state.apps).sort();
  if (names.length === 0) {
    process.stdout.write("No apps deployed.\n");
    return;
  }

  const appW = Math.max(12, ...names.map((n) => n.length + 2));
  const enabledW = 10;
  const revisionW = 10;

  const header = "App".padEnd(appW) + "Enabled".padEnd(enabledW) + "Revision".padEnd(revisionW) + "Last Deploy";
  const divider =
    "─".repeat(appW - 2) +
    "  " +
    "─".repeat(enabledW - 2) +
    "  " +
    "─".repeat(revisionW - 2) +
    "  " +
    "─".repeat(11);

  process.stdout.write(`${header}\n`);
  process.stdout.write(`${divider}\n`);

  for (const name of names) {
    const app = state.apps[name];
    const line =
      name.padEnd(appW) +
      (app.enabled ? "yes" : "no").padEnd(enabledW) +
      (app.revision ? app.revision.slice(0, 7) : "-").padEnd(revisionW) +
      relativeTime(app.deployed_at, now);
    process.stdout.write(`${line}\n`);
  }
}
