import { resolve } from "node:path";
import type { StackExecutor } from "../core/compose.js";
import { ComposeExecutor } from "../core/compose.js";
import { acquireLock } from "../core/lock.js";
import { loadManifest } from "../core/manifest.js";
import * as out from "../core/output.js";
import { createWorkStructure, workPaths } from "../core/paths.js";
import type { RunResult } from "../core/reconcile.js";
import { reconcile } from "../core/reconcile.js";

export const DEFAULT_MANIFEST = "dockhand.yml";

export interface RunOptions {
  config?: string; // manifest path, default ./dockhand.yml
  workingDir?: string; // working root, default cwd
  cwd?: string; // override cwd for testing
  force?: boolean;
  hostDataRoot?: string | null;
  executor?: StackExecutor;
  wait?: (ms: number) => Promise<unknown>;
}

/**
 * `dockhand run`: reconcile every app of the manifest once.
 * Flow:
 * 1. Load and validate the manifest (an invalid one aborts before anything runs)
 * 2. Lock the working root
 * 3. Reconcile
 * 4. Report failed apps
 *
 * Returns the run result, or null when the manifest declares no apps.
 */
export async function runReconcile(options: RunOptions = {}): Promise<RunResult | null> {
  const cwd = options.cwd ?? process.cwd();
  const manifest = await loadManifest(resolve(cwd, options.config ?? DEFAULT_MANIFEST));
  if (manifest.apps.length === 0) {
    out.info("No apps specified, nothing to do.");
    return null;
  }

  const paths = workPaths(resolve(cwd, options.workingDir ?? "."));
  await createWorkStructure(paths);

  const release = await acquireLock(paths.lockFile);
  let result: RunResult;
  try {
    result = await reconcile({
      paths,
      manifest,
      executor: options.executor ?? new ComposeExecutor(),
      force: options.force ?? false,
      hostDataRoot: options.hostDataRoot ?? null,
      wait: options.wait,
    });
  } finally {
    await release();
  }

  const failed = result.apps.filter((a) => !a.ok);
  for (const app of failed) {
    out.error(`${app.name} failed (${app.error?.kind ?? "unknown"}): ${app.error?.message ?? ""}`);
  }
  if (result.failures.length > 0) {
    out.error(`${result.failures.length} end-of-run step(s) failed.`);
  }
  if (result.ok) {
    out.info(`Reconciled ${result.apps.length} app(s).`);
  }
  return result;
}
