import { lstat, mkdir, readdir, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { describeError, DirectoryError } from "./errors.js";
import type { ApplicationSpec } from "./manifest.js";
import * as out from "./output.js";
import type { AppPaths, WorkPaths } from "./paths.js";
import { isDir, repoKey } from "./paths.js";
import type { State } from "./state.js";
import { appState } from "./state.js";

export interface ArchivedData {
  app: string;
  from: string;
  to: string;
}

export interface DirectoryReport {
  archived: ArchivedData[];
  deletedCaches: string[]; // app names
  removedCheckouts: string[]; // repos/ keys
  forgotten: string[]; // app names dropped from state
  failures: DirectoryError[];
}

export interface ArchiveEntry {
  name: string; // directory name under archives/
  path: string;
  app: string;
  archivedAt: string; // ISO 8601, parsed from the name
}

const ARCHIVE_NAME_RE = /^(.+)-(\d{4})-(\d{2})-(\d{2})_(\d{2})-(\d{2})-(\d{2})(?:-\d+)?$/;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * `YYYY-MM-DD_HH-MM-SS` in local time.
 */
export function archiveTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await lstat(p);
    return true;
  } catch {
    return false;
  }
}

async function listDirNames(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => e.name);
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }
}

/**
 * Create data/<name> and cache/<name> if absent. Existing contents are never
 * touched.
 */
export async function ensureAppDirs(paths: Pick<AppPaths, "data" | "cache">): Promise<void> {
  await mkdir(paths.data, { recursive: true });
  await mkdir(paths.cache, { recursive: true });
}

/**
 * First free `archives/<name>-<timestamp>[-n]` path.
 */
export async function archiveTarget(paths: WorkPaths, app: string, runStart: Date): Promise<string> {
  const base = `${app}-${archiveTimestamp(runStart)}`;
  let candidate = join(paths.archivesDir, base);
  for (let n = 1; await pathExists(candidate); n++) {
    candidate = join(paths.archivesDir, `${base}-${n}`);
  }
  return candidate;
}

/**
 * Move data/<app> under archives/. The move is a single rename, so the data
 * is either fully at its old place or fully archived. Returns null when
 * there is no data directory.
 */
export async function archiveDataDir(
  paths: WorkPaths,
  app: string,
  runStart: Date,
): Promise<ArchivedData | null> {
  const from = join(paths.dataDir, app);
  if (!(await isDir(from))) return null;

  try {
    await mkdir(paths.archivesDir, { recursive: true });
  } catch (err: unknown) {
    throw new DirectoryError(`could not create ${paths.archivesDir}: ${describeError(err)}`, app, {
      cause: err,
    });
  }
  const to = await archiveTarget(paths, app, runStart);
  try {
    await rename(from, to);
  } catch (err: unknown) {
    throw new DirectoryError(`could not archive ${from} to ${to}: ${describeError(err)}`, app, {
      cause: err,
    });
  }
  return { app, from, to };
}

/**
 * Reconcile the directory set against the manifest. Runs once, after every
 * application was processed.
 *
 * - Apps in the manifest: data/ and cache/ exist.
 * - Apps gone from the manifest (known to state, or with a leftover data/
 *   or cache/ directory): data archived, cache deleted, and only then the
 *   state entry dropped. A failure keeps the entry so the next run retries.
 * - repos/ checkouts whose URL no app references any more are removed.
 *
 * `state` is updated in place.
 */
export async function reconcileDirectories(
  paths: WorkPaths,
  apps: ApplicationSpec[],
  state: State,
  runStart: Date,
): Promise<DirectoryReport> {
  const report: DirectoryReport = {
    archived: [],
    deletedCaches: [],
    removedCheckouts: [],
    forgotten: [],
    failures: [],
  };

  const present = new Set(apps.map((a) => a.name));
  for (const name of present) {
    await ensureAppDirs({
      data: join(paths.dataDir, name),
      cache: join(paths.cacheDir, name),
    });
  }

  const removed = new Set<string>();
  for (const name of Object.keys(state.apps)) removed.add(name);
  for (const name of await listDirNames(paths.dataDir)) removed.add(name);
  for (const name of await listDirNames(paths.cacheDir)) removed.add(name);
  for (const name of present) removed.delete(name);

  for (const app of [...removed].sort()) {
    try {
      const archived = await archiveDataDir(paths, app, runStart);
      if (archived) {
        out.info(`The data for ${app} is stale, archived to ${archived.to}.`);
        report.archived.push(archived);
      }

      const cache = join(paths.cacheDir, app);
      if (await pathExists(cache)) {
        try {
          await rm(cache, { recursive: true, force: true });
        } catch (err: unknown) {
          throw new DirectoryError(`could not delete ${cache}: ${describeError(err)}`, app, { cause: err });
        }
        out.info(`The cache for ${app} is stale, deleted ${cache}.`);
        report.deletedCaches.push(app);
      }

      if (appState(state, app) !== undefined) {
        delete state.apps[app];
        report.forgotten.push(app);
      }
    } catch (err: unknown) {
      if (!(err instanceof DirectoryError)) throw err;
      out.error(`${app}: ${err.message}`);
      report.failures.push(err);
    }
  }

  const referenced = new Set(apps.map((a) => repoKey(a.url)));
  for (const key of await listDirNames(paths.reposDir)) {
    if (referenced.has(key)) continue;
    const checkout = join(paths.reposDir, key);
    try {
      await rm(checkout, { recursive: true, force: true });
      out.info(`No app references ${checkout} any more, removed it.`);
      report.removedCheckouts.push(key);
    } catch (err: unknown) {
      const failure = new DirectoryError(`could not remove ${checkout}: ${describeError(err)}`, null, {
        cause: err,
      });
      out.error(failure.message);
      report.failures.push(failure);
    }
  }

  return report;
}

/**
 * Archived data directories, newest first.
 */
export async function listArchives(paths: WorkPaths): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];
  for (const name of await listDirNames(paths.archivesDir)) {
    const m = ARCHIVE_NAME_RE.exec(name);
    if (!m) continue;
    const [, app, y, mo, d, h, mi, s] = m;
    const archivedAt = new Date(
      Number(y),
      Number(mo) - 1,
      Number(d),
      Number(h),
      Number(mi),
      Number(s),
    ).toISOString();
    entries.push({ name, path: join(paths.archivesDir, name), app, archivedAt });
  }
  return entries.sort((a, b) =>
    a.archivedAt === b.archivedAt ? b.name.localeCompare(a.name) : a.archivedAt < b.archivedAt ? 1 : -1,
  );
}

/**
 * Delete one archive. Only ever called on explicit user request.
 */
export async function deleteArchive(paths: WorkPaths, name: string): Promise<void> {
  if (name.includes("/") || name.includes("\\") || name === "." || name === "..") {
    throw new DirectoryError(`invalid archive name: ${name}`);
  }
  await rm(join(paths.archivesDir, name), { recursive: true, force: true });
}
