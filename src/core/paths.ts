import { createHash } from "node:crypto";
import { mkdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";

export const DATA_DIR_NAME = "data";
export const CACHE_DIR_NAME = "cache";
export const REPOS_DIR_NAME = "repos";
export const ARCHIVES_DIR_NAME = "archives";
export const STATE_FILE_NAME = "state.toml";
export const LOCK_FILE_NAME = "dockhand.lock";

export interface WorkPaths {
  root: string; // the working root holding everything below
  dataDir: string; // root/data/
  cacheDir: string; // root/cache/
  reposDir: string; // root/repos/
  archivesDir: string; // root/archives/
  stateFile: string; // root/state.toml
  lockFile: string; // root/dockhand.lock
}

export interface AppPaths {
  data: string; // data/<name>
  cache: string; // cache/<name>
  repo: string; // repos/<url key>
}

/**
 * Derive every path of a working root. Nothing is touched on disk.
 */
export function workPaths(root: string): WorkPaths {
  const abs = resolve(root);
  return {
    root: abs,
    dataDir: join(abs, DATA_DIR_NAME),
    cacheDir: join(abs, CACHE_DIR_NAME),
    reposDir: join(abs, REPOS_DIR_NAME),
    archivesDir: join(abs, ARCHIVES_DIR_NAME),
    stateFile: join(abs, STATE_FILE_NAME),
    lockFile: join(abs, LOCK_FILE_NAME),
  };
}

/**
 * Directory key of the shared checkout for a source URL: the first 16 hex
 * characters of its SHA-256. Apps sharing a URL share the checkout.
 */
export function repoKey(url: string): string {
  return createHash("sha256").update(url).digest("hex").slice(0, 16);
}

export function appPaths(paths: WorkPaths, name: string, url: string): AppPaths {
  return {
    data: join(paths.dataDir, name),
    cache: join(paths.cacheDir, name),
    repo: join(paths.reposDir, repoKey(url)),
  };
}

/**
 * Check if a path exists and is a directory.
 */
export async function isDir(p: string): Promise<boolean> {
  try {
    const s = await stat(p);
    return s.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Create the top-level layout: data/, cache/, repos/, archives/.
 */
export async function createWorkStructure(paths: WorkPaths): Promise<void> {
  for (const d of [paths.root, paths.dataDir, paths.cacheDir, paths.reposDir, paths.archivesDir]) {
    await mkdir(d, { recursive: true });
  }
}

/**
 * A directory counts as a working root once it holds a state file or the
 * data/ directory.
 */
export async function isWorkRoot(root: string): Promise<boolean> {
  const paths = workPaths(root);
  if (await isDir(paths.dataDir)) return true;
  try {
    await stat(paths.stateFile);
    return true;
  } catch {
    return false;
  }
}
