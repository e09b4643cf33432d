import { execa } from "execa";
import * as out from "./output.js";

async function git(args: string[], cwd?: string): Promise<string> {
  out.debug(`Command: git ${args.join(" ")}`);
  const result = await execa("git", args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
  return result.stdout;
}

/**
 * Clone `url` into `dest`. With a branch, that branch is checked out;
 * otherwise the remote's default branch.
 */
export async function clone(url: string, dest: string, branch: string | null): Promise<void> {
  const args = ["clone"];
  if (branch !== null) args.push("--branch", branch);
  args.push(url, dest);
  await git(args);
}

/**
 * Check that `dir` is the top level of a git work tree.
 */
export async function isWorkTree(dir: string): Promise<boolean> {
  try {
    const top = (await git(["rev-parse", "--show-toplevel"], dir)).trim();
    const cdup = (await git(["rev-parse", "--show-cdup"], dir)).trim();
    return top.length > 0 && cdup === "";
  } catch {
    return false;
  }
}

/** Point `origin` at `url` (the manifest may have changed its form). */
export async function setRemoteUrl(repoDir: string, url: string): Promise<void> {
  await git(["remote", "set-url", "origin", url], repoDir);
}

/**
 * Run `git fetch --force --prune origin`.
 */
export async function fetch(repoDir: string): Promise<void> {
  await git(["fetch", "--force", "--prune", "origin"], repoDir);
}

/**
 * Run `git reset --hard <ref>`. Local modifications are discarded.
 */
export async function resetHard(repoDir: string, ref: string): Promise<void> {
  await git(["reset", "--hard", ref], repoDir);
}

/**
 * Run `git clean -fd` to remove untracked files and directories.
 */
export async function cleanUntracked(repoDir: string): Promise<void> {
  await git(["clean", "-fd"], repoDir);
}

/** Get the commit hash for HEAD. */
export async function currentCommit(dir: string): Promise<string> {
  return (await git(["rev-parse", "HEAD"], dir)).trim();
}

/**
 * Check if a git ref exists (e.g., refs/remotes/origin/main).
 */
export async function refExists(repoDir: string, ref: string): Promise<boolean> {
  try {
    await git(["rev-parse", "--verify", "--quiet", ref], repoDir);
    return true;
  } catch {
    return false;
  }
}

/**
 * Detect the remote default branch (e.g., "main" or "master").
 * Tries multiple detection strategies:
 * 1. refs/remotes/origin/HEAD (set by clone)
 * 2. Check for refs/remotes/origin/main
 * 3. Check for refs/remotes/origin/master
 * 4. Enumerate all refs/remotes/origin/* and pick the first
 */
export async function defaultBranch(repoDir: string): Promise<string> {
  try {
    const ref = (await git(["symbolic-ref", "--short", "refs/remotes/origin/HEAD"], repoDir)).trim();
    if (ref) return ref.replace(/^origin\//, "");
  } catch {
    // origin/HEAD unset, e.g. the checkout predates a remote default change
  }

  for (const candidate of ["main", "master"]) {
    if (await refExists(repoDir, `refs/remotes/origin/${candidate}`)) {
      return candidate;
    }
  }

  const listing = await git(
    ["for-each-ref", "--format=%(refname:short)", "refs/remotes/origin/"],
    repoDir,
  ).catch(() => "");
  const branches = listing
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && l !== "origin/HEAD" && l !== "origin");
  if (branches.length > 0) {
    return branches[0].replace(/^origin\//, "");
  }

  throw new Error("Could not detect remote default branch. No remote branches found.");
}
