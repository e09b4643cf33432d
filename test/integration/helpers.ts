import { execa } from "execa";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { StackExecutor, StackSpec, UpOptions } from "../../src/core/compose.js";

/**
 * Create a temporary directory for a test.
 */
export async function createTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "dockhand-test-"));
}

/**
 * Configure git user identity in a repo (required for commits).
 */
async function configureGitUser(dir: string): Promise<void> {
  await execa("git", ["config", "user.email", "test@dockhand.test"], { cwd: dir });
  await execa("git", ["config", "user.name", "Dockhand Test"], { cwd: dir });
}

/**
 * A bare remote plus the working clone used to push to it.
 */
export interface TestRemote {
  url: string; // file:// URL of the bare repo
  bareDir: string;
  workDir: string;
}

/**
 * Create a bare git repo whose 'main' holds the given files, and keep a
 * working clone around for later commits.
 */
export async function createBareRemote(files: Record<string, string>): Promise<TestRemote> {
  const workDir = await createTempDir();
  await execa("git", ["init", "-b", "main"], { cwd: workDir });
  await configureGitUser(workDir);
  for (const [name, content] of Object.entries(files)) {
    await fs.mkdir(path.dirname(path.join(workDir, name)), { recursive: true });
    await fs.writeFile(path.join(workDir, name), content);
  }
  await execa("git", ["add", "."], { cwd: workDir });
  await execa("git", ["commit", "-m", "Initial commit"], { cwd: workDir });

  const bareDir = path.join(await createTempDir(), "remote.git");
  await execa("git", ["clone", "--bare", workDir, bareDir]);
  await execa("git", ["remote", "add", "origin", bareDir], { cwd: workDir });
  return { url: `file://${bareDir}`, bareDir, workDir };
}

/**
 * Commit the given files to a branch of the remote and push it. The branch
 * is created from main when it does not exist yet.
 */
export async function pushCommit(
  remote: TestRemote,
  files: Record<string, string>,
  branch = "main",
): Promise<void> {
  const { workDir } = remote;
  const exists = await execa("git", ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`], {
    cwd: workDir,
    reject: false,
  });
  await execa("git", exists.exitCode === 0 ? ["checkout", branch] : ["checkout", "-b", branch, "main"], {
    cwd: workDir,
  });
  for (const [name, content] of Object.entries(files)) {
    await fs.mkdir(path.dirname(path.join(workDir, name)), { recursive: true });
    await fs.writeFile(path.join(workDir, name), content);
  }
  await execa("git", ["add", "."], { cwd: workDir });
  await execa("git", ["commit", "-m", `Update ${Object.keys(files).join(", ")}`], { cwd: workDir });
  await execa("git", ["push", "origin", branch], { cwd: workDir });
  await execa("git", ["checkout", "main"], { cwd: workDir });
}

/**
 * Clean up a temp directory.
 */
export async function cleanup(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Check if a path exists.
 */
export async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export type ExecutorCall =
  | { op: "pull" | "up"; project: string; files: string[]; environment: Record<string, string>; detach: boolean }
  | { op: "down" | "isRunning"; project: string }
  | { op: "pruneImages" };

/**
 * In-process stand-in for `docker compose`. Records every call and keeps
 * the set of running projects. Projects listed in `failing` fail on `up`.
 */
export class FakeExecutor implements StackExecutor {
  readonly calls: ExecutorCall[] = [];
  readonly running = new Set<string>();
  readonly failing = new Set<string>();
  // Compose files as the executor read them, keyed by project
  readonly seenFiles = new Map<string, string[]>();

  async pull(stack: StackSpec): Promise<void> {
    this.calls.push({
      op: "pull",
      project: stack.project,
      files: stack.files,
      environment: stack.environment,
      detach: true,
    });
  }

  async up(stack: StackSpec, options: UpOptions = {}): Promise<void> {
    this.calls.push({
      op: "up",
      project: stack.project,
      files: stack.files,
      environment: stack.environment,
      detach: options.detach ?? true,
    });
    if (this.failing.has(stack.project)) {
      throw new Error(`service of ${stack.project} exited with code 1`);
    }
    const contents: string[] = [];
    for (const f of stack.files) {
      contents.push(await fs.readFile(f, "utf8"));
    }
    this.seenFiles.set(stack.project, contents);
    this.running.add(stack.project);
  }

  async down(project: string): Promise<void> {
    this.calls.push({ op: "down", project });
    this.running.delete(project);
  }

  async isRunning(project: string): Promise<boolean> {
    this.calls.push({ op: "isRunning", project });
    return this.running.has(project);
  }

  async pruneImages(): Promise<void> {
    this.calls.push({ op: "pruneImages" });
  }

  /** Mutating calls only, as `op:project` strings. */
  actions(): string[] {
    return this.calls
      .filter((c) => c.op !== "isRunning")
      .map((c) => ("project" in c ? `${c.op}:${c.project}` : c.op));
  }

  reset(): void {
    this.calls.length = 0;
  }
}
