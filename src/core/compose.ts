import { execa } from "execa";
import * as out from "./output.js";

/**
 * Everything the container runtime needs to act on one application's stack.
 */
export interface StackSpec {
  project: string; // compose project name, the stack's identity
  workingDir: string; // project directory (the checkout)
  files: string[]; // rendered compose files, in override order
  environment: Record<string, string>; // added to the inherited environment
}

export interface UpOptions {
  detach?: boolean; // default true; false streams the stack's output
}

/**
 * The external stack executor. `down` and `isRunning` take only the project
 * name so a stack can be found and stopped without its files on disk.
 */
export interface StackExecutor {
  pull(stack: StackSpec): Promise<void>;
  up(stack: StackSpec, options?: UpOptions): Promise<void>;
  down(project: string): Promise<void>;
  isRunning(project: string): Promise<boolean>;
  pruneImages(): Promise<void>;
}

/**
 * Compose project name for an application: lowercase, with anything outside
 * [a-z0-9_-] replaced by an underscore.
 */
export function projectName(appName: string): string {
  const name = appName.toLowerCase().replace(/[^a-z0-9_-]/g, "_");
  return /^[a-z0-9]/.test(name) ? name : `app${name}`;
}

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>; // added to the inherited environment
  foreground?: boolean; // stream output to the terminal instead of capturing it
}

/** Runs a program and resolves to its captured stdout. */
export type CommandRunner = (file: string, args: string[], options: CommandOptions) => Promise<string>;

export const runCommand: CommandRunner = async (file, args, options) => {
  out.debug(`Command: ${file} ${args.join(" ")}`);
  if (options.foreground) {
    await execa(file, args, { cwd: options.cwd, env: options.env, stdio: "inherit" });
    return "";
  }
  const result = await execa(file, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ["ignore", "pipe", "pipe"],
  });
  return result.stdout;
};

/**
 * `docker compose` driven through execa.
 */
export class ComposeExecutor implements StackExecutor {
  constructor(
    private readonly docker: string = "docker",
    private readonly run: CommandRunner = runCommand,
  ) {}

  private stackArgs(stack: StackSpec): string[] {
    const args = ["compose", "-p", stack.project, "--project-directory", stack.workingDir];
    for (const file of stack.files) {
      args.push("-f", file);
    }
    return args;
  }

  async pull(stack: StackSpec): Promise<void> {
    // Services with a build section are built by `up --build`, never pulled
    await this.run(this.docker, [...this.stackArgs(stack), "pull", "--ignore-buildable"], {
      cwd: stack.workingDir,
      env: stack.environment,
    });
  }

  async up(stack: StackSpec, options: UpOptions = {}): Promise<void> {
    const detach = options.detach ?? true;
    const args = [...this.stackArgs(stack), "up", "--build", "--remove-orphans"];
    if (detach) args.push("--detach");
    await this.run(this.docker, args, {
      cwd: stack.workingDir,
      env: stack.environment,
      foreground: !detach,
    });
  }

  async down(project: string): Promise<void> {
    await this.run(this.docker, ["compose", "-p", project, "down", "--remove-orphans"], {});
  }

  async isRunning(project: string): Promise<boolean> {
    const stdout = await this.run(this.docker, ["compose", "-p", project, "ps", "--quiet", "--status", "running"], {});
    return stdout.trim().length > 0;
  }

  async pruneImages(): Promise<void> {
    await this.run(this.docker, ["image", "prune", "--all", "--force"], {});
  }
}
