import { describeError, ExecutorError } from "./errors.js";
import type { StackExecutor, StackSpec, UpOptions } from "./compose.js";
import { projectName } from "./compose.js";

/**
 * The only component allowed to drive the stack executor. Every failure
 * comes back as an ExecutorError tagged with the application.
 */
export class StackController {
  constructor(private readonly executor: StackExecutor) {}

  private async attempt<T>(app: string | null, what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw new ExecutorError(`${what}: ${describeError(err)}`, app, { cause: err });
    }
  }

  /**
   * Pull images that cannot be built locally, then bring the stack up.
   * A failed pull blocks the start.
   */
  async start(app: string, stack: StackSpec, options?: UpOptions): Promise<void> {
    await this.attempt(app, "Could not pull the images", () => this.executor.pull(stack));
    await this.attempt(app, "Could not start the stack", () => this.executor.up(stack, options));
  }

  async restart(app: string, stack: StackSpec): Promise<void> {
    await this.stop(app);
    await this.start(app, stack);
  }

  /**
   * Stop by project name only, so a deleted checkout or missing compose file
   * does not prevent the stop.
   */
  async stop(app: string): Promise<void> {
    await this.attempt(app, "Could not stop the stack", () => this.executor.down(projectName(app)));
  }

  async isRunning(app: string): Promise<boolean> {
    return this.attempt(app, "Could not query the stack", () => this.executor.isRunning(projectName(app)));
  }

  /** Host-wide image prune. */
  async prune(): Promise<void> {
    await this.attempt(null, "Could not prune images", () => this.executor.pruneImages());
  }
}
