import { mkdir, rm } from "node:fs/promises";
import { dirname, join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { ConfigurationError, describeError, TransportError } from "./errors.js";
import * as git from "./git.js";
import type { ApplicationSpec, RetryPolicy } from "./manifest.js";
import * as out from "./output.js";
import { isDir, repoKey } from "./paths.js";

export interface SyncResult {
  repoDir: string;
  ref: string; // branch the working copy was reset to
  revision: string; // HEAD after the reset
}

type SyncTarget = Pick<ApplicationSpec, "name" | "url" | "branch">;

/**
 * Keeps one working copy per source URL under repos/, fast-forwarded to the
 * remote. One instance lives for one run: each URL is cloned or fetched at
 * most once, and that outcome (including a failure) is shared by every app
 * referencing the URL.
 */
export class SourceSynchronizer {
  private readonly fetched = new Map<string, Promise<void>>();

  constructor(
    private readonly reposDir: string,
    private readonly retry: RetryPolicy,
    private readonly wait: (ms: number) => Promise<unknown> = sleep,
  ) {}

  checkoutDir(url: string): string {
    return join(this.reposDir, repoKey(url));
  }

  /** URLs fetched (or attempted) during this run. */
  fetchedUrls(): string[] {
    return [...this.fetched.keys()];
  }

  /**
   * Make sure the app's checkout exists and reflects the latest remote state
   * of its branch. The shared working copy is hard-reset; nothing local
   * survives.
   */
  async sync(app: SyncTarget): Promise<SyncResult> {
    const repoDir = this.checkoutDir(app.url);

    let pending = this.fetched.get(app.url);
    if (!pending) {
      pending = this.fetchWithRetry(app.url, repoDir, app.branch);
      this.fetched.set(app.url, pending);
    }
    try {
      await pending;
    } catch (err: unknown) {
      throw new TransportError(`could not sync ${app.url}: ${describeError(err)}`, app.name, {
        cause: err,
      });
    }

    let ref: string;
    try {
      ref = app.branch ?? (await git.defaultBranch(repoDir));
    } catch (err: unknown) {
      throw new TransportError(describeError(err), app.name, { cause: err });
    }
    if (!(await git.refExists(repoDir, `refs/remotes/origin/${ref}`))) {
      throw new ConfigurationError(`branch "${ref}" does not exist in ${app.url}`, app.name);
    }

    try {
      await git.resetHard(repoDir, `origin/${ref}`);
      await git.cleanUntracked(repoDir);
      const revision = await git.currentCommit(repoDir);
      return { repoDir, ref, revision };
    } catch (err: unknown) {
      throw new TransportError(`could not reset ${repoDir}: ${describeError(err)}`, app.name, {
        cause: err,
      });
    }
  }

  private async fetchWithRetry(url: string, repoDir: string, branch: string | null): Promise<void> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
      try {
        await this.cloneOrFetch(url, repoDir, branch);
        return;
      } catch (err: unknown) {
        lastError = err;
        if (attempt < this.retry.attempts) {
          const delay = this.retry.backoffMs * attempt;
          out.warn(
            `git sync of ${url} failed (attempt ${attempt}/${this.retry.attempts}): ${describeError(err)}. Retrying in ${Math.round(delay / 1000)}s.`,
          );
          await this.wait(delay);
        }
      }
    }
    throw lastError;
  }

  private async cloneOrFetch(url: string, repoDir: string, branch: string | null): Promise<void> {
    if (await git.isWorkTree(repoDir)) {
      out.info(`Pulling ${url} to ${repoDir}...`);
      await git.setRemoteUrl(repoDir, url);
      await git.fetch(repoDir);
      return;
    }

    // Not a checkout (never cloned, or a clone interrupted half-way)
    if (await isDir(repoDir)) {
      await rm(repoDir, { recursive: true, force: true });
    }
    await mkdir(dirname(repoDir), { recursive: true });
    out.info(`Cloning ${url} to ${repoDir}...`);
    await git.clone(url, repoDir, branch);
  }
}
