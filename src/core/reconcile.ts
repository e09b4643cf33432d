import type { StackExecutor } from "./compose.js";
import { projectName } from "./compose.js";
import type { DirectoryReport } from "./directories.js";
import { ensureAppDirs, reconcileDirectories } from "./directories.js";
import {
  ConfigurationError,
  describeError,
  DirectoryError,
  DockhandError,
  ExecutorError,
  TransportError,
} from "./errors.js";
import type { Action } from "./fingerprint.js";
import { computeFingerprint, detectAction } from "./fingerprint.js";
import type { ApplicationSpec, Manifest } from "./manifest.js";
import * as out from "./output.js";
import type { WorkPaths } from "./paths.js";
import { appPaths, createWorkStructure } from "./paths.js";
import { loadFragments, renderArtifact, resolveVariables, writeRendered } from "./render.js";
import { StackController } from "./stack.js";
import type { State } from "./state.js";
import { appState, readState, writeState } from "./state.js";
import { SourceSynchronizer } from "./sync.js";

/**
 * Everything one run needs, passed explicitly instead of living in globals.
 */
export interface RunContext {
  paths: WorkPaths;
  manifest: Manifest;
  executor: StackExecutor;
  force?: boolean; // restart enabled apps even when unchanged
  hostDataRoot?: string | null; // host-side root for DATA_DIR
  now?: () => Date;
  wait?: (ms: number) => Promise<unknown>; // between git retries
}

/** `resume`: unchanged, but the stack was found not running and started again. */
export type AppAction = Action | "resume";

type Stage = "sync" | "render" | "act";

export interface AppOutcome {
  name: string;
  action: AppAction | null; // null when the app failed before an action was decided
  ok: boolean;
  error: DockhandError | null;
  revision: string | null;
}

export interface RunResult {
  ok: boolean;
  apps: AppOutcome[];
  directories: DirectoryReport | null;
  pruned: boolean;
  failures: DockhandError[]; // end-of-run phase failures
}

const STAGE_ERRORS: Record<Stage, new (message: string, app: string | null, options?: ErrorOptions) => DockhandError> =
  {
    sync: TransportError,
    render: ConfigurationError,
    act: ExecutorError,
  };

const ACTION_VERBS: Record<Exclude<AppAction, "none">, string> = {
  deploy: "Starting",
  start: "Starting",
  resume: "Starting (was not running)",
  restart: "Restarting",
  stop: "Stopping",
};

class AppReconciler {
  private stage: Stage = "sync";

  constructor(
    private readonly ctx: RunContext,
    private readonly state: State,
    private readonly sync: SourceSynchronizer,
    private readonly controller: StackController,
    private readonly now: () => Date,
  ) {}

  async run(app: ApplicationSpec): Promise<AppOutcome> {
    this.stage = "sync";
    try {
      return await this.reconcile(app);
    } catch (err: unknown) {
      const failure =
        err instanceof DockhandError
          ? err
          : new STAGE_ERRORS[this.stage](describeError(err), app.name, { cause: err });
      out.error(`${app.name}: Error while processing (${failure.kind}): ${failure.message}`);
      return { name: app.name, action: null, ok: false, error: failure, revision: null };
    }
  }

  private async reconcile(app: ApplicationSpec): Promise<AppOutcome> {
    const previous = appState(this.state, app.name);
    const paths = appPaths(this.ctx.paths, app.name, app.url);

    if (!app.enabled) {
      out.debug(`${app.name} is disabled, will not pull.`);
      const action = detectAction({ enabled: false, fingerprint: null, previous });
      if (action === "stop" && previous) {
        this.stage = "act";
        out.info(`${app.name}: ${ACTION_VERBS.stop}...`);
        await this.controller.stop(app.name);
        this.state.apps[app.name] = { ...previous, enabled: false, updated_at: this.now().toISOString() };
      }
      return { name: app.name, action, ok: true, error: null, revision: previous?.revision ?? null };
    }

    // SYNC
    this.stage = "sync";
    const synced = await this.sync.sync(app);

    // RENDER
    this.stage = "render";
    await ensureAppDirs(paths);
    const variables = await resolveVariables(app);
    const fragments = await loadFragments(app.name, synced.repoDir, app.composeConfig);
    const artifact = renderArtifact({
      name: app.name,
      fragments,
      variables,
      paths,
      hostDataRoot: this.ctx.hostDataRoot ?? null,
    });

    // DETECT
    const fingerprint = computeFingerprint(app.name, artifact, true);
    out.debug(`Old fingerprint: ${previous?.fingerprint ?? "(none)"}\nNew fingerprint: ${fingerprint}`);
    let action: AppAction = detectAction({
      enabled: true,
      fingerprint,
      previous,
      force: this.ctx.force ?? false,
    });

    // ACT
    this.stage = "act";
    if (action === "none" && !(await this.controller.isRunning(app.name))) {
      action = "resume";
    }
    if (action === "none") {
      out.info(`${app.name}: App does not need to be started.`);
    } else {
      out.info(`${app.name}: ${ACTION_VERBS[action]}...`);
      const files = await writeRendered(synced.repoDir, app.name, artifact);
      const stack = {
        project: projectName(app.name),
        workingDir: synced.repoDir,
        files,
        environment: artifact.environment,
      };
      if (action === "restart") {
        await this.controller.restart(app.name, stack);
      } else {
        await this.controller.start(app.name, stack);
      }
    }

    // UPDATE STATE
    const at = this.now().toISOString();
    this.state.apps[app.name] = {
      fingerprint,
      enabled: true,
      revision: synced.revision,
      deployed_at: action === "none" && previous ? previous.deployed_at : at,
      updated_at: at,
      paths,
    };
    return { name: app.name, action, ok: true, error: null, revision: synced.revision };
  }
}

/**
 * One reconciliation run:
 *
 *   LOAD STATE → for each app: SYNC → RENDER → DETECT → ACT → UPDATE STATE
 *   → DIRECTORY RECONCILE → PERSIST STATE → PRUNE (if configured)
 *
 * Apps are processed sequentially, in manifest order. A failure at any stage
 * marks that app failed and moves on to the next one. State is written after
 * every app, so a kill mid-run keeps the fingerprints already applied.
 */
export async function reconcile(ctx: RunContext): Promise<RunResult> {
  const now = ctx.now ?? (() => new Date());
  const runStart = now();
  const { paths, manifest } = ctx;

  await createWorkStructure(paths);
  const state = await readState(paths.stateFile);
  const sync = new SourceSynchronizer(paths.reposDir, manifest.retry, ctx.wait);
  const controller = new StackController(ctx.executor);
  const reconciler = new AppReconciler(ctx, state, sync, controller, now);

  const apps: AppOutcome[] = [];
  for (const app of manifest.apps) {
    out.info(`Updating ${app.name} (${app.branch ?? "default branch"})...`);
    apps.push(await reconciler.run(app));
    await writeState(paths.stateFile, state);
    out.info("");
  }

  const failures: DockhandError[] = [];
  let directories: DirectoryReport | null = null;
  try {
    directories = await reconcileDirectories(paths, manifest.apps, state, runStart);
    failures.push(...directories.failures);
  } catch (err: unknown) {
    const failure = new DirectoryError(`directory reconciliation failed: ${describeError(err)}`, null, {
      cause: err,
    });
    out.error(failure.message);
    failures.push(failure);
  }
  await writeState(paths.stateFile, state);

  let pruned = false;
  if (manifest.prune) {
    out.info("Pruning all unused images...");
    try {
      await controller.prune();
      pruned = true;
    } catch (err: unknown) {
      const failure = err instanceof DockhandError ? err : new ExecutorError(describeError(err));
      out.error(failure.message);
      failures.push(failure);
    }
  }

  return {
    ok: apps.every((a) => a.ok) && failures.length === 0,
    apps,
    directories,
    pruned,
    failures,
  };
}
