import { mkdtemp, unlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join, resolve } from "node:path";
import { stringify } from "yaml";
import type { StackExecutor } from "../core/compose.js";
import { ComposeExecutor, projectName } from "../core/compose.js";
import { ensureAppDirs } from "../core/directories.js";
import { ConfigurationError } from "../core/errors.js";
import type { ApplicationSpec } from "../core/manifest.js";
import { DEFAULT_COMPOSE_CONFIG } from "../core/manifest.js";
import * as out from "../core/output.js";
import { appPaths, createWorkStructure, workPaths } from "../core/paths.js";
import { loadFragments, renderArtifact, resolveVariables, writeRendered } from "../core/render.js";
import { StackController } from "../core/stack.js";

export const TEST_APP_NAME = "test_app";

export interface TestOptions {
  cwd?: string; // the checkout under test, default process.cwd()
  workingDir?: string; // default: a fresh temporary directory
  environment?: string[]; // K=V
  environmentFile?: string;
  replacements?: string[]; // K=V
  replacementsFile?: string;
  composeConfig?: string[]; // default docker-compose.yml
  hostDataRoot?: string | null;
  executor?: StackExecutor;
  detach?: boolean; // default false: stream the stack's output
}

/**
 * Parse repeated `KEY=value` arguments. The value is everything after the
 * first `=`.
 */
export function parseAssignments(pairs: string[], flag: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new ConfigurationError(`${flag} ${pair}: expected KEY=value`);
    }
    vars[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return vars;
}

/**
 * The manifest stanza that reproduces a test invocation.
 */
export function manifestStanza(options: {
  environment: Record<string, string>;
  environmentFile?: string;
  replacements: Record<string, string>;
  replacementsFile?: string;
  composeConfig: string[];
}): string {
  const app: Record<string, unknown> = {
    url: "https://your.git/repo/url/here",
    compose_config: options.composeConfig.map((f) => basename(f)),
  };
  if (Object.keys(options.environment).length > 0) app.environment = options.environment;
  if (options.environmentFile) app.environment_file = `some_dir/${basename(options.environmentFile)}`;
  if (Object.keys(options.replacements).length > 0) app.replacements = options.replacements;
  if (options.replacementsFile) app.replacements_file = `some_dir/${basename(options.replacementsFile)}`;
  return stringify({ apps: { myapp: app } });
}

/**
 * `dockhand test`: render the compose files of the current directory the
 * way `run` would, and bring the stack up in the foreground. Persisted state
 * is never read or written. Returns the manifest stanza for the invocation.
 */
export async function runTest(options: TestOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const environment = parseAssignments(options.environment ?? [], "-e");
  const replacements = parseAssignments(options.replacements ?? [], "-r");
  const composeConfig = options.composeConfig?.length ? options.composeConfig : [DEFAULT_COMPOSE_CONFIG];

  const root = options.workingDir
    ? resolve(cwd, options.workingDir)
    : await mkdtemp(join(tmpdir(), "dockhand-test-"));
  const paths = workPaths(root);
  await createWorkStructure(paths);
  out.info(`Using ${root} as the working directory.`);

  const app: ApplicationSpec = {
    name: TEST_APP_NAME,
    url: cwd,
    branch: null,
    composeConfig,
    environment,
    environmentFile: options.environmentFile ? resolve(cwd, options.environmentFile) : null,
    replacements,
    replacementsFile: options.replacementsFile ? resolve(cwd, options.replacementsFile) : null,
    enabled: true,
  };
  const dirs = { ...appPaths(paths, app.name, app.url), repo: cwd };
  await ensureAppDirs(dirs);

  const variables = await resolveVariables(app);
  const fragments = await loadFragments(app.name, cwd, composeConfig);
  const artifact = renderArtifact({
    name: app.name,
    fragments,
    variables,
    paths: dirs,
    hostDataRoot: options.hostDataRoot ?? null,
  });

  const controller = new StackController(options.executor ?? new ComposeExecutor());
  const files = await writeRendered(cwd, app.name, artifact);
  try {
    await controller.start(
      app.name,
      { project: projectName(app.name), workingDir: cwd, files, environment: artifact.environment },
      { detach: options.detach ?? false },
    );
  } finally {
    for (const file of files) {
      await unlink(file).catch((err: unknown) => {
        out.warn(`could not remove ${file}: ${String(err)}`);
      });
    }
  }

  const stanza = manifestStanza({
    environment,
    environmentFile: options.environmentFile,
    replacements,
    replacementsFile: options.replacementsFile,
    composeConfig,
  });
  out.info("\nTo deploy this app, add the following to your manifest:\n");
  out.info(stanza.trimEnd());
  return stanza;
}
