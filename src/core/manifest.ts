import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parse } from "yaml";
import { z } from "zod";
import { projectName } from "./compose.js";
import { describeError, ManifestError } from "./errors.js";

export const DEFAULT_COMPOSE_CONFIG = "docker-compose.yml";
export const APP_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export interface RetryPolicy {
  attempts: number; // total attempts, >= 1
  backoffMs: number; // wait before attempt n+1 is backoffMs * n
}

export interface ApplicationSpec {
  name: string;
  url: string;
  branch: string | null; // null = remote default branch
  composeConfig: string[]; // relative to the checkout, in override order
  environment: Record<string, string>;
  environmentFile: string | null; // absolute
  replacements: Record<string, string>;
  replacementsFile: string | null; // absolute
  enabled: boolean;
}

export interface Manifest {
  path: string;
  dir: string; // relative file paths resolve against this
  apps: ApplicationSpec[]; // declaration order
  prune: boolean;
  retry: RetryPolicy;
}

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);
const variablesSchema = z.record(z.string().min(1), scalarSchema);

const appSchema = z
  .object({
    url: z.string().min(1),
    branch: z.string().min(1).optional(),
    compose_config: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
    environment: variablesSchema.optional(),
    environment_file: z.string().min(1).optional(),
    replacements: variablesSchema.optional(),
    replacements_file: z.string().min(1).optional(),
    enabled: z.boolean().optional(),
  })
  .strict();

const configSchema = z
  .object({
    prune: z.boolean().optional(),
    git_attempts: z.number().int().min(1).optional(),
    git_backoff_seconds: z.number().min(0).optional(),
  })
  .strict();

const manifestSchema = z
  .object({
    apps: z
      .record(
        z.string().regex(APP_NAME_PATTERN, "app names may only contain letters, digits, '.', '_' and '-'"),
        appSchema,
      )
      .nullable()
      .optional(),
    config: configSchema.nullable().optional(),
  })
  .strict();

export function defaultRetryPolicy(): RetryPolicy {
  return { attempts: 3, backoffMs: 10_000 };
}

function stringifyValues(vars: Record<string, string | number | boolean> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(vars ?? {})) {
    out[key] = String(value);
  }
  return out;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate an already-parsed manifest document. `manifestPath` is used for
 * error messages and to resolve variable-file paths.
 */
export function parseManifest(raw: unknown, manifestPath: string): Manifest {
  const path = resolve(manifestPath);
  const dir = dirname(path);
  const result = manifestSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ManifestError(path, formatIssues(result.error));
  }

  const apps: ApplicationSpec[] = Object.entries(result.data.apps ?? {}).map(([name, app]) => {
    const compose = app.compose_config ?? DEFAULT_COMPOSE_CONFIG;
    return {
      name,
      url: app.url,
      branch: app.branch ?? null,
      composeConfig: typeof compose === "string" ? [compose] : compose,
      environment: stringifyValues(app.environment),
      environmentFile: app.environment_file ? resolve(dir, app.environment_file) : null,
      replacements: stringifyValues(app.replacements),
      replacementsFile: app.replacements_file ? resolve(dir, app.replacements_file) : null,
      enabled: app.enabled ?? true,
    };
  });

  const projects = new Map<string, string>();
  const collisions: string[] = [];
  for (const app of apps) {
    const project = projectName(app.name);
    const owner = projects.get(project);
    if (owner !== undefined) {
      collisions.push(`apps.${app.name}: compose project "${project}" is already used by app ${owner}`);
    } else {
      projects.set(project, app.name);
    }
  }
  if (collisions.length > 0) {
    throw new ManifestError(path, collisions);
  }

  const config = result.data.config ?? {};
  const defaults = defaultRetryPolicy();
  return {
    path,
    dir,
    apps,
    prune: config.prune ?? false,
    retry: {
      attempts: config.git_attempts ?? defaults.attempts,
      backoffMs:
        config.git_backoff_seconds !== undefined
          ? config.git_backoff_seconds * 1000
          : defaults.backoffMs,
    },
  };
}

/**
 * Read and validate the manifest file. Unknown keys and malformed values
 * are rejected here, before any application is reconciled.
 */
export async function loadManifest(manifestPath: string): Promise<Manifest> {
  const raw = await readFile(manifestPath, "utf8");
  let doc: unknown;
  try {
    doc = parse(raw);
  } catch (err: unknown) {
    throw new ManifestError(resolve(manifestPath), [describeError(err)]);
  }
  return parseManifest(doc, manifestPath);
}
