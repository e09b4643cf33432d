import { readFile, rename, writeFile } from "node:fs/promises";
import { parse, stringify } from "smol-toml";
import * as out from "./output.js";

export interface AppStatePaths {
  data: string;
  cache: string;
  repo: string;
}

export interface AppState {
  fingerprint: string; // last applied fingerprint (kept across a stop)
  enabled: boolean; // whether the stack was left running
  revision: string | null; // checkout HEAD at last apply, null if unknown
  deployed_at: string; // ISO 8601, last start/restart
  updated_at: string; // ISO 8601, last state change of any kind
  paths: AppStatePaths;
}

export interface State {
  apps: Record<string, AppState>; // keyed by application name
}

/**
 * Return empty/default state.
 */
export function defaultState(): State {
  return { apps: {} };
}

/**
 * The entry recorded for an application, ignoring inherited object members
 * such as `constructor`.
 */
export function appState(state: State, name: string): AppState | undefined {
  return Object.hasOwn(state.apps, name) ? state.apps[name] : undefined;
}

function stringField(raw: Record<string, unknown>, key: string, fallback: string): string {
  const v = raw[key];
  return typeof v === "string" ? v : fallback;
}

/**
 * Read state from the state file. Returns defaultState() if the file is
 * missing. A corrupted file is reported and treated as empty: every app is
 * then considered never deployed, which starts stacks but never touches data.
 */
export async function readState(stateFile: string): Promise<State> {
  let raw: string;
  try {
    raw = await readFile(stateFile, "utf8");
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return defaultState();
    }
    throw err;
  }

  let parsed: Record<string, unknown>;
  try {
    parsed = parse(raw);
  } catch {
    out.warn(`${stateFile} is corrupted. Treating every app as never deployed.`);
    return defaultState();
  }

  const entries: [string, AppState][] = [];
  const appsRaw = parsed["apps"];
  if (appsRaw && typeof appsRaw === "object" && !Array.isArray(appsRaw)) {
    for (const [name, entry] of Object.entries(appsRaw)) {
      if (!entry || typeof entry !== "object" || Array.isArray(entry)) continue;
      const e: Record<string, unknown> = { ...entry };
      const fingerprint = e["fingerprint"];
      if (typeof fingerprint !== "string") continue;

      const pathsField = e["paths"];
      const pathsRaw: Record<string, unknown> =
        pathsField && typeof pathsField === "object" && !Array.isArray(pathsField)
          ? { ...pathsField }
          : {};
      const epoch = new Date(0).toISOString();
      const app: AppState = {
        fingerprint,
        enabled: typeof e["enabled"] === "boolean" ? e["enabled"] : true,
        revision: typeof e["revision"] === "string" ? e["revision"] : null,
        deployed_at: stringField(e, "deployed_at", epoch),
        updated_at: stringField(e, "updated_at", epoch),
        paths: {
          data: stringField(pathsRaw, "data", ""),
          cache: stringField(pathsRaw, "cache", ""),
          repo: stringField(pathsRaw, "repo", ""),
        },
      };
      entries.push([name, app]);
    }
  }

  return { apps: Object.fromEntries(entries) };
}

/**
 * Write state. The file is replaced atomically (write to a sibling, then
 * rename) so a kill mid-write leaves the previous state intact.
 */
export async function writeState(stateFile: string, state: State): Promise<void> {
  const appsData: Record<string, Record<string, unknown>> = {};
  for (const [name, app] of Object.entries(state.apps)) {
    const entry: Record<string, unknown> = {
      fingerprint: app.fingerprint,
      enabled: app.enabled,
      deployed_at: app.deployed_at,
      updated_at: app.updated_at,
      paths: { ...app.paths },
    };
    // TOML has no null; a missing key reads back as null
    if (app.revision !== null) {
      entry["revision"] = app.revision;
    }
    appsData[name] = entry;
  }

  const tmp = `${stateFile}.tmp`;
  await writeFile(tmp, stringify({ version: 1, apps: appsData }), "utf8");
  await rename(tmp, stateFile);
}
