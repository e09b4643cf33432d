import { createHash } from "node:crypto";
import type { RenderedArtifact } from "./render.js";
import type { AppState } from "./state.js";

export type Action = "deploy" | "restart" | "start" | "stop" | "none";

/**
 * Digest of what would be deployed for an application: the rendered
 * fragments in order, the executor environment (key order does not matter),
 * and the enabled flag, salted with the application name.
 */
export function computeFingerprint(name: string, artifact: RenderedArtifact, enabled: boolean): string {
  const environment = Object.entries(artifact.environment).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0,
  );
  const canonical = JSON.stringify({
    name,
    fragments: artifact.fragments.map((f) => [f.source, f.content]),
    environment,
    enabled,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

export interface DetectInput {
  enabled: boolean;
  fingerprint: string | null; // null when the app was not rendered (disabled)
  previous: AppState | undefined;
  force?: boolean;
}

/**
 * Decide what the stack controller must do for one application.
 *
 * | enabled | previous entry | fingerprint        | action  |
 * |---------|----------------|--------------------|---------|
 * | yes     | none           |                    | deploy  |
 * | yes     | enabled        | equal, not forced  | none    |
 * | yes     | enabled        | different / forced | restart |
 * | yes     | disabled       | equal              | start   |
 * | yes     | disabled       | different          | restart |
 * | no      | enabled        |                    | stop    |
 * | no      | none/disabled  |                    | none    |
 */
export function detectAction({ enabled, fingerprint, previous, force = false }: DetectInput): Action {
  if (!enabled) {
    return previous?.enabled ? "stop" : "none";
  }
  if (!previous) return "deploy";

  const unchanged = fingerprint !== null && fingerprint === previous.fingerprint;
  if (!previous.enabled) {
    return unchanged && !force ? "start" : "restart";
  }
  return unchanged && !force ? "none" : "restart";
}
