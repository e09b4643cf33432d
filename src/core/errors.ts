export type FailureKind = "transport" | "configuration" | "executor" | "directory";

/**
 * Base class for every failure the engine reports against an application
 * or an end-of-run phase. `kind` is what the run summary prints.
 */
export class DockhandError extends Error {
  readonly kind: FailureKind;
  readonly app: string | null;

  constructor(kind: FailureKind, message: string, app: string | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = "DockhandError";
    this.kind = kind;
    this.app = app;
  }
}

/** Network or git failure while syncing a checkout, after retries ran out. */
export class TransportError extends DockhandError {
  constructor(message: string, app: string | null = null, options?: ErrorOptions) {
    super("transport", message, app, options);
    this.name = "TransportError";
  }
}

/** Unreadable or malformed variable file, missing compose fragment. */
export class ConfigurationError extends DockhandError {
  constructor(message: string, app: string | null = null, options?: ErrorOptions) {
    super("configuration", message, app, options);
    this.name = "ConfigurationError";
  }
}

/** Non-zero exit from the container runtime. */
export class ExecutorError extends DockhandError {
  constructor(message: string, app: string | null = null, options?: ErrorOptions) {
    super("executor", message, app, options);
    this.name = "ExecutorError";
  }
}

/** Archive move or directory removal failed. */
export class DirectoryError extends DockhandError {
  constructor(message: string, app: string | null = null, options?: ErrorOptions) {
    super("directory", message, app, options);
    this.name = "DirectoryError";
  }
}

/**
 * The manifest itself is invalid. Raised at load time, before any
 * application is touched, so it aborts the run.
 */
export class ManifestError extends DockhandError {
  readonly issues: string[];

  constructor(manifestPath: string, issues: string[]) {
    super("configuration", `Invalid manifest ${manifestPath}:\n  ${issues.join("\n  ")}`);
    this.name = "ManifestError";
    this.issues = issues;
  }
}

/**
 * Pull a readable message out of anything thrown. ExecaErrors carry the
 * command's combined output in `stderr`/`stdout`; prefer the short
 * message plus the last stderr line over the full dump.
 */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if ("shortMessage" in err && typeof err.shortMessage === "string") {
    const stderr = "stderr" in err && typeof err.stderr === "string" ? err.stderr : "";
    const lastLine = stderr
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l.length > 0)
      .pop();
    return lastLine ? `${err.shortMessage}: ${lastLine}` : err.shortMessage;
  }
  return err.message;
}
