let debugEnabled = process.env.DOCKHAND_DEBUG === "1";

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

/** Progress line on stdout. */
export function info(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function warn(message: string): void {
  process.stderr.write(`dockhand: warning: ${message}\n`);
}

export function error(message: string): void {
  process.stderr.write(`dockhand: ${message}\n`);
}

/** Only printed with --debug / DOCKHAND_DEBUG=1. */
export function debug(message: string): void {
  if (!debugEnabled) return;
  process.stdout.write(`${message.endsWith("\n") ? message.slice(0, -1) : message}\n`);
}
