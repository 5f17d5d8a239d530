type ConsoleLike = { warn?: (msg: string) => void };

function isDevMode(): boolean {
  const env =
    (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
    "development";
  return env !== "production";
}

/** Emit a warning through `console.warn` unless NODE_ENV is "production". */
export function warnDev(message: string): void {
  if (!isDevMode()) return;
  const c = (globalThis as { console?: ConsoleLike }).console;
  c?.warn?.(message);
}

const warnedKeys = new Set<string>();

/** Like {@link warnDev}, but at most once per `key` until {@link resetDevWarnings}. */
export function warnDevOnce(key: string, message: string): void {
  if (warnedKeys.has(key)) return;
  warnedKeys.add(key);
  warnDev(message);
}

export function resetDevWarnings(): void {
  warnedKeys.clear();
}
