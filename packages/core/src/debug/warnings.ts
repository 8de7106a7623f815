/**
 * packages/core/src/debug/warnings.ts — Deduplicated dev-mode warnings.
 *
 * Degenerate inputs are valid layouts, so they are never thrown. In dev mode
 * each distinct issue is reported once per sink through `warn`.
 */

export type WarnFn = (message: string) => void;

export type WarningChannel = "cascade" | "layout";

export type WarningOptions = Readonly<{
  devMode?: boolean;
  warn?: WarnFn;
}>;

export type DevWarnings = Readonly<{
  enabled: boolean;
  /** Report `detail` once for `key` on `channel`. No-op outside dev mode. */
  report(channel: WarningChannel, key: string, detail: string): void;
}>;

function consoleWarn(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function createDevWarnings(opts: WarningOptions = {}): DevWarnings {
  const enabled = opts.devMode === true;
  const warn = opts.warn ?? consoleWarn;
  const seen = new Set<string>();
  return Object.freeze({
    enabled,
    report(channel: WarningChannel, key: string, detail: string): void {
      if (!enabled) return;
      const dedupeKey = `${channel}:${key}`;
      if (seen.has(dedupeKey)) return;
      seen.add(dedupeKey);
      warn(`[tessera][${channel}] ${detail}`);
    },
  });
}

export const SILENT_WARNINGS: DevWarnings = createDevWarnings();
