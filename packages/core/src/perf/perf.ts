/**
 * packages/core/src/perf/perf.ts — Opt-in frame-phase timing.
 *
 * Enabled with TESSERA_PERF=1. When disabled every entry point returns
 * immediately, so call sites need no guards.
 */

/** Pipeline phases that are timed. */
export type PerfPhase = "cascade" | "layout" | "shape";

export const PERF_PHASES: readonly PerfPhase[] = Object.freeze(["cascade", "layout", "shape"]);

export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  max: number;
}>;

export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in PerfPhase]?: PhaseStats }>;
}>;

/** Start timestamp handed back to perfMarkEnd. */
export type PerfToken = number;

/** Reads process.env through globalThis so core stays free of node: imports. */
export const PERF_ENABLED: boolean = (() => {
  const g = globalThis as { process?: { env?: { TESSERA_PERF?: string } } };
  return g.process?.env?.TESSERA_PERF === "1";
})();

const now: () => number =
  typeof globalThis.performance?.now === "function"
    ? () => globalThis.performance.now()
    : () => Date.now();

/** Samples kept per phase; older samples are overwritten. */
const RING_CAP = 512;

type PhaseRing = {
  samples: Float64Array;
  cursor: number;
  count: number;
  sum: number;
  max: number;
};

function percentile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.min(sorted.length - 1, Math.floor(sorted.length * q));
  return sorted[idx] ?? 0;
}

/** Per-phase ring buffers. Exported for tests; production code goes through the perf* functions. */
export class PerfAggregator {
  private readonly rings = new Map<PerfPhase, PhaseRing>();

  record(phase: PerfPhase, durationMs: number): void {
    let ring = this.rings.get(phase);
    if (!ring) {
      ring = { samples: new Float64Array(RING_CAP), cursor: 0, count: 0, sum: 0, max: 0 };
      this.rings.set(phase, ring);
    }
    if (ring.count >= RING_CAP) {
      ring.sum -= ring.samples[ring.cursor] ?? 0;
    }
    ring.samples[ring.cursor] = durationMs;
    ring.sum += durationMs;
    ring.cursor = (ring.cursor + 1) % RING_CAP;
    ring.count = Math.min(ring.count + 1, RING_CAP);
    if (durationMs > ring.max) ring.max = durationMs;
  }

  snapshot(): PerfSnapshot {
    const phases: { [K in PerfPhase]?: PhaseStats } = {};
    for (const phase of PERF_PHASES) {
      const ring = this.rings.get(phase);
      if (!ring || ring.count === 0) continue;
      const sorted = Array.from(ring.samples.subarray(0, ring.count)).sort((a, b) => a - b);
      phases[phase] = Object.freeze({
        count: ring.count,
        avg: ring.sum / ring.count,
        p50: percentile(sorted, 0.5),
        p95: percentile(sorted, 0.95),
        max: ring.max,
      });
    }
    return Object.freeze({ phases: Object.freeze(phases) });
  }

  reset(): void {
    this.rings.clear();
  }
}

let globalAggregator: PerfAggregator | null = null;

function getAggregator(): PerfAggregator {
  if (!globalAggregator) globalAggregator = new PerfAggregator();
  return globalAggregator;
}

export function perfMarkStart(): PerfToken {
  if (!PERF_ENABLED) return 0;
  return now();
}

export function perfMarkEnd(phase: PerfPhase, token: PerfToken): void {
  if (!PERF_ENABLED) return;
  getAggregator().record(phase, now() - token);
}

export function perfSnapshot(): PerfSnapshot {
  if (!PERF_ENABLED) return Object.freeze({ phases: Object.freeze({}) });
  return getAggregator().snapshot();
}

export function perfReset(): void {
  if (!PERF_ENABLED) return;
  getAggregator().reset();
}
