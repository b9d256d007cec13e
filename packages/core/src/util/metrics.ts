import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  DECODE: 'decodeMs',
  SEARCH: 'searchMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export interface MetricsSnapshot {
  decodeMs: number;
  searchMs: number;
  /** Sub-problems solved (memo misses). */
  nodesExpanded: number;
  /** Sub-problems answered from the memo. */
  cacheHits: number;
  /** Memo size when the search finished. */
  cacheEntries: number;
  startStatesTried: number;
  /** Deepest synthesized-state tag created on any branch. */
  synthesizedPeak: number;
}

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  decodeMs: 0,
  searchMs: 0,
  nodesExpanded: 0,
  cacheHits: 0,
  cacheEntries: 0,
  startStatesTried: 0,
  synthesizedPeak: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      decodeMs: { total: 0 },
      searchMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }
    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }
    const duration = Math.max(0, this.now() - current.startedAt);
    const total = current.total + duration;
    this.snapshot[key] = total;
    this.timers[key] = { total };
  }

  public addNodeExpanded(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.nodesExpanded += 1;
  }

  public addCacheHit(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.cacheHits += 1;
  }

  public addStartStateTried(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.startStatesTried += 1;
  }

  public observeSynthesized(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.synthesizedPeak = Math.max(this.snapshot.synthesizedPeak, count);
  }

  public setCacheEntries(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.cacheEntries = count;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
