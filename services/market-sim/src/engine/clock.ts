import type { Clock, MarketMode, MarketStep, Timestamp } from './types.js';

type ClockState =
  | { mode: 'pending' }
  | { mode: 'backfill'; cursor: Timestamp; target: Timestamp }
  | { mode: 'live'; last: Timestamp | undefined };

/**
 * Simulated market time against wall-clock time.
 *
 * `begin()` samples the catch-up target exactly once. While the cursor is
 * strictly behind it, `step()` hands out backfill instants `stepMs` apart; after
 * that the clock is live for good and every step resamples `now()`.
 * Without an origin there is nothing to catch up on and the clock starts live.
 */
export class MarketClock {
  private state: ClockState = { mode: 'pending' };

  constructor(
    private readonly origin: Timestamp | undefined,
    private readonly now: Clock,
    private readonly stepMs = 1000,
  ) {
    if (!(stepMs > 0)) throw new RangeError(`stepMs must be positive, got ${stepMs}`);
  }

  get mode(): MarketMode | 'pending' {
    return this.state.mode;
  }

  /** Catch-up target of the backfill phase; undefined once live or before `begin()`. */
  get catchUpTarget(): Timestamp | undefined {
    return this.state.mode === 'backfill' ? this.state.target : undefined;
  }

  begin(): MarketMode {
    if (this.state.mode !== 'pending') return this.state.mode;
    const target = this.now();
    this.state = this.origin !== undefined && this.origin < target
      ? { mode: 'backfill', cursor: this.origin, target }
      : { mode: 'live', last: undefined };
    return this.state.mode;
  }

  /**
   * Next instant to emit. Returns undefined for a live sample that is not
   * strictly after the previous live step; the caller waits and retries.
   */
  step(): MarketStep | undefined {
    if (this.state.mode === 'pending') this.begin();

    if (this.state.mode === 'backfill') {
      const { cursor, target } = this.state;
      if (cursor < target) {
        this.state = { mode: 'backfill', cursor: cursor + this.stepMs, target };
        return { mode: 'backfill', at: cursor };
      }
      // catch-up reached: the last backfill instant stays the floor for live samples
      this.state = { mode: 'live', last: cursor - this.stepMs };
    }

    if (this.state.mode !== 'live') return undefined;

    const at = this.now();
    if (this.state.last !== undefined && at <= this.state.last) return undefined;
    this.state = { mode: 'live', last: at };
    return { mode: 'live', at };
  }
}
