import { describe, it, expect, vi } from 'vitest';
import { MarketClock } from '../../src/engine/clock.js';
import { T0 } from './fake-time.js';

describe('MarketClock', () => {
  it('backfills whole steps from the origin up to the target, then goes live', () => {
    const now = vi.fn(() => T0);
    const clock = new MarketClock(T0 - 3000, now, 1000);

    expect(clock.begin()).toBe('backfill');
    expect(clock.catchUpTarget).toBe(T0);
    expect(clock.step()).toEqual({ mode: 'backfill', at: T0 - 3000 });
    expect(clock.step()).toEqual({ mode: 'backfill', at: T0 - 2000 });
    expect(clock.step()).toEqual({ mode: 'backfill', at: T0 - 1000 });
    expect(clock.step()).toEqual({ mode: 'live', at: T0 });
    expect(clock.mode).toBe('live');
    expect(clock.catchUpTarget).toBeUndefined();
  });

  it('samples the catch-up target once for the whole backfill phase', () => {
    let t = T0;
    const now = vi.fn(() => (t += 250)); // wall clock keeps moving while we chase it
    const clock = new MarketClock(T0 - 5000, now, 1000);

    clock.begin();
    const target = clock.catchUpTarget;
    expect(target).toBe(T0 + 250);

    const backfill: number[] = [];
    for (let step = clock.step(); step?.mode === 'backfill'; step = clock.step()) {
      backfill.push(step.at);
    }
    // [T0-5000, T0+250) in whole seconds from the origin
    expect(backfill).toEqual([T0 - 5000, T0 - 4000, T0 - 3000, T0 - 2000, T0 - 1000, T0]);
    // one sample for the target, one for the first live step
    expect(now).toHaveBeenCalledTimes(2);
  });

  it('does not land a partial step past the origin grid', () => {
    const clock = new MarketClock(T0 - 2500, () => T0, 1000);
    const ats = [clock.step(), clock.step(), clock.step(), clock.step()];
    expect(ats).toEqual([
      { mode: 'backfill', at: T0 - 2500 },
      { mode: 'backfill', at: T0 - 1500 },
      { mode: 'backfill', at: T0 - 500 },
      { mode: 'live', at: T0 },
    ]);
  });

  it('origin equal to now goes straight to live', () => {
    const clock = new MarketClock(T0, () => T0, 1000);
    expect(clock.begin()).toBe('live');
    expect(clock.step()).toEqual({ mode: 'live', at: T0 });
  });

  it('origin in the future goes straight to live without waiting', () => {
    const clock = new MarketClock(T0 + 60_000, () => T0, 1000);
    expect(clock.begin()).toBe('live');
    expect(clock.step()).toEqual({ mode: 'live', at: T0 });
  });

  it('no origin means live from the first step', () => {
    const clock = new MarketClock(undefined, () => T0, 1000);
    expect(clock.mode).toBe('pending');
    expect(clock.step()).toEqual({ mode: 'live', at: T0 });
  });

  it('live steps resample the wall clock every time', () => {
    let t = T0;
    const clock = new MarketClock(undefined, () => t, 1000);
    expect(clock.step()?.at).toBe(T0);
    t = T0 + 1003;
    expect(clock.step()?.at).toBe(T0 + 1003);
    t = T0 + 2010;
    expect(clock.step()?.at).toBe(T0 + 2010);
  });

  it('skips a live sample that is not after the previous step', () => {
    let t = T0;
    const clock = new MarketClock(undefined, () => t, 1000);
    expect(clock.step()?.at).toBe(T0);
    expect(clock.step()).toBeUndefined();   // clock did not move
    t = T0 - 500;
    expect(clock.step()).toBeUndefined();   // clock stepped back
    t = T0 + 1;
    expect(clock.step()).toEqual({ mode: 'live', at: T0 + 1 });
  });

  it('first live step after backfill is strictly after the last backfill step', () => {
    // target lands exactly on the grid: the last backfill step is one step before it
    const clock = new MarketClock(T0 - 2000, () => T0, 1000);
    expect(clock.step()?.at).toBe(T0 - 2000);
    expect(clock.step()?.at).toBe(T0 - 1000);
    const live = clock.step();
    expect(live).toEqual({ mode: 'live', at: T0 });
  });

  it('begin is idempotent', () => {
    const now = vi.fn(() => T0);
    const clock = new MarketClock(T0 - 1000, now, 1000);
    clock.begin();
    clock.begin();
    expect(now).toHaveBeenCalledTimes(1);
    expect(clock.catchUpTarget).toBe(T0);
  });

  it('rejects a non-positive step', () => {
    expect(() => new MarketClock(T0, () => T0, 0)).toThrow(RangeError);
  });
});
