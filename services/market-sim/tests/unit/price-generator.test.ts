import { describe, it, expect } from 'vitest';
import { RandomWalkGenerator, hashSeed, mulberry32 } from '../../src/engine/price-generator.js';

describe('price-generator', () => {
  it('mulberry32 is deterministic per seed and stays in [0, 1)', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const c = mulberry32(43);
    const xs = Array.from({ length: 20 }, () => a());
    const ys = Array.from({ length: 20 }, () => b());
    expect(xs).toEqual(ys);
    expect(Array.from({ length: 20 }, () => c())).not.toEqual(xs);
    for (const x of xs) {
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('hashSeed separates symbols under the same market seed', () => {
    expect(hashSeed(7, 'AAPL')).toBe(hashSeed(7, 'AAPL'));
    expect(hashSeed(7, 'AAPL')).not.toBe(hashSeed(7, 'MSFT'));
    expect(hashSeed(7, 'AAPL')).not.toBe(hashSeed(8, 'AAPL'));
  });

  it('uses the configured base price, rounded to cents', () => {
    const g = new RandomWalkGenerator({ seed: 1, volatility: 0.001, basePrice: 187.456 });
    expect(g.initialPrice()).toBe(187.46);
  });

  it('draws an initial price between 20 and 500 without a base price', () => {
    for (let seed = 0; seed < 50; seed++) {
      const p = new RandomWalkGenerator({ seed, volatility: 0.001 }).initialPrice();
      expect(p).toBeGreaterThanOrEqual(20);
      expect(p).toBeLessThanOrEqual(500);
    }
  });

  it('same seed replays the same path', () => {
    const run = () => {
      const g = new RandomWalkGenerator({ seed: 99, volatility: 0.01, basePrice: 100 });
      let p = g.initialPrice();
      const out: Array<{ price: number; volume: number }> = [];
      for (let i = 0; i < 10; i++) {
        const s = g.next(p);
        out.push(s);
        p = s.price;
      }
      return out;
    };
    expect(run()).toEqual(run());
  });

  it('produces positive cent prices and whole positive volumes', () => {
    const g = new RandomWalkGenerator({ seed: 5, volatility: 0.5, basePrice: 0.02 });
    let p = g.initialPrice();
    for (let i = 0; i < 200; i++) {
      const { price, volume } = g.next(p);
      expect(price).toBeGreaterThanOrEqual(0.01);
      expect(Math.round(price * 100) / 100).toBe(price);
      expect(Number.isInteger(volume)).toBe(true);
      expect(volume).toBeGreaterThanOrEqual(1);
      expect(volume).toBeLessThanOrEqual(1000);
      p = price;
    }
  });

  it('zero volatility keeps the price flat', () => {
    const g = new RandomWalkGenerator({ seed: 3, volatility: 0, basePrice: 50 });
    expect(g.next(50).price).toBe(50);
    expect(g.next(50).price).toBe(50);
  });
});
