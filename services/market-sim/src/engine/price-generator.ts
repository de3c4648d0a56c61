import type { PriceGenerator, PriceSample } from './types.js';

export type PriceModelOptions = {
  seed: number;
  volatility: number;     // per-step sigma of the log return
  basePrice?: number;
};

const MIN_PRICE = 0.01;

// Mulberry32: small, fast and good enough for synthetic quotes.
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Stable 32-bit FNV-1a hash, used to derive a per-symbol seed. */
export function hashSeed(seed: number, key: string): number {
  let h = (0x811c9dc5 ^ seed) >>> 0;
  for (let i = 0; i < key.length; i++) {
    h ^= key.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

function roundCents(v: number) {
  return Math.round(v * 100) / 100;
}

/**
 * Geometric random walk with Box-Muller noise.
 * Every call to `next` consumes exactly one step of the generator's stream.
 */
export class RandomWalkGenerator implements PriceGenerator {
  private readonly rand: () => number;

  constructor(private readonly opts: PriceModelOptions) {
    this.rand = mulberry32(opts.seed);
  }

  initialPrice(): number {
    if (this.opts.basePrice !== undefined) return roundCents(this.opts.basePrice);
    return roundCents(20 + this.rand() * 480);
  }

  next(previousPrice: number): PriceSample {
    const u = 1 - this.rand(); // (0, 1]
    const v = this.rand();
    const z = Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    const price = Math.max(MIN_PRICE, roundCents(previousPrice * Math.exp(this.opts.volatility * z)));
    const volume = 1 + Math.floor(this.rand() * 1000);
    return { price, volume };
  }
}
