export type SymbolId = string;

/** Epoch milliseconds. */
export type Timestamp = number;

export interface Sample {
  timestamp: Timestamp;
  price: number;
  volume: number;
  cumulativeVolume: number;
}

export type Tick = Readonly<Sample & { symbolId: SymbolId }>;

export type MarketMode = 'backfill' | 'live';

export type MarketStep = { mode: MarketMode; at: Timestamp };

export type PriceSample = { price: number; volume: number };

export interface PriceGenerator {
  initialPrice(): number;
  next(previousPrice: number): PriceSample;
}

export type Clock = () => Timestamp;

/** Resolves true once the delay elapsed, false when the signal aborted first. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<boolean>;
