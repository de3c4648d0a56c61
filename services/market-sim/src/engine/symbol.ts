import { InvalidTimeOrderError } from './errors.js';
import type { PriceGenerator, Sample, SymbolId, Tick, Timestamp } from './types.js';

/**
 * One tracked instrument. The construction sample is state only: it is never
 * emitted, so the first `advance` may land on the construction instant itself.
 */
export class MarketSymbol {
  private last: Sample;
  private advanced = false;

  constructor(
    readonly id: SymbolId,
    startTimestamp: Timestamp,
    readonly volatility: number,
    private readonly generator: PriceGenerator,
  ) {
    this.last = {
      timestamp: startTimestamp,
      price: generator.initialPrice(),
      volume: 0,
      cumulativeVolume: 0,
    };
  }

  get lastSample(): Readonly<Sample> {
    return this.snapshot();
  }

  snapshot(): Readonly<Sample> {
    return Object.freeze({ ...this.last });
  }

  advance(toTimestamp: Timestamp): Tick {
    const inOrder = this.advanced
      ? toTimestamp > this.last.timestamp
      : toTimestamp >= this.last.timestamp;
    if (!inOrder) {
      throw new InvalidTimeOrderError(this.id, this.last.timestamp, toTimestamp);
    }

    const { price, volume } = this.generator.next(this.last.price);
    this.last = {
      timestamp: toTimestamp,
      price,
      volume,
      cumulativeVolume: this.last.cumulativeVolume + volume,
    };
    this.advanced = true;

    return Object.freeze({ symbolId: this.id, ...this.last });
  }
}
