import type { SymbolId, Timestamp } from './types.js';

export class InvalidTimeOrderError extends Error {
  readonly code = 'INVALID_TIME_ORDER' as const;

  constructor(
    readonly symbolId: SymbolId,
    readonly lastTimestamp: Timestamp,
    readonly requestedTimestamp: Timestamp,
  ) {
    super(
      `advance(${requestedTimestamp}) on ${symbolId} is not after last sample at ${lastTimestamp}`,
    );
    this.name = 'InvalidTimeOrderError';
  }
}

export class MarketConsumedError extends Error {
  readonly code = 'MARKET_CONSUMED' as const;

  constructor() {
    super('market already produced its tick sequence; construct a new Market');
    this.name = 'MarketConsumedError';
  }
}
