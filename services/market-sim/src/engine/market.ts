import type { Logger } from 'pino';
import { TickChannel } from './channel.js';
import { MarketClock } from './clock.js';
import { MarketConsumedError } from './errors.js';
import { RandomWalkGenerator, hashSeed } from './price-generator.js';
import { MarketSymbol } from './symbol.js';
import type { Clock, MarketStep, PriceGenerator, Sleep, SymbolId, Tick, Timestamp } from './types.js';
import { sleep as defaultSleep, yieldToEventLoop } from '../utils/sleep.js';

export const DEFAULT_VOLATILITY = 0.001;
const BACKFILL_YIELD_EVERY = 64;

export type PriceModelConfig = {
  seed: number;
  basePrices?: Readonly<Record<SymbolId, number>>;
  volatility?: Readonly<Record<SymbolId, number>>;
};

export type MarketOptions = {
  /** Start instant; omitted means "now", captured once at construction. */
  start?: Timestamp;
  now?: Clock;
  sleep?: Sleep;
  /** Backfill step and live cadence. */
  stepMs?: number;
  bufferSize?: number;
  prices?: PriceModelConfig;
  generatorFor?: (symbolId: SymbolId, volatility: number) => PriceGenerator;
  onStep?: (step: MarketStep) => void;
  /** Called once a tick has been accepted by the channel. */
  onTick?: (tick: Tick, step: MarketStep) => void;
  logger?: Logger;
};

/**
 * Owns the symbols and the clock of one stream. `produce()` starts the single
 * producer task; the returned iterator is the only way ticks leave the market.
 */
export class Market {
  readonly symbols: readonly MarketSymbol[];
  readonly clock: MarketClock;
  readonly createdAt: Timestamp;

  private readonly now: Clock;
  private readonly sleep: Sleep;
  private readonly stepMs: number;
  private readonly bufferSize: number;
  private readonly onStep?: (step: MarketStep) => void;
  private readonly onTick?: (tick: Tick, step: MarketStep) => void;
  private readonly log?: Logger;
  private started = false;

  constructor(symbolIds: readonly SymbolId[], opts: MarketOptions = {}) {
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? defaultSleep;
    this.stepMs = opts.stepMs ?? 1000;
    this.bufferSize = opts.bufferSize ?? 64;
    this.onStep = opts.onStep;
    this.onTick = opts.onTick;
    this.log = opts.logger;

    this.createdAt = this.now();
    // backfill is decided against construction time; a future start is not waited for
    const backfillFrom = opts.start !== undefined && opts.start < this.createdAt ? opts.start : undefined;
    const origin = backfillFrom ?? this.createdAt;
    this.clock = new MarketClock(backfillFrom, this.now, this.stepMs);

    const prices = opts.prices ?? { seed: this.createdAt };
    this.symbols = symbolIds.map((id) => {
      const volatility = prices.volatility?.[id] ?? DEFAULT_VOLATILITY;
      const generator = opts.generatorFor?.(id, volatility) ?? new RandomWalkGenerator({
        seed: hashSeed(prices.seed, id),
        volatility,
        basePrice: prices.basePrices?.[id],
      });
      return new MarketSymbol(id, origin, volatility, generator);
    });
  }

  produce(signal?: AbortSignal): AsyncIterableIterator<Tick> {
    if (this.started) throw new MarketConsumedError();
    this.started = true;

    const ac = new AbortController();
    const channel = new TickChannel<Tick>(this.bufferSize, () => ac.abort());
    // cancellation closes the sequence at once; buffered ticks are not delivered
    const cancel = () => {
      channel.drop();
      ac.abort();
    };
    if (signal?.aborted) cancel();
    else signal?.addEventListener('abort', cancel, { once: true });

    void this.run(channel, ac.signal).then(
      () => channel.close(),
      (err: unknown) => {
        this.log?.error({ err }, 'market producer failed');
        channel.fail(err);
      },
    ).finally(() => {
      signal?.removeEventListener('abort', cancel);
      ac.abort();
    });

    return channel;
  }

  private async run(channel: TickChannel<Tick>, signal: AbortSignal): Promise<void> {
    const mode = this.clock.begin();
    this.log?.info(
      { symbols: this.symbols.map((s) => s.id), mode, catchUpTarget: this.clock.catchUpTarget },
      'market started',
    );

    let backfillSteps = 0;
    while (!signal.aborted) {
      const step = this.clock.step();

      if (step?.mode === 'backfill') {
        if (!(await this.emit(step, channel, signal))) return;
        if (++backfillSteps % BACKFILL_YIELD_EVERY === 0) await yieldToEventLoop();
        continue;
      }

      if (step && backfillSteps > 0) {
        this.log?.info({ backfillSteps, at: step.at }, 'market caught up; switching to live');
        backfillSteps = 0;
      }
      if (step && !(await this.emit(step, channel, signal))) return;
      if (!(await this.sleep(this.stepMs, signal))) return;
    }
  }

  private async emit(step: MarketStep, channel: TickChannel<Tick>, signal: AbortSignal) {
    this.onStep?.(step);
    for (const symbol of this.symbols) {
      if (signal.aborted) return false;
      const tick = symbol.advance(step.at);
      if (!(await channel.send(tick, signal))) return false;
      this.onTick?.(tick, step);
    }
    return !signal.aborted;
  }
}
