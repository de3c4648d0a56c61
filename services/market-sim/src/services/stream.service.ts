import type { Logger } from 'pino';
import { config } from '../config.js';
import { Market } from '../engine/market.js';
import type { Clock, Sleep, SymbolId, Timestamp } from '../engine/types.js';
import { marketSteps, ticksEmitted } from '../metrics/metrics.js';
import { httpError } from '../utils/http-error.js';
import { StreamQuery, parseInstant } from '../utils/validators.js';

export type StreamRequest = { symbolIds: SymbolId[]; start?: Timestamp };

export type StreamLimits = { maxSymbols: number; maxBackfillMs: number };

export function parseStreamRequest(
  query: unknown,
  receivedAt: Timestamp,
  limits: StreamLimits = config.sse,
): StreamRequest {
  const parsed = StreamQuery.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    throw httpError(400, 'BAD_REQUEST', `${where}${issue?.message ?? 'invalid query'}`);
  }

  const { symbols, start: rawStart } = parsed.data;
  if (symbols.length > limits.maxSymbols) {
    throw httpError(400, 'BAD_REQUEST', `symbols: at most ${limits.maxSymbols} per stream`);
  }
  if (rawStart === undefined) return { symbolIds: symbols };

  const start = parseInstant(rawStart);
  if (!Number.isFinite(start)) {
    throw httpError(400, 'BAD_REQUEST', 'start: expected ISO-8601 or epoch milliseconds');
  }
  if (receivedAt - start > limits.maxBackfillMs) {
    throw httpError(400, 'BAD_REQUEST', `start: backfill limited to ${limits.maxBackfillMs} ms`);
  }
  return { symbolIds: symbols, start };
}

export type MarketDeps = { now?: Clock; sleep?: Sleep; logger?: Logger };

/** Builds the market for one stream; construct it on request receipt so a missing start means "now". */
export function openMarket(req: StreamRequest, deps: MarketDeps = {}): Market {
  const { market: m } = config;
  return new Market(req.symbolIds, {
    start: req.start,
    now: deps.now,
    sleep: deps.sleep,
    logger: deps.logger,
    stepMs: m.tickIntervalMs,
    bufferSize: m.bufferSize,
    prices: {
      seed: m.seed ?? Date.now(),
      basePrices: m.basePrices,
      volatility: m.volatility,
    },
    onStep: (step) => marketSteps.inc({ mode: step.mode }),
    onTick: (_tick, step) => ticksEmitted.inc({ mode: step.mode }),
  });
}
