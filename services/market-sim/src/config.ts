// services/market-sim/src/config.ts
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3300),
  API_PREFIX: z.string().default('/'),
  CORS_ALLOW_ORIGINS: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),

  // engine
  TICK_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  STREAM_BUFFER: z.coerce.number().int().positive().default(64),
  PRICE_SEED: z.union([z.literal('auto'), z.coerce.number().int()]).default('auto'),
  PRICE_BASE: z.string().optional(),
  VOLATILITY: z.string().optional(),

  // sse transport
  SSE_KEEPALIVE_MS: z.coerce.number().int().positive().default(15000),
  MAX_SYMBOLS: z.coerce.number().int().positive().default(50),
  MAX_BACKFILL_HOURS: z.coerce.number().positive().default(168),

  // redis publisher
  REDIS_URL: z.string().default('redis://127.0.0.1:6379'),
  PUBSUB_CHANNEL: z.string().default('ch:ticks'),
  SYMBOLS: z.string().default('AAPL,MSFT,GOOG'),
  START: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseMap(input: string | undefined): Record<string, number> {
  const out: Record<string, number> = {};
  if (!input) return out;
  for (const kv of input.split(',')) {
    const [k, v] = kv.split(':');
    if (!k || v === undefined) continue;
    const num = Number(v);
    if (!Number.isFinite(num)) continue;
    out[k.trim().toUpperCase()] = num;
  }
  return out;
}

export function toArray(csv?: string): string[] {
  return (csv ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseCorsOrigins(value?: string) {
  if (!value) return undefined;
  if (value.trim() === '*') return '*' as const;
  const origins = toArray(value);
  return origins.length ? origins : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv) {
  const e = EnvSchema.parse(env);
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    apiPrefix: e.API_PREFIX === '/' ? '' : e.API_PREFIX.replace(/\/$/, ''),
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY === '1',
    cors: {
      origins: parseCorsOrigins(e.CORS_ALLOW_ORIGINS),
    },
    market: {
      tickIntervalMs: e.TICK_INTERVAL_MS,
      bufferSize: e.STREAM_BUFFER,
      seed: e.PRICE_SEED === 'auto' ? undefined : e.PRICE_SEED,
      basePrices: parseMap(e.PRICE_BASE),
      volatility: parseMap(e.VOLATILITY),
    },
    sse: {
      keepaliveMs: e.SSE_KEEPALIVE_MS,
      maxSymbols: e.MAX_SYMBOLS,
      maxBackfillMs: Math.round(e.MAX_BACKFILL_HOURS * 3600 * 1000),
    },
    publisher: {
      redisUrl: e.REDIS_URL,
      channel: e.PUBSUB_CHANNEL,
      symbols: toArray(e.SYMBOLS).map((s) => s.toUpperCase()),
      start: e.START,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig(process.env);
