import { describe, it, expect } from 'vitest';
import { loadConfig, parseMap, toArray } from '../../src/config.js';

describe('config', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({});
    expect(cfg.env).toBe('development');
    expect(cfg.port).toBe(3300);
    expect(cfg.apiPrefix).toBe('');
    expect(cfg.market).toEqual({
      tickIntervalMs: 1000,
      bufferSize: 64,
      seed: undefined,
      basePrices: {},
      volatility: {},
    });
    expect(cfg.sse).toEqual({ keepaliveMs: 15000, maxSymbols: 50, maxBackfillMs: 604_800_000 });
    expect(cfg.publisher).toEqual({
      redisUrl: 'redis://127.0.0.1:6379',
      channel: 'ch:ticks',
      symbols: ['AAPL', 'MSFT', 'GOOG'],
      start: undefined,
    });
    expect(cfg.cors.origins).toBeUndefined();
  });

  it('reads overrides', () => {
    const cfg = loadConfig({
      PORT: '8081',
      API_PREFIX: '/api/v1/',
      PRICE_SEED: '42',
      PRICE_BASE: 'aapl:190.5,MSFT:410',
      VOLATILITY: 'AAPL:0.002',
      CORS_ALLOW_ORIGINS: 'http://localhost:5173, http://localhost:3000',
      SYMBOLS: 'tsla, nvda',
      START: '2024-01-02T14:30:00Z',
      MAX_BACKFILL_HOURS: '0.5',
    });
    expect(cfg.port).toBe(8081);
    expect(cfg.apiPrefix).toBe('/api/v1');
    expect(cfg.market.seed).toBe(42);
    expect(cfg.market.basePrices).toEqual({ AAPL: 190.5, MSFT: 410 });
    expect(cfg.market.volatility).toEqual({ AAPL: 0.002 });
    expect(cfg.cors.origins).toEqual(['http://localhost:5173', 'http://localhost:3000']);
    expect(cfg.publisher.symbols).toEqual(['TSLA', 'NVDA']);
    expect(cfg.publisher.start).toBe('2024-01-02T14:30:00Z');
    expect(cfg.sse.maxBackfillMs).toBe(1_800_000);
  });

  it('accepts a wildcard CORS origin', () => {
    expect(loadConfig({ CORS_ALLOW_ORIGINS: '*' }).cors.origins).toBe('*');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: '-1' })).toThrow();
    expect(() => loadConfig({ TICK_INTERVAL_MS: '0' })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => loadConfig({ PRICE_SEED: 'random' })).toThrow();
  });

  it('parseMap skips malformed pairs', () => {
    expect(parseMap('AAPL:1.5,bad,MSFT:x, goog : 7')).toEqual({ AAPL: 1.5, GOOG: 7 });
    expect(parseMap(undefined)).toEqual({});
  });

  it('toArray trims and drops blanks', () => {
    expect(toArray(' a, ,b,')).toEqual(['a', 'b']);
    expect(toArray()).toEqual([]);
  });
});
