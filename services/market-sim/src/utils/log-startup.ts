import { logger } from '../logger.js';
import { config } from '../config.js';

const ROUTES: Array<{ method: string; path: string }> = [
  // ops
  { method: 'GET', path: '/health/liveness' },
  { method: 'GET', path: '/health/readiness' },
  { method: 'GET', path: '/ops/metrics' },
  // stream
  { method: 'GET', path: '/stream/ticks?symbols=AAPL,MSFT' },
];

export function logStartupBanner() {
  logger.info({
    env: config.env,
    port: config.port,
    apiPrefix: config.apiPrefix || '/',
    tickIntervalMs: config.market.tickIntervalMs,
    seed: config.market.seed ?? 'auto',
  }, 'service startup');

  logger.info('available routes:');
  for (const r of ROUTES) {
    logger.info(`${r.method.padEnd(6)} ${config.apiPrefix}${r.path}`);
  }
}
