import { config } from './config.js';
import { logger } from './logger.js';
import { getPublisher, shutdownRedis } from './redis/index.js';
import { openMarket } from './services/stream.service.js';
import { publishMarket, redisSink } from './services/publish.service.js';
import { parseInstant } from './utils/validators.js';

const ac = new AbortController();

async function main() {
  const { symbols, start: rawStart, channel, redisUrl } = config.publisher;
  const start = rawStart === undefined ? undefined : parseInstant(rawStart);
  if (start !== undefined && !Number.isFinite(start)) {
    throw new Error(`START must be ISO-8601 or epoch milliseconds, got "${rawStart}"`);
  }

  const market = openMarket({ symbolIds: symbols, start }, { logger });
  logger.info({ symbols, start: start ?? market.createdAt, channel }, 'publisher starting');

  const published = await publishMarket(market, redisSink(getPublisher(redisUrl)), channel, ac.signal, logger);
  logger.info({ published }, 'publisher stopped');
}

function shutdown(sig: string) {
  logger.warn({ sig }, 'publisher shutting down');
  ac.abort();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

main()
  .then(() => shutdownRedis())
  .then(() => process.exit(0))
  .catch(async (e) => {
    logger.error({ err: e }, 'publisher fatal');
    await shutdownRedis();
    process.exit(1);
  });
