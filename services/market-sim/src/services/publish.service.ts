import type { Logger } from 'pino';
import type { Redis } from 'ioredis';
import type { Market } from '../engine/market.js';
import { toTickMessage } from '../utils/tick-message.js';

export interface TickSink {
  publish(channel: string, message: string): Promise<unknown>;
}

export function redisSink(client: Redis): TickSink {
  return { publish: (channel, message) => client.publish(channel, message) };
}

/**
 * Drains `market` into a pub/sub channel, one message per tick. Each publish
 * is awaited before the next tick is pulled, so a slow broker slows the market.
 */
export async function publishMarket(
  market: Market,
  sink: TickSink,
  channel: string,
  signal: AbortSignal,
  log?: Logger,
): Promise<number> {
  let published = 0;
  for await (const tick of market.produce(signal)) {
    await sink.publish(channel, JSON.stringify(toTickMessage(tick)));
    published++;
    if (published % 1000 === 0) log?.debug({ published, ts: tick.timestamp }, 'ticks published');
  }
  return published;
}
