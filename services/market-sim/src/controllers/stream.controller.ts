import type { Request, Response } from 'express';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { streamsActive } from '../metrics/metrics.js';
import { openMarket, parseStreamRequest } from '../services/stream.service.js';
import { pipeTicks, writeEvent, writePing } from '../sse/stream.js';

// GET /stream/ticks?symbols=AAPL,MSFT&start=2024-01-01T00:00:00Z
export async function streamTicksCtrl(req: Request, res: Response) {
  const request = parseStreamRequest(req.query, Date.now());
  const log = logger.child({ rid: res.locals.rid, symbols: request.symbolIds });
  const market = openMarket(request, { logger: log });

  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache, no-transform');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();

  const ac = new AbortController();
  const cancel = () => ac.abort();
  res.on('close', cancel);
  const keepalive = setInterval(() => writePing(res, Date.now()), config.sse.keepaliveMs);
  streamsActive.inc();

  writeEvent(res, 'ready', {
    symbols: request.symbolIds,
    start: request.start ?? market.createdAt,
  });

  try {
    const sent = await pipeTicks(market.produce(ac.signal), res, ac.signal);
    log.info({ sent }, 'stream closed');
  } catch (err) {
    log.error({ err }, 'stream failed');
    if (!res.writableEnded) {
      const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : 'INTERNAL_ERROR';
      writeEvent(res, 'error', { code, message: err instanceof Error ? err.message : 'stream failed' });
    }
  } finally {
    clearInterval(keepalive);
    streamsActive.dec();
    res.removeListener('close', cancel);
    ac.abort();
    if (!res.writableEnded) res.end();
  }
}
