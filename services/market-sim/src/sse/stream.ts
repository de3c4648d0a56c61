import type { Tick } from '../engine/types.js';
import { toTickMessage } from '../utils/tick-message.js';

/** The part of an http.ServerResponse the SSE writer needs. */
export interface SseSink {
  readonly writableEnded: boolean;
  write(chunk: string): boolean;
  once(event: 'drain' | 'close', listener: () => void): unknown;
  removeListener(event: 'drain' | 'close', listener: () => void): unknown;
}

export function writeEvent(sink: SseSink, event: string, data: unknown): boolean {
  return sink.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

export function writeTick(sink: SseSink, tick: Tick): boolean {
  return sink.write(`data: ${JSON.stringify(toTickMessage(tick))}\n\n`);
}

export function writePing(sink: SseSink, at: number): boolean {
  // comment lines are valid SSE keepalives
  return sink.write(`: ping ${at}\n\n`);
}

function drained(sink: SseSink, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      sink.removeListener('drain', done);
      sink.removeListener('close', done);
      signal.removeEventListener('abort', done);
      resolve();
    };
    sink.once('drain', done);
    sink.once('close', done);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Writes every tick as one SSE `data:` event until the sequence ends, the
 * signal aborts or the sink is closed. Waits for `drain` whenever the socket
 * buffer is full. Producer faults propagate to the caller.
 */
export async function pipeTicks(
  ticks: AsyncIterable<Tick>,
  sink: SseSink,
  signal: AbortSignal,
): Promise<number> {
  let sent = 0;
  for await (const tick of ticks) {
    if (signal.aborted || sink.writableEnded) break;
    const ok = writeTick(sink, tick);
    sent++;
    if (!ok) await drained(sink, signal);
  }
  return sent;
}
