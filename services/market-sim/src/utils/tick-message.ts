import type { Tick } from '../engine/types.js';

export type TickMessage = {
  kind: 'tick';
  symbol: string;
  ts: number;        // epoch ms
  price: number;
  volume: number;
  cumulativeVolume: number;
};

export function toTickMessage(t: Tick): TickMessage {
  return {
    kind: 'tick',
    symbol: t.symbolId,
    ts: t.timestamp,
    price: t.price,
    volume: t.volume,
    cumulativeVolume: t.cumulativeVolume,
  };
}
