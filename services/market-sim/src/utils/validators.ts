import { z } from 'zod';
import { toArray } from '../config.js';

export const SymbolId = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z0-9][A-Z0-9.-]{0,14}$/, 'invalid symbol');

export const StreamQuery = z.object({
  symbols: z
    .string({ required_error: 'required' })
    .transform((csv) => toArray(csv))
    .pipe(z.array(SymbolId).min(1, 'at least one symbol is required'))
    .refine((ids) => new Set(ids).size === ids.length, 'must be unique'),
  start: z.string().trim().min(1).optional(),
});

export type StreamQuery = z.infer<typeof StreamQuery>;

/** Epoch milliseconds (all digits) or an ISO-8601 instant; NaN when neither. */
export function parseInstant(raw: string): number {
  if (/^\d+$/.test(raw)) return Number(raw);
  return Date.parse(raw);
}
