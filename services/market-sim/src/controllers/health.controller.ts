import type { Request, Response } from 'express';

export function liveness(_req: Request, res: Response) {
  res.json({ ok: true });
}

// no external dependencies to probe: the generator is purely in-process
export function readiness(_req: Request, res: Response) {
  res.json({ status: 'ready', checks: { self: 'ok' } });
}
