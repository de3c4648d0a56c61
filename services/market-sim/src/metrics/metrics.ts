import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const httpReqDuration = new Histogram({
  name: 'http_request_duration_ms',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'code'],
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  registers: [registry],
});

export const streamsActive = new Gauge({
  name: 'market_streams_active',
  help: 'Open tick streams',
  registers: [registry],
});

export const ticksEmitted = new Counter({
  name: 'market_ticks_emitted_total',
  help: 'Ticks produced by market streams',
  labelNames: ['mode'],
  registers: [registry],
});

export const marketSteps = new Counter({
  name: 'market_steps_total',
  help: 'Market clock steps (one per simulated instant)',
  labelNames: ['mode'],
  registers: [registry],
});
