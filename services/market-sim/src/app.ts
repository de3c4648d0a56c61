// services/market-sim/src/app.ts
import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import fs from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import swaggerUi from 'swagger-ui-express';
import { pinoHttp } from 'pino-http';
import { z } from 'zod';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error.js';
import { apiRouter } from './routes/index.js';
import { config } from './config.js';
import { logger } from './logger.js';

const OpenApiDoc = z.record(z.unknown());

function mountDocs(app: express.Express) {
  const candidates = [
    path.resolve('src/openapi/openapi.yaml'),
    path.resolve('services/market-sim/src/openapi/openapi.yaml'),
  ];
  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) {
    logger.warn('openapi file not found, skipping docs UI');
    return;
  }
  try {
    const doc = OpenApiDoc.parse(parseYaml(fs.readFileSync(found, 'utf8')));
    app.get('/docs.json', (_req, res) => res.json(doc));
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(doc));
    logger.info({ file: found }, 'docs UI mounted at /docs');
  } catch (err) {
    logger.error({ err }, 'failed to parse openapi document');
  }
}

export function buildApp() {
  const app = express();
  app.disable('x-powered-by');

  app.use(helmet());
  const configuredOrigins =
    config.cors.origins === '*'
      ? '*'
      : config.cors.origins && config.cors.origins.length
        ? [...config.cors.origins]
        : true;
  app.use(cors({ origin: configuredOrigins, credentials: false }));
  app.use(express.json({ limit: '64kb' }));
  app.use(requestId);

  if (config.env !== 'production') {
    // dev-friendly HTTP logs
    app.use(pinoHttp({ logger, autoLogging: true }));
    mountDocs(app);
  }

  app.use(config.apiPrefix || '/', apiRouter());

  // Global error handler
  app.use(errorHandler);

  return app;
}
