import { buildApp } from './app.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { logStartupBanner } from './utils/log-startup.js';

const app = buildApp();
const server = app.listen(config.port, () => {
  logger.info({ port: config.port, prefix: config.apiPrefix || '/' }, 'market-sim listening');
  logStartupBanner();
});

// ---- global process error traps ----
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaughtException');
  shutdown(1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'unhandledRejection');
  shutdown(1);
});

process.on('SIGINT', () => shutdown(0));
process.on('SIGTERM', () => shutdown(0));

let closing = false;
function shutdown(code: number) {
  if (closing) return;
  closing = true;
  logger.info('shutting down...');
  // open SSE responses keep the server alive; closing them cancels their markets
  server.closeAllConnections();
  server.close(() => {
    logger.info('bye');
    process.exit(code);
  });
  setTimeout(() => process.exit(1), 5000).unref();
}
