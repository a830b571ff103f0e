import settings from './config/settings';
import { createExtractor } from './extractorFactory';
import { createApiContext, createServer } from './handler';
import logger from './utils/logger';

const context = createApiContext(createExtractor());
const server = createServer(context);

server.listen(settings.apiPort, settings.apiHost, () => {
  logger.info(`Extraction service listening on ${settings.apiHost}:${settings.apiPort}`);
});

process.on('SIGTERM', () => {
  logger.info(`Shutting down, waiting for ${context.inFlight.size} running jobs`);
  server.close();
  Promise.allSettled(context.inFlight)
    .then(() => process.exit(0))
    .catch(error => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
});
