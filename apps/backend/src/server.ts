import 'dotenv/config';
import { pathToFileURL } from 'node:url';

import { config } from './config/index.js';
import logger from './services/logger.js';
import { createApp, createAppContext, prepareSchedules } from './createServer.js';

export { createServer, createApp, createAppContext } from './createServer.js';
export type { ServerDependencies, AppContext } from './createServer.js';

const appConfig = config;

export const startServer = () => {
  logger.setLevel(appConfig.runtime.logLevel);

  const context = createAppContext(appConfig);
  prepareSchedules(context);
  context.scheduler.start();

  const app = createApp(context);
  const server = app.listen(appConfig.server.port, () => {
    logger.info('ReelSift backend listening', {
      url: `http://localhost:${appConfig.server.port}`,
      port: appConfig.server.port,
      dryRun: appConfig.scanner.dryRun,
    });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      context.close();
      process.exit(0);
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
};

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startServer();
}

export default startServer;
