// loads .env before the logger reads LOG_DIR and LOG_TO_FILE
import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfigFromEnvironment } from './config';
import { logger } from './logger';
import { createDataFetcher } from './service/dataFetcher';
import { createInMemoryTaskStore } from './service/personalIndexTaskStore';
import { createPersonalIndexTaskRunner } from './service/personalIndexTaskRunner';
import { createResultReporter } from './service/resultReporter';

const config = (() => {
  try {
    return loadConfigFromEnvironment();
  } catch (error) {
    logger.error('Invalid configuration:', error);
    process.exit(1);
  }
})();

logger.log('=== Server starting ===');
logger.log('Log file location:', logger.getLogFilePath() ?? '(console only)');

const collaborator = {
  baseUrl: config.collaboratorBaseUrl,
  authToken: config.authToken,
  timeoutMs: config.collaboratorTimeoutMs,
};

const runner = createPersonalIndexTaskRunner({
  fetchRequestData: createDataFetcher(collaborator),
  reportResult: createResultReporter(collaborator),
  taskStore: createInMemoryTaskStore({
    historyLimit: config.taskHistoryLimit,
  }),
  concurrency: config.taskConcurrency,
  simulatedDelayMs: config.simulatedDelayMs,
});

const app = createApp({
  runner,
  authToken: config.authToken,
  corsOrigins: config.corsOrigins,
});

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.log(`Server is running on http://localhost:${info.port}`);
    logger.log(`Reporting results to ${config.collaboratorBaseUrl}`);
  }
);

let stopping = false;

const stop = async (signal: string) => {
  if (stopping) return;
  stopping = true;
  logger.log(`Received ${signal}, shutting down`);
  server.close();
  try {
    await runner.shutdown();
    logger.log('Task runner stopped');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
};

process.on('SIGINT', () => {
  void stop('SIGINT');
});
process.on('SIGTERM', () => {
  void stop('SIGTERM');
});
