import dotenv from 'dotenv';
import { initializeInstrumentation } from './instrumentation';

dotenv.config();
initializeInstrumentation();

import { createServer } from 'http';
import { createApp } from './app';
import { errorMessage, logWithTrace } from './logger';
import { loadServiceSettings, type ServiceSettings } from './settings';

function readSettings(): ServiceSettings {
  try {
    return loadServiceSettings();
  } catch (error) {
    logWithTrace('error', 'Invalid service settings', { error: errorMessage(error) });
    process.exit(1);
  }
}

const settings = readSettings();

const app = createApp({ settings });
const httpServer = createServer(app);

httpServer.listen(settings.port, () => {
  logWithTrace('info', 'Server running', {
    port: settings.port,
    wordListPath: settings.wordListPath,
    seeded: settings.randomSeed !== undefined,
  });
});

function shutdown(signal: string): void {
  logWithTrace('info', `${signal} received, shutting down gracefully`);
  httpServer.close(() => {
    logWithTrace('info', 'Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
