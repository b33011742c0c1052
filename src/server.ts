import { createServer } from 'http';
import { createApp } from './app';
import { getConfig } from './utils/config';
import { closeDatabase, initDatabase } from './utils/db';
import { info, error as logError } from './utils/logger';

initDatabase();

const app = createApp();
const server = createServer(app);
const { port } = getConfig();

/**
 * Starts the HTTP server.
 * @returns void
 */
function start(): void {
  server.listen(port, () => info(`API listening on port ${port}`));
}

/**
 * Performs graceful shutdown on SIGINT/SIGTERM: stops accepting requests,
 * then closes the database.
 * @param signal OS signal triggering shutdown.
 * @returns void
 */
function gracefulShutdown(signal: NodeJS.Signals): void {
  info(`Received ${signal}, shutting down...`);
  server.close((closeErr) => {
    if (closeErr) {
      logError('Error closing server', closeErr);
      process.exit(1);
    }
    closeDatabase();
    process.exit(0);
  });
}

process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

start();
