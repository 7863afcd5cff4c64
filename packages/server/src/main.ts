/**
 * Server entry point
 */

import dotenv from 'dotenv';
import { pino } from 'pino';
import { LocalDeployment, loadConfig } from '@photodrop/services';
import { startServer } from './app.js';

async function main(): Promise<void> {
  dotenv.config();

  const config = loadConfig();
  const logger = pino({ level: config.logLevel });

  const deployment = await LocalDeployment.create(config, logger);
  const app = await startServer({
    deployment,
    logger,
    maxUploadBytes: config.maxUploadBytes,
    allowedMimeTypes: config.allowedMimeTypes,
    port: config.port,
    host: config.host
  });

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
