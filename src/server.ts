/**
 * Server Entry Point — Bootstrap & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * Loads the config, builds the container, brings the schema up to date and
 * starts one HTTP server. A single process: the SQLite cache takes one writer.
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop accepting new connections (server.close()).
 *   2. Wait for in-flight requests to finish.
 *   3. Destroy the Knex pool.
 *   4. Exit with code 0.
 */
import 'reflect-metadata';

import { loadConfig } from '@core/config';
import { buildContainer } from '@core/container';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { migrateLatest } from '@infrastructure/database/migrations';
import { createApp } from '@interfaces/http/app';
import type { Knex } from 'knex';

async function main(): Promise<void> {
  const config = loadConfig();
  const di = buildContainer(config);
  const logger = di.resolve<Logger>(TOKENS.Logger);
  const db = di.resolve<Knex>(TOKENS.Knex);

  const applied = await migrateLatest(db);
  if (applied.length > 0) logger.info({ migrations: applied }, 'Migrations applied');

  const app = createApp(di);
  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      destroyDbConnection(db, logger)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Error while closing the database');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Server failed to start:', err);
  process.exit(1);
});
