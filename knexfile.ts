/**
 * Knex Configuration (knexfile.ts)
 *
 * Used by the Knex CLI (`npm run migrate`, `npm run migrate:rollback`).
 * Connection settings come from the same source as the app, loadConfig()
 * (DB_CLIENT, DB_PATH, DATABASE_URL, DB_SSL, DB_POOL_*), and migrations come
 * from the code-defined migration source rather than a directory scan.
 */
import 'reflect-metadata';

import type { Knex } from 'knex';

import { loadConfig } from './src/core/config';
import { createLogger } from './src/core/logger';
import { buildKnexConfig } from './src/infrastructure/database/connection';
import { migrationSource } from './src/infrastructure/database/migrations';

const config = loadConfig();

const knexConfig: Knex.Config = {
  ...buildKnexConfig(config, createLogger(config)),
  migrations: { migrationSource },
};

export default knexConfig;
