/**
 * Database Connection Factory
 * Layer: Infrastructure
 *
 * Builds the Knex instance for the configured engine:
 *
 *   - better-sqlite3 (default): the local cache file. Each connection runs
 *     with WAL journaling and synchronous=NORMAL, so a crash between commit
 *     and fsync can lose the latest write but never corrupts earlier state,
 *     and SQLite's own locking serialises writers from separate processes.
 *   - pg: the same schema and queries against PostgreSQL.
 *
 * One instance per process, created by buildContainer() and torn down with
 * destroyDbConnection() on shutdown.
 */
import fs from 'node:fs';
import path from 'node:path';

import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import type Database from 'better-sqlite3';
import knex, { Knex } from 'knex';

export const IN_MEMORY_DB = ':memory:';

function sqliteConfig(config: AppConfig, log: Logger): Knex.Config {
  const filename = config.database.path;
  if (filename !== IN_MEMORY_DB) {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  return {
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
    pool: {
      // A single connection: one writer, and an in-memory database lives
      // exactly as long as its connection.
      min: 1,
      max: 1,
      afterCreate: (conn: Database.Database, done: (err: Error | null, conn: unknown) => void) => {
        conn.pragma('foreign_keys = ON');
        conn.pragma('journal_mode = WAL');
        conn.pragma('synchronous = NORMAL');
        log.debug({ filename }, 'SQLite connection opened');
        done(null, conn);
      },
    },
  };
}

function postgresConfig(config: AppConfig, log: Logger): Knex.Config {
  return {
    client: 'pg',
    connection: {
      connectionString: config.database.url,
      ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
    },
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
      afterCreate: (conn: unknown, done: (err: Error | null, conn: unknown) => void) => {
        log.debug('New database connection established');
        done(null, conn);
      },
    },
    acquireConnectionTimeout: 10_000,
  };
}

export function buildKnexConfig(config: AppConfig, log: Logger): Knex.Config {
  return config.database.client === 'pg'
    ? postgresConfig(config, log)
    : sqliteConfig(config, log);
}

export function createDbConnection(config: AppConfig, log: Logger): Knex {
  const db = knex(buildKnexConfig(config, log));
  log.info(
    {
      client: config.database.client,
      target: config.database.client === 'pg' ? describePgTarget(config.database.url) : config.database.path,
    },
    'Database connection initialized',
  );
  return db;
}

/** Gracefully tears down the pool (used on SIGTERM / test cleanup). */
export async function destroyDbConnection(db: Knex, log: Logger): Promise<void> {
  await db.destroy();
  log.info('Database connection destroyed');
}

/** host:port/db from a connection URL, without credentials. */
export function describePgTarget(url: string): string {
  try {
    const u = new URL(url);
    return `${u.hostname}:${u.port || '5432'}${u.pathname}`;
  } catch {
    return '(from DATABASE_URL)';
  }
}
