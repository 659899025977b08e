/**
 * Migration Source
 * Layer: Infrastructure (Database)
 *
 * Migrations are imported as modules instead of being discovered on disk, so
 * the same list runs from the Knex CLI, from the run script, from the
 * compiled build and inside Jest without any loader for .ts files.
 * Order in this array is the order Knex applies them.
 */
import type { Knex } from 'knex';

import * as createPlaces from './001_create_places';
import * as addPlacesIndexes from './002_add_places_indexes';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

const MIGRATIONS: NamedMigration[] = [
  { name: '001_create_places', migration: createPlaces },
  { name: '002_add_places_indexes', migration: addPlacesIndexes },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => MIGRATIONS,
  getMigrationName: (entry) => entry.name,
  getMigration: async (entry) => entry.migration,
};

/** Bring the schema up to date; returns the names of the migrations that ran. */
export async function migrateLatest(db: Knex): Promise<string[]> {
  const [, applied]: [number, string[]] = await db.migrate.latest({ migrationSource });
  return applied;
}
