/**
 * Migration 002 — Lookup Indexes
 * Layer: Infrastructure (Database)
 *
 * last_seen backs the classification-candidate scan (ORDER BY last_seen DESC);
 * primary_type, rating and website back the export filters and the oracle reads.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.alterTable('places', (table) => {
    table.index('last_seen', 'idx_places_last_seen');
    table.index('primary_type', 'idx_places_primary_type');
    table.index('rating', 'idx_places_rating');
    table.index('website', 'idx_places_website');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.alterTable('places', (table) => {
    table.dropIndex('website', 'idx_places_website');
    table.dropIndex('rating', 'idx_places_rating');
    table.dropIndex('primary_type', 'idx_places_primary_type');
    table.dropIndex('last_seen', 'idx_places_last_seen');
  });
}
