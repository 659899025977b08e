/**
 * Migration 001 — Create the `places` Table
 * Layer: Infrastructure (Database)
 *
 * One row per external place id. Every column except the id and the two
 * lifecycle timestamps is nullable: discovery fills identity fields, details
 * fills contact and quality fields, and the classifier fills the AI block.
 *
 * `types_json` and `opening_hours_json` hold JSON text so the same schema
 * works on SQLite and PostgreSQL. Timestamps are ISO-8601 UTC strings, which
 * sort in time order as plain text.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('places', (table) => {
    table.string('place_id').primary();
    table.text('name');
    table.text('address');
    table.text('phone');
    table.text('website');
    table.double('rating');
    table.integer('review_count');
    table.double('lat');
    table.double('lng');
    table.string('primary_type');
    table.text('types_json');
    table.string('business_status');
    table.text('maps_url');
    table.text('opening_hours_json');
    table.string('first_seen').notNullable();
    table.string('last_seen').notNullable();

    // classification block
    table.text('industry_bucket');
    table.integer('mobility_fit');
    table.integer('security_fit');
    table.integer('voip_fit');
    table.integer('fleet_attach');
    table.integer('signal_after_hours');
    table.integer('signal_dispatch');
    table.integer('signal_field_work');
    table.text('ai_reason');
    table.string('ai_last_updated');

    table.double('total_score');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('places');
}
