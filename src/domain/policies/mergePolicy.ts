/**
 * Merge Policy — Fill-Only Reconciliation
 * Layer: Domain
 *
 * Discovery and details calls arrive partial, repeated and out of order, so
 * every identity/contact/quality column follows one rule on upsert:
 *
 *   stored = incoming ?? stored
 *
 * A present value (even an older one) is never clobbered by a missing one,
 * while a different present value replaces it. `last_seen` is the only column
 * that always takes the incoming value. `first_seen` is written once, on insert.
 *
 * The repository builds its single `ON CONFLICT ... DO UPDATE` clause from
 * these lists, so adding a column here is the one change every write site needs.
 */
import type { PlaceRow } from '@domain/entities/Place';

export const MERGEABLE_COLUMNS = [
  'name',
  'address',
  'phone',
  'website',
  'rating',
  'review_count',
  'lat',
  'lng',
  'primary_type',
  'types_json',
  'business_status',
  'maps_url',
  'opening_hours_json',
] as const satisfies readonly (keyof PlaceRow)[];

export type MergeableColumn = (typeof MERGEABLE_COLUMNS)[number];

/** Columns overwritten on every observation, regardless of the incoming value. */
export const ALWAYS_ADVANCED_COLUMNS = ['last_seen'] as const satisfies readonly (keyof PlaceRow)[];
