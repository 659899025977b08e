/**
 * SQL Place Repository — Cache & Dedup Engine
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IPlaceRepository)
 *
 * I implement the place cache on Knex, so the same code runs on the local
 * SQLite file and on PostgreSQL. Three things matter here:
 *
 *   1. upsert() is one `INSERT ... ON CONFLICT(place_id) DO UPDATE` whose SET
 *      clause comes from the merge policy: COALESCE(excluded.col, places.col)
 *      for every mergeable column, excluded.last_seen unconditionally.
 *      Discovery and details both write through it.
 *   2. Id lists (touch/existing) go out in chunks of ID_CHUNK_SIZE so any
 *      input size stays under the engine's bind-parameter limit; touch()
 *      runs all chunks in one transaction.
 *   3. The two oracles read the stored row fresh on every call and hand it to
 *      the pure predicates in domain/policies. Nothing is cached in memory.
 *
 * "Now" comes from the injected Clock and is stored as an ISO-8601 UTC string
 * at second precision.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  Classification,
  ClassificationCandidate,
  ClassificationRecord,
  OpeningHours,
  Place,
  PlacePatch,
  PlaceRow,
  ScoringInputs,
} from '@domain/entities/Place';
import type { IPlaceRepository } from '@domain/interfaces/IPlaceRepository';
import * as classificationPolicy from '@domain/policies/classificationPolicy';
import * as enrichmentPolicy from '@domain/policies/enrichmentPolicy';
import {
  ALWAYS_ADVANCED_COLUMNS,
  MERGEABLE_COLUMNS,
  type MergeableColumn,
} from '@domain/policies/mergePolicy';
import { AI_REASON_MAX_LENGTH, CLOSED_PERMANENTLY, ID_CHUNK_SIZE } from '@shared/constants';
import { ValidationError } from '@shared/errors/AppError';
import { truncateChars } from '@shared/text';
import type { Clock } from '@shared/types';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod/v4';

export const PLACES_TABLE = 'places';

const typesSchema = z.array(z.string());
const openingHoursSchema = z.record(z.string(), z.unknown());

@injectable()
export class SqlPlaceRepository implements IPlaceRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.Clock) private clock: Clock,
  ) {}

  async upsert(id: string, patch: PlacePatch): Promise<void> {
    if (id.trim().length === 0) {
      throw new ValidationError('Place id is required');
    }

    const now = this.now();
    const row: Pick<PlaceRow, 'place_id' | 'first_seen' | 'last_seen' | MergeableColumn> = {
      place_id: id,
      ...toMergeableRow(patch),
      first_seen: now,
      last_seen: now,
    };

    await this.db(PLACES_TABLE).insert(row).onConflict('place_id').merge(this.mergeClause());
  }

  async touch(ids: Iterable<string>): Promise<void> {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return;

    const now = this.now();
    let touched = 0;
    await this.db.transaction(async (trx) => {
      for (const chunk of chunked(unique, ID_CHUNK_SIZE)) {
        touched += await trx<PlaceRow>(PLACES_TABLE)
          .whereIn('place_id', chunk)
          .update({ last_seen: now });
      }
    });

    this.log.debug({ requested: unique.length, touched }, 'touch complete');
  }

  async existing(ids: Iterable<string>): Promise<Set<string>> {
    const unique = [...new Set(ids)];
    const found = new Set<string>();

    for (const chunk of chunked(unique, ID_CHUNK_SIZE)) {
      const rows: string[] = await this.db<PlaceRow>(PLACES_TABLE)
        .whereIn('place_id', chunk)
        .pluck('place_id');
      for (const placeId of rows) found.add(placeId);
    }

    return found;
  }

  async writeClassification(id: string, classification: Classification, totalScore?: number): Promise<boolean> {
    const updated = await this.db<PlaceRow>(PLACES_TABLE)
      .where('place_id', id)
      .update({
        ...(totalScore === undefined ? {} : { total_score: totalScore }),
        industry_bucket: classification.industryBucket,
        mobility_fit: classification.mobilityFit,
        security_fit: classification.securityFit,
        voip_fit: classification.voipFit,
        fleet_attach: classification.fleetAttach,
        signal_after_hours: classification.signalAfterHours ? 1 : 0,
        signal_dispatch: classification.signalDispatch ? 1 : 0,
        signal_field_work: classification.signalFieldWork ? 1 : 0,
        ai_reason: truncateChars(classification.aiReason, AI_REASON_MAX_LENGTH),
        ai_last_updated: this.now(),
      });

    if (updated === 0) {
      this.log.debug({ placeId: id }, 'writeClassification ignored: unknown place');
    }
    return updated > 0;
  }

  async writeScore(id: string, score: number): Promise<boolean> {
    const updated = await this.db<PlaceRow>(PLACES_TABLE)
      .where('place_id', id)
      .update({ total_score: score });

    if (updated === 0) {
      this.log.debug({ placeId: id }, 'writeScore ignored: unknown place');
    }
    return updated > 0;
  }

  /** Most recently seen first; place_id breaks ties so a fixed snapshot always yields the same order. */
  async selectForClassification(limit: number): Promise<ClassificationCandidate[]> {
    const rows = await this.db<PlaceRow>(PLACES_TABLE)
      .select('place_id', 'name', 'address', 'website', 'primary_type')
      .orderBy([
        { column: 'last_seen', order: 'desc' },
        { column: 'place_id', order: 'asc' },
      ])
      .limit(limit);

    return rows.map((r) => ({
      id: r.place_id,
      name: r.name,
      address: r.address,
      website: r.website,
      primaryType: r.primary_type,
    }));
  }

  async selectForExport(): Promise<Place[]> {
    const rows: PlaceRow[] = await this.db<PlaceRow>(PLACES_TABLE).where((qb) => {
      qb.whereNull('business_status').orWhereNot('business_status', CLOSED_PERMANENTLY);
    });

    return rows.map(toDomain);
  }

  async findById(id: string): Promise<Place | null> {
    const row: PlaceRow | undefined = await this.db<PlaceRow>(PLACES_TABLE)
      .where('place_id', id)
      .first();
    return row ? toDomain(row) : null;
  }

  async getScoringInputs(id: string): Promise<ScoringInputs | null> {
    const row = await this.db<PlaceRow>(PLACES_TABLE)
      .select('rating', 'review_count', 'website', 'opening_hours_json')
      .where('place_id', id)
      .first();
    if (!row) return null;

    return {
      rating: row.rating,
      reviewCount: row.review_count,
      website: row.website,
      openingHours: parseJsonColumn(row.opening_hours_json, openingHoursSchema),
    };
  }

  async needsDetails(id: string): Promise<boolean> {
    const row = await this.db<PlaceRow>(PLACES_TABLE)
      .select('phone', 'maps_url')
      .where('place_id', id)
      .first();

    return enrichmentPolicy.needsDetails(row ? { phone: row.phone, mapsUrl: row.maps_url } : null);
  }

  async shouldClassify(id: string, currentWebsite: string | null): Promise<boolean> {
    const row = await this.db<PlaceRow>(PLACES_TABLE)
      .select('website', 'ai_last_updated', 'mobility_fit', 'security_fit', 'voip_fit', 'fleet_attach')
      .where('place_id', id)
      .first();

    return classificationPolicy.shouldClassify(
      row
        ? {
            website: row.website,
            classifiedAt: row.ai_last_updated,
            mobilityFit: row.mobility_fit,
            securityFit: row.security_fit,
            voipFit: row.voip_fit,
            fleetAttach: row.fleet_attach,
          }
        : null,
      currentWebsite,
    );
  }

  /** SET clause shared by every upsert: see domain/policies/mergePolicy.ts. */
  private mergeClause(): Record<string, Knex.Raw> {
    const clause: Record<string, Knex.Raw> = {};
    for (const column of ALWAYS_ADVANCED_COLUMNS) {
      clause[column] = this.db.raw(`excluded.${column}`);
    }
    for (const column of MERGEABLE_COLUMNS) {
      clause[column] = this.db.raw(`COALESCE(excluded.${column}, ${PLACES_TABLE}.${column})`);
    }
    return clause;
  }

  private now(): string {
    return toIsoSeconds(this.clock());
  }
}

/** `2026-01-02T03:04:05Z`: second precision, sorts in time order as text. */
export function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function toMergeableRow(patch: PlacePatch): Pick<PlaceRow, MergeableColumn> {
  return {
    name: patch.name ?? null,
    address: patch.address ?? null,
    phone: patch.phone ?? null,
    website: patch.website ?? null,
    rating: patch.rating ?? null,
    review_count: patch.reviewCount ?? null,
    lat: patch.lat ?? null,
    lng: patch.lng ?? null,
    primary_type: patch.primaryType ?? null,
    types_json: patch.types == null ? null : JSON.stringify(patch.types),
    business_status: patch.businessStatus ?? null,
    maps_url: patch.mapsUrl ?? null,
    opening_hours_json: patch.openingHours == null ? null : JSON.stringify(patch.openingHours),
  };
}

/** Map a snake_case row to the camelCase Place (single place for this conversion). */
function toDomain(row: PlaceRow): Place {
  return {
    id: row.place_id,
    name: row.name,
    address: row.address,
    lat: row.lat,
    lng: row.lng,
    primaryType: row.primary_type,
    types: parseJsonColumn(row.types_json, typesSchema),
    businessStatus: row.business_status,
    phone: row.phone,
    website: row.website,
    mapsUrl: row.maps_url,
    openingHours: parseJsonColumn<OpeningHours>(row.opening_hours_json, openingHoursSchema),
    rating: row.rating,
    reviewCount: row.review_count,
    classification: toClassification(row),
    totalScore: row.total_score,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
  };
}

/** A block with any gap reads as "not classified"; the oracle then schedules a rewrite. */
function toClassification(row: PlaceRow): ClassificationRecord | null {
  const {
    industry_bucket,
    mobility_fit,
    security_fit,
    voip_fit,
    fleet_attach,
    signal_after_hours,
    signal_dispatch,
    signal_field_work,
    ai_reason,
    ai_last_updated,
  } = row;

  if (
    industry_bucket === null ||
    mobility_fit === null ||
    security_fit === null ||
    voip_fit === null ||
    fleet_attach === null ||
    signal_after_hours === null ||
    signal_dispatch === null ||
    signal_field_work === null ||
    ai_reason === null ||
    ai_last_updated === null
  ) {
    return null;
  }

  return {
    industryBucket: industry_bucket,
    mobilityFit: mobility_fit,
    securityFit: security_fit,
    voipFit: voip_fit,
    fleetAttach: fleet_attach,
    signalAfterHours: signal_after_hours === 1,
    signalDispatch: signal_dispatch === 1,
    signalFieldWork: signal_field_work === 1,
    aiReason: ai_reason,
    classifiedAt: ai_last_updated,
  };
}

function parseJsonColumn<T>(text: string | null, schema: z.ZodType<T>): T | null {
  if (text === null) return null;
  try {
    const parsed = schema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function chunked<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
