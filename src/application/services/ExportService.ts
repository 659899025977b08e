/**
 * Export Service — Ranked View & CSV
 * Layer: Application
 *
 * Reads every place that is not permanently closed, ranks it by total score
 * (unscored counts as 0; ties by name) and renders either JSON rows for the
 * API or a CSV for the sales team.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Place } from '@domain/entities/Place';
import type { IPlaceRepository } from '@domain/interfaces/IPlaceRepository';
import { toCsv, type CsvValue } from '@shared/csv';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { inject, injectable } from 'tsyringe';

export const EXPORT_COLUMNS = [
  'name',
  'phone',
  'website',
  'address',
  'primary_type',
  'industry_bucket',
  'mobility_fit',
  'security_fit',
  'voip_fit',
  'fleet_attach',
  'rating',
  'review_count',
  'total_score',
  'ai_reason',
] as const;

export function compareByScore(a: Place, b: Place): number {
  const diff = (b.totalScore ?? 0) - (a.totalScore ?? 0);
  if (diff !== 0) return diff;
  return (a.name ?? '').localeCompare(b.name ?? '');
}

export function toExportRow(place: Place): CsvValue[] {
  const c = place.classification;
  return [
    place.name,
    place.phone,
    place.website,
    place.address,
    place.primaryType,
    c?.industryBucket,
    c?.mobilityFit,
    c?.securityFit,
    c?.voipFit,
    c?.fleetAttach,
    place.rating,
    place.reviewCount,
    place.totalScore,
    c?.aiReason,
  ];
}

@injectable()
export class ExportService {
  constructor(
    @inject(TOKENS.PlaceRepository) private repo: IPlaceRepository,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  /** Open places, best first; all of them when `limit` is omitted. */
  async rankedPlaces(limit?: number): Promise<Place[]> {
    const places = await this.repo.selectForExport();
    places.sort(compareByScore);
    return limit === undefined ? places : places.slice(0, limit);
  }

  async toCsv(): Promise<{ csv: string; rows: number }> {
    const places = await this.rankedPlaces();
    return { csv: toCsv(EXPORT_COLUMNS, places.map(toExportRow)), rows: places.length };
  }

  /** Write the CSV (creating parent directories); resolves to the row count. */
  async writeCsv(filePath: string): Promise<number> {
    const { csv, rows } = await this.toCsv();
    await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await writeFile(filePath, csv, 'utf8');
    this.log.info({ path: filePath, rows }, 'Export written');
    return rows;
  }
}
