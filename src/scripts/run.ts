/**
 * Pipeline CLI — Discovery, Details, Classification, Export
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run run:pipeline -- [--territory data/territory.json] [--query "plumber in Gander NL"]...
 *                           [--max-pages 3] [--details-limit 500] [--classify-limit 200]
 *                           [--export [path]] [--migrate]
 *
 * Without --query the territory file (default data/territory.json) supplies
 * the queries: every keyword in every city, biased to its rectangle.
 * Progress goes to the structured log; the console gets a summary.
 */
import 'reflect-metadata';

import type { PipelineService } from '@application/services/PipelineService';
import type { ExportService } from '@application/services/ExportService';
import { buildQueries, loadTerritory } from '@application/territory';
import { loadConfig } from '@core/config';
import { buildContainer } from '@core/container';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { TextSearchOptions } from '@domain/interfaces/IPlacesClient';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { migrateLatest } from '@infrastructure/database/migrations';
import type { Knex } from 'knex';
import path from 'path';

// CLI argument parsing

const args = process.argv.slice(2);

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  const value = idx !== -1 ? args[idx + 1] : undefined;
  return value !== undefined && !value.startsWith('--') ? value : undefined;
}

function getAll(flag: string): string[] {
  const values: string[] = [];
  args.forEach((arg, idx) => {
    const value = args[idx + 1];
    if (arg === flag && value !== undefined && !value.startsWith('--')) values.push(value);
  });
  return values;
}

function getInt(flag: string): number | undefined {
  const raw = getArg(flag);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return n;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

const DEFAULT_TERRITORY = 'data/territory.json';

// Helpers

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

// Main

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const out = console.log;

  const config = loadConfig();
  const di = buildContainer(config);
  const logger = di.resolve<Logger>(TOKENS.Logger);
  const db = di.resolve<Knex>(TOKENS.Knex);

  try {
    if (hasFlag('--migrate')) {
      const applied = await migrateLatest(db);
      out(`  Migrations applied: ${applied.length > 0 ? applied.join(', ') : 'none'}`);
    }

    let queries = getAll('--query');
    const searchOptions: TextSearchOptions = {};
    if (queries.length === 0) {
      const territoryPath = path.resolve(getArg('--territory') ?? DEFAULT_TERRITORY);
      const territory = loadTerritory(territoryPath);
      queries = buildQueries(territory);
      searchOptions.locationBias = territory.locationBias;
      out(`  Territory:  ${territory.name ?? territoryPath}`);
    }
    out(`  Queries:    ${queries.length}`);
    out('');

    const pipeline = di.resolve<PipelineService>(TOKENS.PipelineService);
    const summary = await pipeline.run(
      {
        queries,
        maxPages: getInt('--max-pages'),
        detailsLimit: getInt('--details-limit'),
        classifyLimit: getInt('--classify-limit'),
      },
      searchOptions,
    );

    const { discovery, enrichment, classification } = summary;
    out('  ✓ Run complete');
    out(`    Discovered:  ${discovery.unique} unique (${discovery.newIds.length} new, ${discovery.seenIds.length} seen)`);
    if (discovery.failedQueries.length > 0) {
      out(`    Failed queries: ${discovery.failedQueries.length}`);
    }
    out(`    Details:     ${enrichment.enriched}/${enrichment.targets} enriched, ${enrichment.failed} failed`);
    out(
      `    Classified:  ${classification.classified} (scanned ${classification.scanned}, ` +
        `skipped ${classification.skipped}, failed ${classification.failed})`,
    );
    out(`    Duration:    ${formatDuration(summary.durationMs)}`);

    if (hasFlag('--export')) {
      const exportPath = getArg('--export') ?? config.export.path;
      const rows = await di.resolve<ExportService>(TOKENS.ExportService).writeCsv(exportPath);
      out(`    Exported:    ${rows} rows → ${exportPath}`);
    }
    out('');
  } finally {
    await destroyDbConnection(db, logger);
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Pipeline run failed:', err);
  process.exit(1);
});
