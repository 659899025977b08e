/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Run requests and the summaries each pipeline step returns live here so the
 * CLI script, the HTTP controller and the service agree on one shape.
 */

/** Source of "now" for timestamps; injected so tests can step time by hand. */
export type Clock = () => Date;

export interface DiscoveryOptions {
  maxPages?: number;
}

export interface DiscoverySummary {
  queries: number;
  found: number;
  unique: number;
  /** Ids that were not stored before this run (computed before any upsert). */
  newIds: string[];
  /** Ids that were already stored; their last_seen is touched. */
  seenIds: string[];
  failedQueries: string[];
}

export interface EnrichmentSummary {
  targets: number;
  enriched: number;
  failed: number;
  /** Ids whose freshly fetched website differs from the stored one. */
  reclassifyIds: string[];
}

export interface ClassificationRunSummary {
  scanned: number;
  classified: number;
  skipped: number;
  failed: number;
}

export interface RunRequest {
  queries: string[];
  maxPages?: number;
  detailsLimit?: number;
  classifyLimit?: number;
}

export interface RunSummary {
  discovery: DiscoverySummary;
  enrichment: EnrichmentSummary;
  classification: ClassificationRunSummary;
  durationMs: number;
}
