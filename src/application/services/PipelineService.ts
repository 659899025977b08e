/**
 * Pipeline Service — Discovery → Details → Classification → Score
 * Layer: Application
 * Pattern: Facade over the cache and the three metered collaborators
 *
 * Each step asks the repository's oracles before spending money:
 *
 *   discover()       text search per query; ids split into new/seen against
 *                    the cache BEFORE anything is written; seen ids touched,
 *                    every summary upserted (fill-only merge).
 *   enrichDetails()  details only where needsDetails() says contact data is
 *                    missing; a changed website marks the place for
 *                    reclassification.
 *   classify()       places marked above first, then candidates in last-seen
 *                    order, skipped unless shouldClassify(); classification
 *                    and score written in one statement after the
 *                    classifier succeeded.
 *
 * Failures are isolated per query/place: logged, counted, and the run goes on.
 */
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  Classification,
  ClassificationCandidate,
  Place,
  ScoringInputs,
} from '@domain/entities/Place';
import type { IClassifier, IHomepageFetcher } from '@domain/interfaces/IClassifier';
import type { IPlaceRepository } from '@domain/interfaces/IPlaceRepository';
import type { IPlacesClient, PlaceSummary, TextSearchOptions } from '@domain/interfaces/IPlacesClient';
import { computeScore } from '@domain/policies/scoringPolicy';
import type {
  ClassificationRunSummary,
  DiscoverySummary,
  EnrichmentSummary,
  RunRequest,
  RunSummary,
} from '@shared/types';
import { inject, injectable } from 'tsyringe';

export interface ClassifyOptions {
  /** Stop after this many successful classifications. */
  limit?: number;
  /** Candidates read from the cache. */
  scanLimit?: number;
  /**
   * Ids classified first, regardless of the oracle and outside `limit`
   * (website changed during enrichment).
   */
  force?: Iterable<string>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function hasText(value: string | null): value is string {
  return value !== null && value.trim().length > 0;
}

function scoreFrom(fits: Classification | null, inputs: ScoringInputs): number {
  return computeScore({
    mobilityFit: fits?.mobilityFit ?? null,
    securityFit: fits?.securityFit ?? null,
    voipFit: fits?.voipFit ?? null,
    fleetAttach: fits?.fleetAttach ?? null,
    rating: inputs.rating,
    reviewCount: inputs.reviewCount,
    hasWebsite: hasText(inputs.website),
    hasOpeningHours: inputs.openingHours !== null,
  });
}

function toCandidate(place: Place): ClassificationCandidate {
  return {
    id: place.id,
    name: place.name,
    address: place.address,
    website: place.website,
    primaryType: place.primaryType,
  };
}

@injectable()
export class PipelineService {
  constructor(
    @inject(TOKENS.Config) private config: AppConfig,
    @inject(TOKENS.PlaceRepository) private repo: IPlaceRepository,
    @inject(TOKENS.PlacesClient) private places: IPlacesClient,
    @inject(TOKENS.Classifier) private classifier: IClassifier,
    @inject(TOKENS.HomepageFetcher) private homepage: IHomepageFetcher,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async discover(queries: string[], options: TextSearchOptions = {}): Promise<DiscoverySummary> {
    const newIds = new Set<string>();
    const seenIds = new Set<string>();
    const failedQueries: string[] = [];
    let found = 0;

    for (const query of queries) {
      let results: PlaceSummary[];
      try {
        results = await this.places.textSearch(query, options);
      } catch (err) {
        this.log.error({ query, err: errorMessage(err) }, 'Text search failed, skipping query');
        failedQueries.push(query);
        continue;
      }
      found += results.length;

      const ids = results.map((p) => p.id);
      const stored = await this.repo.existing(ids);
      const seenHere = ids.filter((id) => stored.has(id) && !newIds.has(id));
      for (const id of ids) {
        if (seenIds.has(id) || newIds.has(id)) continue;
        if (stored.has(id)) seenIds.add(id);
        else newIds.add(id);
      }

      await this.repo.touch(seenHere);

      for (const place of results) {
        try {
          await this.repo.upsert(place.id, {
            name: place.name,
            address: place.address,
            lat: place.lat,
            lng: place.lng,
            primaryType: place.primaryType,
            types: place.types,
            businessStatus: place.businessStatus,
          });
        } catch (err) {
          this.log.error({ placeId: place.id, err: errorMessage(err) }, 'Upsert failed');
        }
      }

      this.log.info({ query, results: results.length, newTotal: newIds.size }, 'Query discovered');
    }

    const summary: DiscoverySummary = {
      queries: queries.length,
      found,
      unique: newIds.size + seenIds.size,
      newIds: [...newIds],
      seenIds: [...seenIds],
      failedQueries,
    };
    this.log.info(
      { queries: summary.queries, found, unique: summary.unique, new: newIds.size, seen: seenIds.size },
      'Discovery complete',
    );
    return summary;
  }

  async enrichDetails(ids: Iterable<string>, limit = this.config.pipeline.detailsLimit): Promise<EnrichmentSummary> {
    const targets: string[] = [];
    for (const id of new Set(ids)) {
      if (targets.length >= limit) break;
      if (await this.repo.needsDetails(id)) targets.push(id);
    }

    const reclassifyIds: string[] = [];
    let enriched = 0;
    let failed = 0;

    for (const id of targets) {
      try {
        const details = await this.places.getDetails(id);
        if (hasText(details.website) && (await this.repo.shouldClassify(id, details.website))) {
          reclassifyIds.push(id);
        }
        await this.repo.upsert(id, {
          name: details.name,
          address: details.address,
          lat: details.lat,
          lng: details.lng,
          primaryType: details.primaryType,
          types: details.types,
          businessStatus: details.businessStatus,
          phone: details.phone,
          website: details.website,
          mapsUrl: details.mapsUrl,
          openingHours: details.openingHours,
          rating: details.rating,
          reviewCount: details.reviewCount,
        });
        enriched++;
      } catch (err) {
        failed++;
        this.log.error({ placeId: id, err: errorMessage(err) }, 'Details fetch failed');
      }
    }

    this.log.info({ targets: targets.length, enriched, failed }, 'Enrichment complete');
    return { targets: targets.length, enriched, failed, reclassifyIds };
  }

  async classify(options: ClassifyOptions = {}): Promise<ClassificationRunSummary> {
    const limit = options.limit ?? this.config.pipeline.classifyLimit;
    const scanLimit = options.scanLimit ?? this.config.pipeline.classifyScanLimit;
    const forced = new Set(options.force ?? []);

    let classified = 0;
    let skipped = 0;
    let failed = 0;
    let scanned = 0;

    // Forced ids go first and outside `limit`: their stored website already
    // matches the fresh one, so the oracle will not ask for them again.
    for (const id of forced) {
      scanned++;
      const place = await this.repo.findById(id);
      if (!place) {
        this.log.warn({ placeId: id }, 'Place marked for reclassification is not stored');
        failed++;
        continue;
      }
      if (await this.classifyOne(toCandidate(place))) classified++;
      else failed++;
    }

    const candidates = await this.repo.selectForClassification(scanLimit);
    let classifiedFromScan = 0;

    for (const candidate of candidates) {
      if (classifiedFromScan >= limit) break;
      if (forced.has(candidate.id)) continue;
      scanned++;

      if (!(await this.repo.shouldClassify(candidate.id, candidate.website))) {
        skipped++;
        continue;
      }

      if (await this.classifyOne(candidate)) {
        classified++;
        classifiedFromScan++;
      } else {
        failed++;
      }
    }

    this.log.info({ scanned, classified, skipped, failed }, 'Classification complete');
    return { scanned, classified, skipped, failed };
  }

  /** Recompute and store the score; null when the place is unknown. */
  async scorePlace(id: string): Promise<number | null> {
    const [place, inputs] = await Promise.all([this.repo.findById(id), this.repo.getScoringInputs(id)]);
    if (!place || !inputs) {
      this.log.warn({ placeId: id }, 'Cannot score unknown place');
      return null;
    }

    const score = scoreFrom(place.classification, inputs);
    if (!(await this.repo.writeScore(id, score))) {
      this.log.warn({ placeId: id }, 'Score not written: unknown place');
      return null;
    }
    return score;
  }

  /**
   * Classify one place and store the block together with its score, so a
   * classified row never lacks a total_score. False on any failure.
   */
  private async classifyOne(candidate: ClassificationCandidate): Promise<boolean> {
    let homepageText: string | null = null;
    if (hasText(candidate.website)) {
      try {
        homepageText = await this.homepage.fetchText(candidate.website);
      } catch (err) {
        this.log.warn(
          { placeId: candidate.id, website: candidate.website, err: errorMessage(err) },
          'Homepage fetch failed, classifying without it',
        );
      }
    }

    try {
      const classification = await this.classifier.classify({
        name: candidate.name ?? '',
        address: candidate.address ?? '',
        primaryType: candidate.primaryType,
        website: candidate.website,
        homepageText,
      });

      const inputs = await this.repo.getScoringInputs(candidate.id);
      const written =
        inputs !== null &&
        (await this.repo.writeClassification(candidate.id, classification, scoreFrom(classification, inputs)));
      if (!written) {
        this.log.warn({ placeId: candidate.id }, 'Place vanished before classification was written');
      }
      return written;
    } catch (err) {
      this.log.error({ placeId: candidate.id, err: errorMessage(err) }, 'Classification failed');
      return false;
    }
  }

  async run(request: RunRequest, searchOptions: TextSearchOptions = {}): Promise<RunSummary> {
    const started = Date.now();

    const discovery = await this.discover(request.queries, {
      ...searchOptions,
      maxPages: request.maxPages ?? searchOptions.maxPages,
    });
    const enrichment = await this.enrichDetails(
      [...discovery.newIds, ...discovery.seenIds],
      request.detailsLimit ?? this.config.pipeline.detailsLimit,
    );
    const classification = await this.classify({
      limit: request.classifyLimit,
      force: enrichment.reclassifyIds,
    });

    return { discovery, enrichment, classification, durationMs: Date.now() - started };
  }
}
