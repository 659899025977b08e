/**
 * Place Repository Interface — The Cache Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * WHAT the pipeline needs from the cache, not HOW it is stored. The SQL
 * implementation lives in infrastructure; services and tests depend on this
 * interface only.
 *
 * Write semantics:
 *   - upsert() creates or merges (see domain/policies/mergePolicy.ts).
 *   - writeClassification() / writeScore() never create a record; they
 *     resolve to false when the id is unknown.
 *   - Every mutation is one statement or one transaction.
 */
import type {
  Classification,
  ClassificationCandidate,
  Place,
  PlacePatch,
  ScoringInputs,
} from '@domain/entities/Place';

export interface IPlaceRepository {
  /** Create the place or merge the patch into it; advances last_seen. Rejects a blank id. */
  upsert(id: string, patch: PlacePatch): Promise<void>;

  /** Advance last_seen for the ids that exist; unknown ids are ignored. */
  touch(ids: Iterable<string>): Promise<void>;

  /** The subset of `ids` already stored. */
  existing(ids: Iterable<string>): Promise<Set<string>>;

  /**
   * Replace the classification block and stamp it; false when the id is
   * unknown. A `totalScore` is stored in the same statement.
   */
  writeClassification(id: string, classification: Classification, totalScore?: number): Promise<boolean>;

  /** Overwrite total_score; false when the id is unknown. */
  writeScore(id: string, score: number): Promise<boolean>;

  /** Up to `limit` candidates, most recently seen first. */
  selectForClassification(limit: number): Promise<ClassificationCandidate[]>;

  /** Every place that is not permanently closed, unordered. */
  selectForExport(): Promise<Place[]>;

  /** Full record, closed places included. */
  findById(id: string): Promise<Place | null>;

  getScoringInputs(id: string): Promise<ScoringInputs | null>;

  /** Whether the metered details call is warranted for this place. */
  needsDetails(id: string): Promise<boolean>;

  /** Whether the metered classification call is warranted for this place. */
  shouldClassify(id: string, currentWebsite: string | null): Promise<boolean>;
}
