/**
 * Place Entity — The Core Data Model
 * Layer: Domain
 *
 * Two shapes for the same record, as elsewhere in the codebase:
 *
 *   Place     — camelCase, used by services, controllers and the export.
 *   PlaceRow  — snake_case, mirrors the `places` table column for column.
 *
 * The conversion happens in one place: the repository's `toDomain()`.
 *
 * Field groups:
 *   - identity:       name, address, lat/lng, primaryType, types, businessStatus
 *   - contact:        phone, website, mapsUrl, openingHours
 *   - quality:        rating, reviewCount
 *   - classification: all-or-nothing block written by the classifier step
 *   - derived:        totalScore, present exactly when classification is
 *   - lifecycle:      firstSeen (set once), lastSeen (advanced on every observation)
 *
 * `id` is the external place identifier; it never changes once stored.
 */

/** Structured opening hours exactly as the places API returned them. */
export type OpeningHours = Record<string, unknown>;

/**
 * A partial observation of a place. Omitted and `null` fields both mean
 * "not supplied": they never erase what is already stored.
 */
export interface PlacePatch {
  name?: string | null;
  address?: string | null;
  lat?: number | null;
  lng?: number | null;
  primaryType?: string | null;
  types?: string[] | null;
  businessStatus?: string | null;
  phone?: string | null;
  website?: string | null;
  mapsUrl?: string | null;
  openingHours?: OpeningHours | null;
  rating?: number | null;
  reviewCount?: number | null;
}

/** Output of the classification collaborator (fits 0–100, signals as booleans). */
export interface Classification {
  industryBucket: string;
  mobilityFit: number;
  securityFit: number;
  voipFit: number;
  fleetAttach: number;
  signalAfterHours: boolean;
  signalDispatch: boolean;
  signalFieldWork: boolean;
  aiReason: string;
}

/** A stored classification: the collaborator's output plus when it was written. */
export interface ClassificationRecord extends Classification {
  classifiedAt: string;
}

export interface Place {
  id: string;
  name: string | null;
  address: string | null;
  lat: number | null;
  lng: number | null;
  primaryType: string | null;
  types: string[] | null;
  businessStatus: string | null;
  phone: string | null;
  website: string | null;
  mapsUrl: string | null;
  openingHours: OpeningHours | null;
  rating: number | null;
  reviewCount: number | null;
  classification: ClassificationRecord | null;
  totalScore: number | null;
  firstSeen: string;
  lastSeen: string;
}

/** The slice of a place the classifier needs, in last-seen order. */
export interface ClassificationCandidate {
  id: string;
  name: string | null;
  address: string | null;
  website: string | null;
  primaryType: string | null;
}

/** Inputs of the scoring step that come from the stored record. */
export interface ScoringInputs {
  rating: number | null;
  reviewCount: number | null;
  website: string | null;
  openingHours: OpeningHours | null;
}

export interface PlaceRow {
  place_id: string;
  name: string | null;
  address: string | null;
  phone: string | null;
  website: string | null;
  rating: number | null;
  review_count: number | null;
  lat: number | null;
  lng: number | null;
  primary_type: string | null;
  types_json: string | null;
  business_status: string | null;
  maps_url: string | null;
  opening_hours_json: string | null;
  first_seen: string;
  last_seen: string;

  industry_bucket: string | null;
  mobility_fit: number | null;
  security_fit: number | null;
  voip_fit: number | null;
  fleet_attach: number | null;
  signal_after_hours: number | null;
  signal_dispatch: number | null;
  signal_field_work: number | null;
  ai_reason: string | null;
  ai_last_updated: string | null;

  total_score: number | null;
}
