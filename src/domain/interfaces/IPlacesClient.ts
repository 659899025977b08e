/**
 * Places Client Interface — Discovery & Details Collaborator
 * Layer: Domain
 *
 * Implementations own HTTP, field masks, pagination and retries. Callers see
 * one result or one failure per call.
 */
import type { OpeningHours } from '@domain/entities/Place';

/** Lightweight record returned by text search. */
export interface PlaceSummary {
  id: string;
  name: string | null;
  address: string | null;
  lat: number | null;
  lng: number | null;
  primaryType: string | null;
  types: string[];
  businessStatus: string | null;
}

/** Call-ready record returned by place details. */
export interface PlaceDetails extends PlaceSummary {
  phone: string | null;
  website: string | null;
  rating: number | null;
  reviewCount: number | null;
  mapsUrl: string | null;
  openingHours: OpeningHours | null;
}

/** Latitude/longitude rectangle results are biased towards. */
export interface LocationRectangle {
  low: { latitude: number; longitude: number };
  high: { latitude: number; longitude: number };
}

export interface TextSearchOptions {
  maxPages?: number;
  locationBias?: LocationRectangle;
  pageSize?: number;
  includedType?: string;
  strictTypeFiltering?: boolean;
}

export interface IPlacesClient {
  textSearch(query: string, options?: TextSearchOptions): Promise<PlaceSummary[]>;
  getDetails(id: string): Promise<PlaceDetails>;
}
