/**
 * Google Places Client — Discovery & Details (Places API "New")
 * Layer: Infrastructure
 * Pattern: Adapter (implements IPlacesClient)
 *
 * textSearch() posts `places:searchText`, follows nextPageToken up to
 * `maxPages`, waits `pageTokenDelayMs` before using a token (Google rejects
 * tokens used too early) and drops duplicate or id-less results.
 * getDetails() fetches one place with the call-ready field mask.
 *
 * Both calls send an explicit field mask: Google bills by the fields
 * requested, so the masks list exactly what the cache stores. Responses are
 * parsed with Zod schemas whose fields are all optional; the API omits
 * whatever it does not know.
 */
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  IPlacesClient,
  PlaceDetails,
  PlaceSummary,
  TextSearchOptions,
} from '@domain/interfaces/IPlacesClient';
import { HttpClient } from '@infrastructure/http/HttpClient';
import { delay } from '@shared/async';
import { ConfigurationError } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod/v4';

export const TEXT_SEARCH_URL = 'https://places.googleapis.com/v1/places:searchText';
export const DETAILS_BASE_URL = 'https://places.googleapis.com/v1/places/';

export const TEXT_SEARCH_FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.location',
  'places.types',
  'places.primaryType',
  'places.businessStatus',
  'nextPageToken',
].join(',');

export const DETAILS_FIELD_MASK = [
  'id',
  'displayName',
  'formattedAddress',
  'location',
  'types',
  'primaryType',
  'businessStatus',
  'internationalPhoneNumber',
  'nationalPhoneNumber',
  'websiteUri',
  'rating',
  'userRatingCount',
  'googleMapsUri',
  'regularOpeningHours',
].join(',');

const apiPlaceSchema = z.object({
  id: z.string().optional(),
  displayName: z.object({ text: z.string().optional() }).optional(),
  formattedAddress: z.string().optional(),
  location: z
    .object({
      latitude: z.number().optional(),
      longitude: z.number().optional(),
    })
    .optional(),
  types: z.array(z.string()).optional(),
  primaryType: z.string().optional(),
  businessStatus: z.string().optional(),
  internationalPhoneNumber: z.string().optional(),
  nationalPhoneNumber: z.string().optional(),
  websiteUri: z.string().optional(),
  rating: z.number().optional(),
  userRatingCount: z.number().optional(),
  googleMapsUri: z.string().optional(),
  regularOpeningHours: z.record(z.string(), z.unknown()).optional(),
});

const textSearchResponseSchema = z.object({
  places: z.array(apiPlaceSchema).optional(),
  nextPageToken: z.string().optional(),
});

export type ApiPlace = z.infer<typeof apiPlaceSchema>;

@injectable()
export class GooglePlacesClient implements IPlacesClient {
  constructor(
    @inject(TOKENS.Config) private config: AppConfig,
    @inject(TOKENS.HttpClient) private http: HttpClient,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async textSearch(query: string, options: TextSearchOptions = {}): Promise<PlaceSummary[]> {
    const apiKey = this.requireApiKey();
    const { regionCode, languageCode, pageTokenDelayMs } = this.config.places;
    const maxPages = options.maxPages ?? this.config.places.maxPages;

    const payload: Record<string, unknown> = {
      textQuery: query,
      pageSize: options.pageSize ?? this.config.places.pageSize,
      regionCode,
      languageCode,
    };
    if (options.locationBias) {
      payload.locationBias = { rectangle: options.locationBias };
    }
    if (options.includedType) {
      payload.includedType = options.includedType;
      payload.strictTypeFiltering = options.strictTypeFiltering ?? false;
    }

    const results: PlaceSummary[] = [];
    const seen = new Set<string>();
    let pageToken: string | undefined;

    for (let page = 0; page < maxPages; page++) {
      const data = await this.http.json(TEXT_SEARCH_URL, textSearchResponseSchema, {
        method: 'POST',
        headers: {
          'X-Goog-Api-Key': apiKey,
          'X-Goog-FieldMask': TEXT_SEARCH_FIELD_MASK,
        },
        body: pageToken ? { ...payload, pageToken } : payload,
      });

      for (const raw of data.places ?? []) {
        const place = toPlaceSummary(raw);
        if (place && !seen.has(place.id)) {
          seen.add(place.id);
          results.push(place);
        }
      }

      pageToken = data.nextPageToken;
      if (!pageToken || page + 1 >= maxPages) break;
      if (pageTokenDelayMs > 0) await delay(pageTokenDelayMs);
    }

    this.log.debug({ query, results: results.length }, 'Text search complete');
    return results;
  }

  async getDetails(id: string): Promise<PlaceDetails> {
    const apiKey = this.requireApiKey();

    const data = await this.http.json(`${DETAILS_BASE_URL}${encodeURIComponent(id)}`, apiPlaceSchema, {
      headers: {
        'X-Goog-Api-Key': apiKey,
        'X-Goog-FieldMask': DETAILS_FIELD_MASK,
      },
    });

    return toPlaceDetails(data, id);
  }

  private requireApiKey(): string {
    const { apiKey } = this.config.places;
    if (!apiKey) {
      throw new ConfigurationError('GOOGLE_MAPS_API_KEY is not set');
    }
    return apiKey;
  }
}

function blankToNull(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Null when the result carries no id: such entries cannot be cached. */
export function toPlaceSummary(raw: ApiPlace): PlaceSummary | null {
  const id = blankToNull(raw.id);
  if (id === null) return null;

  return {
    id,
    name: blankToNull(raw.displayName?.text),
    address: blankToNull(raw.formattedAddress),
    lat: raw.location?.latitude ?? null,
    lng: raw.location?.longitude ?? null,
    primaryType: blankToNull(raw.primaryType),
    types: raw.types ?? [],
    businessStatus: blankToNull(raw.businessStatus),
  };
}

/** `requestedId` stands in when the details body omits its own id. */
export function toPlaceDetails(raw: ApiPlace, requestedId: string): PlaceDetails {
  const summary = toPlaceSummary({ ...raw, id: raw.id ?? requestedId }) ?? {
    id: requestedId,
    name: null,
    address: null,
    lat: null,
    lng: null,
    primaryType: null,
    types: [],
    businessStatus: null,
  };

  return {
    ...summary,
    phone: blankToNull(raw.internationalPhoneNumber) ?? blankToNull(raw.nationalPhoneNumber),
    website: blankToNull(raw.websiteUri),
    rating: raw.rating ?? null,
    reviewCount: raw.userRatingCount === undefined ? null : Math.trunc(raw.userRatingCount),
    mapsUrl: blankToNull(raw.googleMapsUri),
    openingHours: raw.regularOpeningHours ?? null,
  };
}
