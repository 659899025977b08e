/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Shared test data so the same objects are not rebuilt in every test.
 * sample* = one complete object; timestamps are fixed for determinism.
 * Place ids and phone numbers are made up.
 */
import { loadConfig, type AppConfig } from '@core/config';
import type { Classification, Place } from '@domain/entities/Place';
import type { PlaceDetails, PlaceSummary } from '@domain/interfaces/IPlacesClient';

/** Config for tests: in-memory SQLite, silent logs, no waits between retries or pages. */
export function createTestConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    DB_CLIENT: 'better-sqlite3',
    DB_PATH: ':memory:',
    GOOGLE_MAPS_API_KEY: 'test-maps-key',
    OPENAI_API_KEY: 'test-secret',
    PLACES_PAGE_TOKEN_DELAY_MS: '0',
    HTTP_RETRY_BASE_DELAY_MS: '0',
    HTTP_RETRY_MAX_DELAY_MS: '0',
    ...overrides,
  });
}

export const samplePlaceSummary: PlaceSummary = {
  id: 'place-harbour-plumbing',
  name: 'Harbour Plumbing',
  address: '12 Water St, St. John\'s, NL A1C 1A1',
  lat: 47.5615,
  lng: -52.7126,
  primaryType: 'plumber',
  types: ['plumber', 'point_of_interest'],
  businessStatus: 'OPERATIONAL',
};

export const samplePlaceDetails: PlaceDetails = {
  ...samplePlaceSummary,
  phone: '+1 709-555-0101',
  website: 'https://harbour-plumbing.example',
  rating: 4.6,
  reviewCount: 38,
  mapsUrl: 'https://maps.example/?cid=101',
  openingHours: { weekdayDescriptions: ['Monday: 8:00 AM – 5:00 PM'] },
};

export const sampleClassification: Classification = {
  industryBucket: 'Trades',
  mobilityFit: 90,
  securityFit: 40,
  voipFit: 60,
  fleetAttach: 70,
  signalAfterHours: true,
  signalDispatch: true,
  signalFieldWork: true,
  aiReason: 'Field crews dispatched across the region.',
};

export const samplePlace: Place = {
  id: samplePlaceDetails.id,
  name: samplePlaceDetails.name,
  address: samplePlaceDetails.address,
  lat: samplePlaceDetails.lat,
  lng: samplePlaceDetails.lng,
  primaryType: samplePlaceDetails.primaryType,
  types: samplePlaceDetails.types,
  businessStatus: samplePlaceDetails.businessStatus,
  phone: samplePlaceDetails.phone,
  website: samplePlaceDetails.website,
  mapsUrl: samplePlaceDetails.mapsUrl,
  openingHours: samplePlaceDetails.openingHours,
  rating: samplePlaceDetails.rating,
  reviewCount: samplePlaceDetails.reviewCount,
  classification: { ...sampleClassification, classifiedAt: '2026-03-01T10:00:00Z' },
  totalScore: 84,
  firstSeen: '2026-03-01T09:00:00Z',
  lastSeen: '2026-03-01T10:00:00Z',
};

/** A place with only the fields discovery supplies. */
export function bareDiscoveredPlace(id: string, overrides: Partial<Place> = {}): Place {
  return {
    id,
    name: null,
    address: null,
    lat: null,
    lng: null,
    primaryType: null,
    types: null,
    businessStatus: null,
    phone: null,
    website: null,
    mapsUrl: null,
    openingHours: null,
    rating: null,
    reviewCount: null,
    classification: null,
    totalScore: null,
    firstSeen: '2026-03-01T09:00:00Z',
    lastSeen: '2026-03-01T09:00:00Z',
    ...overrides,
  };
}
