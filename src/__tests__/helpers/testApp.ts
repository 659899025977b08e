/**
 * Test Application Helper
 * Layer: Test Helpers
 *
 * Builds the real container over an in-memory database (migrated), swaps the
 * three metered collaborators for jest mocks, and returns an Express app for
 * supertest. Nothing leaves the process.
 *
 * The mocks must be registered BEFORE createApp(): controllers resolve their
 * services when the routes are built.
 */
import { buildContainer } from '@core/container';
import { TOKENS } from '@core/types';
import type { IPlaceRepository } from '@domain/interfaces/IPlaceRepository';
import { migrateLatest } from '@infrastructure/database/migrations';
import { createApp } from '@interfaces/http/app';
import type { Express } from 'express';
import type { Knex } from 'knex';

import { createTestConfig } from './fixtures';
import {
  createMockClassifier,
  createMockHomepageFetcher,
  createMockPlacesClient,
  MockClassifier,
  MockHomepageFetcher,
  MockPlacesClient,
} from './mockRepository';
import { TEST_EPOCH } from './testDb';

export interface TestApp {
  app: Express;
  repo: IPlaceRepository;
  places: MockPlacesClient;
  classifier: MockClassifier;
  homepage: MockHomepageFetcher;
  destroy: () => Promise<void>;
}

export async function createTestApp(): Promise<TestApp> {
  const di = buildContainer(createTestConfig(), { clock: () => new Date(TEST_EPOCH) });
  const db = di.resolve<Knex>(TOKENS.Knex);
  await migrateLatest(db);

  const places = createMockPlacesClient();
  const classifier = createMockClassifier();
  const homepage = createMockHomepageFetcher();
  di.register(TOKENS.PlacesClient, { useValue: places });
  di.register(TOKENS.Classifier, { useValue: classifier });
  di.register(TOKENS.HomepageFetcher, { useValue: homepage });

  return {
    app: createApp(di),
    repo: di.resolve<IPlaceRepository>(TOKENS.PlaceRepository),
    places,
    classifier,
    homepage,
    destroy: () => db.destroy(),
  };
}
