/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every token is mapped to its implementation. No
 * class ever does `new SqlPlaceRepository(...)` by hand; it declares what it
 * needs with @inject and tsyringe builds it.
 *
 *   - `useValue` registers pre-built singletons (config, logger, Knex, clock).
 *   - `useClass` registers a class to construct on demand.
 *
 * buildContainer() returns a child of the root container, so a test can build
 * one over an in-memory database, swap the metered collaborators for fakes
 * with `register()`, and throw it away afterwards.
 */
import 'reflect-metadata';

import { ExportService } from '@application/services/ExportService';
import { PipelineService } from '@application/services/PipelineService';
import { GooglePlacesClient } from '@infrastructure/clients/GooglePlacesClient';
import { HomepageFetcher } from '@infrastructure/clients/HomepageFetcher';
import { OpenAiClassifier } from '@infrastructure/clients/OpenAiClassifier';
import { createDbConnection } from '@infrastructure/database/connection';
import { HttpClient } from '@infrastructure/http/HttpClient';
import { SqlPlaceRepository } from '@infrastructure/repositories/SqlPlaceRepository';
import type { Clock } from '@shared/types';
import { container, type DependencyContainer } from 'tsyringe';

import type { AppConfig } from './config';
import { createLogger, type Logger } from './logger';
import { TOKENS } from './types';

export interface ContainerOverrides {
  logger?: Logger;
  clock?: Clock;
}

export function buildContainer(config: AppConfig, overrides: ContainerOverrides = {}): DependencyContainer {
  const di = container.createChildContainer();
  const log = overrides.logger ?? createLogger(config);
  const clock: Clock = overrides.clock ?? (() => new Date());

  di.register(TOKENS.Config, { useValue: config });
  di.register(TOKENS.Logger, { useValue: log });
  di.register(TOKENS.Clock, { useValue: clock });
  di.register(TOKENS.Knex, { useValue: createDbConnection(config, log) });
  di.register(TOKENS.HttpClient, { useClass: HttpClient });

  di.register(TOKENS.PlaceRepository, { useClass: SqlPlaceRepository });

  di.register(TOKENS.PlacesClient, { useClass: GooglePlacesClient });
  di.register(TOKENS.Classifier, { useClass: OpenAiClassifier });
  di.register(TOKENS.HomepageFetcher, { useClass: HomepageFetcher });

  di.register(TOKENS.PipelineService, { useClass: PipelineService });
  di.register(TOKENS.ExportService, { useClass: ExportService });

  return di;
}
