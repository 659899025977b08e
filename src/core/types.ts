/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is registered under one of these symbols.
 * Symbols never collide with a stray string and stay out of JSON output.
 * Grouped by architectural layer so the wiring in container.ts reads top-down.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the app needs to function
  Config: Symbol.for('Config'),
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),
  Clock: Symbol.for('Clock'),
  HttpClient: Symbol.for('HttpClient'),

  // Repositories — data-access contracts
  PlaceRepository: Symbol.for('PlaceRepository'),

  // Collaborators — metered external APIs
  PlacesClient: Symbol.for('PlacesClient'),
  Classifier: Symbol.for('Classifier'),
  HomepageFetcher: Symbol.for('HomepageFetcher'),

  // Services — application-level orchestrators
  PipelineService: Symbol.for('PipelineService'),
  ExportService: Symbol.for('ExportService'),
} as const;
