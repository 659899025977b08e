/**
 * Unit Tests — loadConfig()
 *
 * The config is built from a plain env record, so every case here passes its
 * own record and never touches process.env.
 */
import { loadConfig } from '@core/config';
import { ConfigurationError } from '@shared/errors/AppError';

describe('loadConfig()', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.nodeEnv).toBe('development');
    expect(config.isDev).toBe(true);
    expect(config.database.client).toBe('better-sqlite3');
    expect(config.database.path).toBe('territory.db');
    expect(config.places).toEqual({
      apiKey: null,
      regionCode: 'CA',
      languageCode: 'en',
      pageSize: 20,
      maxPages: 3,
      pageTokenDelayMs: 2000,
    });
    expect(config.openai.model).toBe('gpt-4.1-mini');
    expect(config.openai.maxOutputTokens).toBe(250);
    expect(config.http).toEqual({
      timeoutMs: 30_000,
      retryAttempts: 5,
      retryBaseDelayMs: 1000,
      retryMaxDelayMs: 20_000,
    });
    expect(config.homepage.maxChars).toBe(10_000);
    expect(config.export.path).toBe('data/exports/ranked.csv');
  });

  it('should coerce numeric strings', () => {
    const config = loadConfig({ PORT: '8080', PLACES_MAX_PAGES: '2', DETAILS_LIMIT: '25' });

    expect(config.port).toBe(8080);
    expect(config.places.maxPages).toBe(2);
    expect(config.pipeline.detailsLimit).toBe(25);
  });

  it('should treat blank API keys as not set and trim present ones', () => {
    const config = loadConfig({ GOOGLE_MAPS_API_KEY: '   ', OPENAI_API_KEY: ' test-secret ' });

    expect(config.places.apiKey).toBeNull();
    expect(config.openai.apiKey).toBe('test-secret');
  });

  it('should parse DB_SSL as a boolean string', () => {
    expect(loadConfig({ DB_SSL: 'true' }).database.ssl).toBe(true);
    expect(loadConfig({ DB_SSL: 'false' }).database.ssl).toBe(false);
  });

  it('should flag production', () => {
    const config = loadConfig({ NODE_ENV: 'production' });

    expect(config.isProd).toBe(true);
    expect(config.isDev).toBe(false);
  });

  it('should throw a ConfigurationError naming every invalid key', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', DB_CLIENT: 'mysql' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const message = caught instanceof Error ? caught.message : '';
    expect(message).toMatch(/^Invalid environment configuration: /);
    expect(message).toContain('PORT');
    expect(message).toContain('DB_CLIENT');
  });
});
