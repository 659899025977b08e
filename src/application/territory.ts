/**
 * Territory Definition
 * Layer: Application
 *
 * A territory file names cities and keywords; every keyword is searched in
 * every city ("plumber in Gander NL"). An optional rectangle biases results
 * towards the region.
 */
import fs from 'fs';
import { ValidationError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

const coordinate = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const territorySchema = z.object({
  name: z.string().min(1).optional(),
  locationBias: z.object({ low: coordinate, high: coordinate }).optional(),
  cities: z.array(z.string().trim().min(1)).min(1),
  keywords: z.array(z.string().trim().min(1)).min(1),
});

export type Territory = z.infer<typeof territorySchema>;

/** City-major: every keyword for the first city, then the next. */
export function buildQueries(territory: Pick<Territory, 'cities' | 'keywords'>): string[] {
  const queries: string[] = [];
  for (const city of territory.cities) {
    for (const keyword of territory.keywords) {
      queries.push(`${keyword} in ${city}`);
    }
  }
  return queries;
}

export function parseTerritory(raw: unknown): Territory {
  const result = territorySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid territory file: ${issues}`);
  }
  return result.data;
}

export function loadTerritory(filePath: string): Territory {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ValidationError(
      `Cannot read territory file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseTerritory(raw);
}
