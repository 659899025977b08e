/**
 * Classification Output Parsing
 * Layer: Infrastructure
 *
 * Models return JSON wrapped in code fences, with chatter around it, or with
 * "85%" where an integer belongs. parseClassificationOutput() takes raw model
 * text and either returns a valid Classification or throws
 * ClassificationError:
 *
 *   1. strip fences, cut out the first {...} object;
 *   2. JSON.parse (unparseable → error with a 500-char snippet);
 *   3. strict schema check;
 *   4. on failure, normalise field by field (numbers pulled out of strings,
 *      clamped to range; defaults for bucket and reason) and check again.
 */
import type { Classification } from '@domain/entities/Place';
import { AI_REASON_MAX_LENGTH, INDUSTRY_BUCKET_MAX_LENGTH } from '@shared/constants';
import { ClassificationError } from '@shared/errors/AppError';
import { charLength, truncateChars } from '@shared/text';
import { z } from 'zod/v4';

const SNIPPET_LENGTH = 500;

const fit = z.number().int().min(0).max(100);
const signal = z.number().int().min(0).max(1);

export const classificationOutputSchema = z.object({
  industry_bucket: z.string(),
  mobility_fit: fit,
  security_fit: fit,
  voip_fit: fit,
  fleet_attach: fit,
  signal_after_hours: signal,
  signal_dispatch: signal,
  signal_field_work: signal,
  ai_reason: z.string().refine((reason) => charLength(reason) <= AI_REASON_MAX_LENGTH, {
    message: `ai_reason exceeds ${AI_REASON_MAX_LENGTH} characters`,
  }),
});

export type ClassificationOutput = z.infer<typeof classificationOutputSchema>;

export function stripFences(text: string): string {
  let s = text.trim();
  if (s.startsWith('```')) {
    s = s.replace(/^```[a-zA-Z]*\s*/, '').replace(/\s*```$/, '');
  }
  return s.trim();
}

/** The first `{...}` span (greedy to the last brace), or the stripped text when there is none. */
export function extractFirstJsonObject(text: string): string {
  const s = stripFences(text);
  const match = /\{[\s\S]*\}/.exec(s);
  return match ? match[0].trim() : s;
}

/** Coerce booleans, numbers and strings like "85%" or "85/100" to an integer in [lo, hi]. */
export function toBoundedInt(value: unknown, lo: number, hi: number): number {
  let v: number;
  if (typeof value === 'boolean') {
    v = value ? 1 : 0;
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    v = Math.round(value);
  } else if (typeof value === 'string') {
    const match = /-?\d+(\.\d+)?/.exec(value);
    v = match ? Math.round(parseFloat(match[0])) : lo;
  } else {
    v = lo;
  }
  return Math.min(Math.max(v, lo), hi);
}

export function normalizeClassificationOutput(obj: Record<string, unknown>): ClassificationOutput {
  const bucket = obj.industry_bucket;
  const reason = obj.ai_reason;

  return {
    industry_bucket: truncateChars(
      (bucket == null || bucket === '' ? 'Unknown' : String(bucket)).trim(),
      INDUSTRY_BUCKET_MAX_LENGTH,
    ),
    mobility_fit: toBoundedInt(obj.mobility_fit, 0, 100),
    security_fit: toBoundedInt(obj.security_fit, 0, 100),
    voip_fit: toBoundedInt(obj.voip_fit, 0, 100),
    fleet_attach: toBoundedInt(obj.fleet_attach, 0, 100),
    signal_after_hours: toBoundedInt(obj.signal_after_hours, 0, 1),
    signal_dispatch: toBoundedInt(obj.signal_dispatch, 0, 1),
    signal_field_work: toBoundedInt(obj.signal_field_work, 0, 1),
    ai_reason: truncateChars(
      (reason == null ? 'No reason provided.' : String(reason)).trim(),
      AI_REASON_MAX_LENGTH,
    ),
  };
}

export function toClassification(output: ClassificationOutput): Classification {
  return {
    industryBucket: output.industry_bucket,
    mobilityFit: output.mobility_fit,
    securityFit: output.security_fit,
    voipFit: output.voip_fit,
    fleetAttach: output.fleet_attach,
    signalAfterHours: output.signal_after_hours === 1,
    signalDispatch: output.signal_dispatch === 1,
    signalFieldWork: output.signal_field_work === 1,
    aiReason: output.ai_reason,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseClassificationOutput(rawText: string): Classification {
  const candidate = extractFirstJsonObject(rawText);

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    throw new ClassificationError(
      `Classifier output not parseable as JSON: ${candidate.slice(0, SNIPPET_LENGTH)}`,
    );
  }

  const strict = classificationOutputSchema.safeParse(parsed);
  if (strict.success) return toClassification(strict.data);

  if (!isRecord(parsed)) {
    throw new ClassificationError(
      `Classifier output is not a JSON object: ${candidate.slice(0, SNIPPET_LENGTH)}`,
    );
  }

  const repaired = classificationOutputSchema.safeParse(normalizeClassificationOutput(parsed));
  if (!repaired.success) {
    throw new ClassificationError(`Classifier output failed validation: ${repaired.error.message}`);
  }
  return toClassification(repaired.data);
}
