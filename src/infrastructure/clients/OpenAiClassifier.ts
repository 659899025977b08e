/**
 * OpenAI Classifier
 * Layer: Infrastructure
 * Pattern: Adapter (implements IClassifier)
 *
 * Sends one chat completion per business asking for a JSON object with the
 * nine classification keys, then hands the reply to
 * parseClassificationOutput(). The SDK client is created on first use so a
 * missing OPENAI_API_KEY fails the classification call (per place, logged by
 * the pipeline) rather than application start-up. Transient failures are
 * retried by the SDK itself, bounded by config.http.retryAttempts.
 */
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Classification } from '@domain/entities/Place';
import type { ClassificationInput, IClassifier } from '@domain/interfaces/IClassifier';
import { AI_REASON_MAX_LENGTH } from '@shared/constants';
import { ConfigurationError } from '@shared/errors/AppError';
import OpenAI from 'openai';
import { inject, injectable } from 'tsyringe';

import { parseClassificationOutput } from './classificationOutput';

const SYSTEM_PROMPT =
  'You score local businesses as sales prospects for business mobility, security, VoIP and fleet tracking services.';

export function buildClassificationPrompt(input: ClassificationInput): string {
  const business = {
    name: input.name,
    address: input.address,
    primary_type: input.primaryType,
    website: input.website,
    homepage_text: input.homepageText,
  };

  return [
    'Return ONLY valid JSON. No markdown. No extra text.',
    'Keys required:',
    'industry_bucket, mobility_fit, security_fit, voip_fit, fleet_attach,',
    'signal_after_hours, signal_dispatch, signal_field_work, ai_reason.',
    'Rules:',
    '- fits are integers 0-100',
    '- signals are integers 0 or 1',
    `- ai_reason <= ${AI_REASON_MAX_LENGTH} chars`,
    '- Mobility is highest priority; Security then VoIP then Fleet.',
    '',
    `Business:\n${JSON.stringify(business)}`,
  ].join('\n');
}

@injectable()
export class OpenAiClassifier implements IClassifier {
  private client: OpenAI | null = null;

  constructor(
    @inject(TOKENS.Config) private config: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async classify(input: ClassificationInput): Promise<Classification> {
    const { model, maxOutputTokens } = this.config.openai;

    const completion = await this.getClient().chat.completions.create({
      model,
      temperature: 0.2,
      max_completion_tokens: maxOutputTokens,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildClassificationPrompt(input) },
      ],
    });

    const text = completion.choices[0]?.message?.content ?? '';
    const classification = parseClassificationOutput(text);

    this.log.debug(
      { name: input.name, bucket: classification.industryBucket, mobilityFit: classification.mobilityFit },
      'Classification received',
    );
    return classification;
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;

    const { apiKey, timeoutMs } = this.config.openai;
    if (!apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is not set');
    }

    this.client = new OpenAI({
      apiKey,
      timeout: timeoutMs,
      maxRetries: Math.max(0, this.config.http.retryAttempts - 1),
    });
    return this.client;
  }
}
