/**
 * HTTP Client — fetch with Timeout & Bounded Backoff
 * Layer: Infrastructure
 *
 * The only retry layer in the app. Every outbound call to a metered API goes
 * through send(): a per-request timeout, then up to `retryAttempts` tries with
 * exponential backoff (base delay doubling, capped) on transport failures,
 * timeouts, 429 and 5xx. Any other non-2xx fails immediately.
 *
 * Failures surface as UpstreamError with the upstream status (null when no
 * response arrived) and at most 300 characters of the body. JSON bodies are
 * validated against a Zod schema before they reach a caller.
 */
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { delay } from '@shared/async';
import { UpstreamError } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';
import type { z } from 'zod/v4';

const BODY_SNIPPET_LENGTH = 300;

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Serialised as JSON. */
  body?: unknown;
  timeoutMs?: number;
  /** Total tries including the first; defaults to config.http.retryAttempts. */
  attempts?: number;
}

export function isRetryable(err: unknown): boolean {
  if (!(err instanceof UpstreamError)) return false;
  const status = err.upstreamStatus;
  return status === null || status === 429 || status >= 500;
}

@injectable()
export class HttpClient {
  constructor(
    @inject(TOKENS.Config) private config: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async json<T>(url: string, schema: z.ZodType<T>, options: HttpRequestOptions = {}): Promise<T> {
    const response = await this.send(url, {
      ...options,
      headers: { Accept: 'application/json', ...options.headers },
    });

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new UpstreamError(
        `Invalid JSON from ${hostOf(url)}: ${err instanceof Error ? err.message : String(err)}`,
        response.status,
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new UpstreamError(`Unexpected response shape from ${hostOf(url)}: ${issues}`, response.status);
    }
    return parsed.data;
  }

  async text(url: string, options: HttpRequestOptions = {}): Promise<string> {
    const response = await this.send(url, options);
    return response.text();
  }

  private async send(url: string, options: HttpRequestOptions): Promise<Response> {
    const attempts = options.attempts ?? this.config.http.retryAttempts;
    const { retryBaseDelayMs, retryMaxDelayMs } = this.config.http;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.sendOnce(url, options);
      } catch (err) {
        if (!isRetryable(err) || attempt >= attempts) throw err;
        const backoffMs = Math.min(retryMaxDelayMs, retryBaseDelayMs * Math.pow(2, attempt - 1));
        this.log.warn(
          { host: hostOf(url), attempt, backoffMs, err: err instanceof Error ? err.message : String(err) },
          'HTTP request failed, retrying',
        );
        await delay(backoffMs);
      }
    }
  }

  private async sendOnce(url: string, options: HttpRequestOptions): Promise<Response> {
    const headers: Record<string, string> = { ...options.headers };
    const init: RequestInit = {
      method: options.method ?? 'GET',
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs ?? this.config.http.timeoutMs),
    };
    if (options.body !== undefined) {
      headers['Content-Type'] ??= 'application/json; charset=utf-8';
      init.body = JSON.stringify(options.body);
    }

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      throw new UpstreamError(
        `Request to ${hostOf(url)} failed: ${err instanceof Error ? err.message : String(err)}`,
        null,
      );
    }

    if (!response.ok) {
      const snippet = (await response.text()).slice(0, BODY_SNIPPET_LENGTH);
      throw new UpstreamError(`HTTP ${response.status}: ${snippet}`, response.status);
    }
    return response;
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}
