/**
 * Homepage Fetcher
 * Layer: Infrastructure
 *
 * Pulls a business's homepage once (no retries: it is optional context for
 * the classifier) and reduces it to the visible body text with cheerio,
 * truncated to config.homepage.maxChars.
 */
import type { AppConfig } from '@core/config';
import { TOKENS } from '@core/types';
import type { IHomepageFetcher } from '@domain/interfaces/IClassifier';
import { HttpClient } from '@infrastructure/http/HttpClient';
import { truncateChars } from '@shared/text';
import * as cheerio from 'cheerio';
import { inject, injectable } from 'tsyringe';

const USER_AGENT = 'territory-intel/1.0';

/** Body text with entities decoded; comments and script, style and noscript content dropped. */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  // Adjacent blocks would otherwise run together ("dispatchTowing").
  $('body *').after(' ');
  return $('body').text().replace(/\s+/g, ' ').trim();
}

@injectable()
export class HomepageFetcher implements IHomepageFetcher {
  constructor(
    @inject(TOKENS.Config) private config: AppConfig,
    @inject(TOKENS.HttpClient) private http: HttpClient,
  ) {}

  async fetchText(url: string): Promise<string> {
    const html = await this.http.text(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml',
      },
      timeoutMs: this.config.homepage.timeoutMs,
      attempts: 1,
    });
    return truncateChars(htmlToText(html), this.config.homepage.maxChars);
  }
}
