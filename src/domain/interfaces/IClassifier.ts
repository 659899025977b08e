/**
 * Classifier Interfaces — Classification Collaborator
 * Layer: Domain
 *
 * The classifier turns a business's text fields into a validated
 * Classification or throws. The homepage fetcher supplies optional context
 * text and is allowed to fail without stopping classification.
 */
import type { Classification } from '@domain/entities/Place';

export interface ClassificationInput {
  name: string;
  address: string;
  primaryType: string | null;
  website: string | null;
  homepageText: string | null;
}

export interface IClassifier {
  classify(input: ClassificationInput): Promise<Classification>;
}

export interface IHomepageFetcher {
  /** Visible text of the page, whitespace-collapsed and truncated. */
  fetchText(url: string): Promise<string>;
}
