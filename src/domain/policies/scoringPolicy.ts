/**
 * Scoring Policy — Mobility-First Weighted Score
 * Layer: Domain
 *
 * Pure function of the four fit scores plus four boost signals. Weights sum
 * to 1, each boost adds 5, and the result is capped to [0, 100].
 */
export interface ScoreInput {
  mobilityFit: number | null;
  securityFit: number | null;
  voipFit: number | null;
  fleetAttach: number | null;
  rating: number | null;
  reviewCount: number | null;
  hasWebsite: boolean;
  hasOpeningHours: boolean;
}

export const SCORE_WEIGHTS = {
  mobility: 0.55,
  security: 0.2,
  voip: 0.15,
  fleet: 0.1,
} as const;

export const SCORE_BOOST = 5;
export const HIGH_RATING_THRESHOLD = 4.2;
export const REVIEW_COUNT_THRESHOLD = 10;

export function computeScore(input: ScoreInput): number {
  let score =
    SCORE_WEIGHTS.mobility * (input.mobilityFit ?? 0) +
    SCORE_WEIGHTS.security * (input.securityFit ?? 0) +
    SCORE_WEIGHTS.voip * (input.voipFit ?? 0) +
    SCORE_WEIGHTS.fleet * (input.fleetAttach ?? 0);

  if (input.rating !== null && input.rating >= HIGH_RATING_THRESHOLD) score += SCORE_BOOST;
  if (input.reviewCount !== null && input.reviewCount >= REVIEW_COUNT_THRESHOLD) {
    score += SCORE_BOOST;
  }
  if (input.hasWebsite) score += SCORE_BOOST;
  if (input.hasOpeningHours) score += SCORE_BOOST;

  return Math.min(Math.max(score, 0), 100);
}
