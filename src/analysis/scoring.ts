/**
 * Quality score computation.
 *
 * A score starts at 100 and loses a fixed number of points per issue
 * depending on its severity, clamped at 0. The same formula scores a single
 * file and an aggregate review (over the combined severity breakdown).
 *
 * Penalties:
 * - critical: -25
 * - high: -15
 * - medium: -8
 * - low: -3
 * - info: -1
 */

import {
  FileReview,
  ReviewResult,
  Severity,
  SeverityBreakdown,
  countBySeverity,
} from "../review/types";

export const SEVERITY_PENALTIES: Readonly<Record<Severity, number>> = {
  critical: 25,
  high: 15,
  medium: 8,
  low: 3,
  info: 1,
};

export function computeQualityScore(breakdown: SeverityBreakdown): number {
  const penalty =
    breakdown.critical * SEVERITY_PENALTIES.critical +
    breakdown.high * SEVERITY_PENALTIES.high +
    breakdown.medium * SEVERITY_PENALTIES.medium +
    breakdown.low * SEVERITY_PENALTIES.low +
    breakdown.info * SEVERITY_PENALTIES.info;

  return Math.min(100, Math.max(0, 100 - penalty));
}

export function scoreFileReview(review: FileReview): number {
  return computeQualityScore(countBySeverity(review.issues));
}

export function scoreReviewResult(result: ReviewResult): number {
  return computeQualityScore(result.severityBreakdown);
}

/**
 * Human-readable label for a score.
 */
export function qualityLabel(score: number): string {
  if (score >= 90) {
    return "Excellent";
  } else if (score >= 75) {
    return "Good";
  } else if (score >= 60) {
    return "Fair";
  } else if (score >= 40) {
    return "Poor";
  }
  return "Critical";
}
