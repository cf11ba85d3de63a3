/**
 * Review data model shared by the analyzer, the reporters and every surface.
 */

// ============================================================================
// Enumerations
// ============================================================================

/**
 * Ordinal importance of an issue, most severe first.
 */
export const SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const ISSUE_CATEGORIES = [
  "security",
  "bug",
  "performance",
  "style",
  "best_practice",
  "documentation",
] as const;
export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

/**
 * Changes how the model is asked, never how the result is scored.
 */
export const REVIEW_TYPES = ["full", "security", "quick"] as const;
export type ReviewType = (typeof REVIEW_TYPES)[number];

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

export function isIssueCategory(value: string): value is IssueCategory {
  return ISSUE_CATEGORIES.some((c) => c === value);
}

export function isReviewType(value: string): value is ReviewType {
  return REVIEW_TYPES.some((t) => t === value);
}

// ============================================================================
// Entities
// ============================================================================

export interface Issue {
  readonly title: string;
  readonly description: string;
  readonly severity: Severity;
  readonly category: IssueCategory;
  readonly lineStart?: number;
  readonly lineEnd?: number;
  readonly codeSnippet?: string;
  readonly suggestion?: string;
  readonly suggestedCode?: string;
}

export interface FileReview {
  filename: string;
  language: string;
  linesOfCode: number;
  issues: readonly Issue[];
  summary?: string;
}

export type SeverityBreakdown = Record<Severity, number>;

export function emptyBreakdown(): SeverityBreakdown {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
}

/**
 * Count issues per severity. Every severity is present, zeros included.
 */
export function countBySeverity(issues: readonly Issue[]): SeverityBreakdown {
  const counts = emptyBreakdown();
  for (const issue of issues) {
    counts[issue.severity] += 1;
  }
  return counts;
}

export interface ReviewResultJson {
  id: string;
  timestamp: string;
  files: FileReview[];
  totalIssues: number;
  reviewTimeMs: number;
  severityBreakdown: SeverityBreakdown;
  overallSummary?: string;
  overallScore?: number;
}

/**
 * A multi-file review. Files are only added through `addFileReview`, which
 * keeps `totalIssues` equal to the number of issues across all files.
 */
export class ReviewResult {
  readonly id: string;
  readonly timestamp: Date;
  reviewTimeMs = 0;
  overallSummary?: string;
  overallScore?: number;

  private readonly fileReviews: FileReview[] = [];
  private issueTotal = 0;

  constructor(id: string, timestamp: Date = new Date()) {
    this.id = id;
    this.timestamp = timestamp;
  }

  get files(): readonly FileReview[] {
    return this.fileReviews;
  }

  get totalIssues(): number {
    return this.issueTotal;
  }

  addFileReview(fileReview: FileReview): void {
    this.fileReviews.push(fileReview);
    this.issueTotal += fileReview.issues.length;
  }

  get severityBreakdown(): SeverityBreakdown {
    const counts = emptyBreakdown();
    for (const file of this.fileReviews) {
      for (const issue of file.issues) {
        counts[issue.severity] += 1;
      }
    }
    return counts;
  }

  toJSON(): ReviewResultJson {
    return {
      id: this.id,
      timestamp: this.timestamp.toISOString(),
      files: [...this.fileReviews],
      totalIssues: this.issueTotal,
      reviewTimeMs: this.reviewTimeMs,
      severityBreakdown: this.severityBreakdown,
      overallSummary: this.overallSummary,
      overallScore: this.overallScore,
    };
  }
}
