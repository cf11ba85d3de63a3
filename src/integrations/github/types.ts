/**
 * Shared types for the GitHub pull request integration.
 */

export interface PrFilePatch {
  filename: string;
  patch?: string | null;
  status?: string;
}

export interface PullRequestRef {
  owner: string;
  repo: string;
  pullNumber: number;
  headRef: string;
  headSha: string;
  installationId?: number;
}

/**
 * The GitHub operations a pull request review needs. Implemented over
 * Octokit in production and faked in tests.
 */
export interface PullRequestGateway {
  listFiles(ref: PullRequestRef): Promise<PrFilePatch[]>;
  /** Raw .codecritic.yml at the head ref, or null when absent. */
  fetchConfig(ref: PullRequestRef): Promise<string | null>;
  postComment(ref: PullRequestRef, body: string): Promise<void>;
}

export interface PullRequestReviewOutcome {
  status: "reviewed" | "skipped";
  reviewedFiles: number;
  skippedFiles: number;
  totalIssues: number;
  score?: number;
  commentPosted: boolean;
}
