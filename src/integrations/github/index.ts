/**
 * GitHub integration module: signature-verified pull request webhooks and
 * per-file patch reviews posted back as a comment.
 */

export { createWebhooks, registerEventHandlers, isWebhookEventName } from "./webhooks";
export type { WebhookDeps } from "./webhooks";
export { reviewPullRequest, selectReviewCandidates, truncatePatch } from "./review";
export { buildReviewCommentBody, COMMENT_FOOTER } from "./comments";
export { createOctokit, createPullRequestGateway, OctokitPullRequestGateway } from "./client";

export type {
  PrFilePatch,
  PullRequestRef,
  PullRequestGateway,
  PullRequestReviewOutcome,
} from "./types";
