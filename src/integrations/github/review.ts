/**
 * Patch-based pull request review: each changed file's patch is reviewed on
 * its own and the combined result is posted as a single comment.
 */

import { randomUUID } from "crypto";
import { CodeAnalyzer, fileErrorReview } from "../../analysis/analyzer";
import { isReviewableFile } from "../../analysis/files";
import { loadConfigFromString, createDefaultConfig, LoadedConfig } from "../../config/loader";
import { errorMessage, logger } from "../../logger";
import { ReviewResult } from "../../review/types";
import { buildReviewCommentBody } from "./comments";
import { PrFilePatch, PullRequestGateway, PullRequestRef, PullRequestReviewOutcome } from "./types";

export interface PullRequestReviewDeps {
  analyzer: CodeAnalyzer;
  gateway: PullRequestGateway;
}

/**
 * Split PR files into those to review and the number skipped.
 */
export function selectReviewCandidates(
  files: PrFilePatch[],
  config: LoadedConfig
): { candidates: Array<{ filename: string; patch: string }>; skipped: number } {
  const eligible: Array<{ filename: string; patch: string }> = [];
  for (const f of files) {
    if (f.patch && isReviewableFile(f.filename) && !config.isFileIgnored(f.filename)) {
      eligible.push({ filename: f.filename, patch: f.patch });
    }
  }

  const candidates = eligible.slice(0, config.files.max_files);
  return { candidates, skipped: files.length - candidates.length };
}

export function truncatePatch(patch: string, maxChars: number): string {
  return patch.length > maxChars ? patch.slice(0, maxChars) : patch;
}

async function loadRepoConfig(gateway: PullRequestGateway, ref: PullRequestRef): Promise<LoadedConfig> {
  try {
    const content = await gateway.fetchConfig(ref);
    return content === null ? createDefaultConfig() : loadConfigFromString(content);
  } catch (error) {
    logger.warn("[GitHub] Could not fetch repository config, using defaults", {
      repo: `${ref.owner}/${ref.repo}`,
      error: errorMessage(error),
    });
    return createDefaultConfig();
  }
}

export async function reviewPullRequest(
  ref: PullRequestRef,
  deps: PullRequestReviewDeps
): Promise<PullRequestReviewOutcome> {
  const { analyzer, gateway } = deps;
  const repoName = `${ref.owner}/${ref.repo}`;

  const config = await loadRepoConfig(gateway, ref);
  const files = await gateway.listFiles(ref);
  const { candidates, skipped } = selectReviewCandidates(files, config);

  if (candidates.length === 0) {
    logger.info("[GitHub] No reviewable files in pull request", {
      repo: repoName,
      pullNumber: ref.pullNumber,
      files: files.length,
    });
    return {
      status: "skipped",
      reviewedFiles: 0,
      skippedFiles: skipped,
      totalIssues: 0,
      commentPosted: false,
    };
  }

  logger.info("[GitHub] Reviewing pull request", {
    repo: repoName,
    pullNumber: ref.pullNumber,
    files: candidates.length,
    skipped,
    reviewType: config.review.type,
  });

  const started = Date.now();
  const result = new ReviewResult(randomUUID().slice(0, 8));

  for (const candidate of candidates) {
    try {
      const review = await analyzer.reviewCode({
        code: truncatePatch(candidate.patch, config.files.max_patch_chars),
        filename: candidate.filename,
        reviewType: config.review.type,
      });
      result.addFileReview(review);
    } catch (error) {
      logger.error("[GitHub] File review failed", {
        repo: repoName,
        pullNumber: ref.pullNumber,
        file: candidate.filename,
        error: errorMessage(error),
      });
      result.addFileReview(fileErrorReview(candidate.filename, error));
    }
  }

  analyzer.finalize(result, started);
  await gateway.postComment(ref, buildReviewCommentBody(result, skipped));

  return {
    status: "reviewed",
    reviewedFiles: candidates.length,
    skippedFiles: skipped,
    totalIssues: result.totalIssues,
    score: result.overallScore,
    commentPosted: true,
  };
}
