/**
 * Code review orchestration: detect the language, ask the model, recover its
 * answer and shape it into FileReview / ReviewResult records.
 *
 * A review never aborts on unparsable model output; it degrades to a single
 * informational issue. Transport failures propagate from `reviewCode`, and are
 * turned into per-file error reviews by `reviewMultiple`.
 */

import { randomUUID } from "crypto";
import type { Stats } from "fs";
import { readFile, stat } from "fs/promises";
import * as path from "path";
import { ReviewFileError } from "../errors";
import { errorMessage, logger } from "../logger";
import {
  CallOptions,
  LlmClient,
  ParseFailure,
  normalizeReview,
  parseReviewResponse,
} from "../integrations/llm";
import { FileReview, Issue, ReviewResult, ReviewType, SEVERITIES } from "../review/types";
import { detectLanguage } from "./detector";
import { scoreReviewResult } from "./scoring";

export interface ReviewCodeParams {
  code: string;
  filename?: string;
  language?: string;
  reviewType?: ReviewType;
}

const DEFAULT_FILENAME = "code";

/**
 * Number of lines in the text. A trailing line break does not open a new
 * line, and empty text has none.
 */
export function countLines(code: string): number {
  if (code === "") {
    return 0;
  }
  const lines = code.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.length;
}

export function parseFailureIssue(failure: ParseFailure): Issue {
  return {
    title: "Analysis Error",
    description: `Failed to analyze code: ${failure.error}: ${failure.parseError}`,
    severity: "info",
    category: "documentation",
    suggestion: "Please try again or check your code format",
  };
}

export function fileErrorReview(filePath: string, error: unknown): FileReview {
  return {
    filename: filePath,
    language: "unknown",
    linesOfCode: 0,
    issues: [
      {
        title: "File Processing Error",
        description: errorMessage(error),
        severity: "info",
        category: "documentation",
      },
    ],
  };
}

/**
 * One-line summary of a whole review.
 */
export function buildOverallSummary(result: ReviewResult): string {
  const total = result.totalIssues;
  if (total === 0) {
    return "✅ No issues found! The code looks good.";
  }

  const breakdown = result.severityBreakdown;
  const parts = SEVERITIES.filter((severity) => breakdown[severity] > 0).map(
    (severity) => `${breakdown[severity]} ${severity}`
  );

  let summary = `Found ${total} ${total === 1 ? "issue" : "issues"}: ${parts.join(", ")}.`;
  if (breakdown.critical > 0) {
    summary += " ⚠️ Critical issues require immediate attention!";
  }
  return summary;
}

/**
 * Decode file bytes as UTF-8, falling back to latin1 for invalid sequences.
 */
export function decodeSource(buffer: Buffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch (error) {
    logger.debug("Falling back to latin1 decoding", { error: errorMessage(error) });
    return buffer.toString("latin1");
  }
}

export class CodeAnalyzer {
  constructor(private readonly client: LlmClient) {}

  get provider(): string {
    return this.client.provider;
  }

  get model(): string {
    return this.client.model;
  }

  /**
   * Review a piece of code held in memory.
   */
  async reviewCode(params: ReviewCodeParams, options: CallOptions = {}): Promise<FileReview> {
    const filename = params.filename || DEFAULT_FILENAME;
    const reviewType = params.reviewType ?? "full";
    const language = params.language || detectLanguage({ code: params.code, filename: params.filename });
    const linesOfCode = countLines(params.code);

    const raw = await this.client.analyze(
      { code: params.code, language, filename, reviewType },
      options
    );
    const parsed = parseReviewResponse(raw);

    if (parsed.kind === "error") {
      logger.warn("Model response could not be parsed, degrading review", {
        filename,
        error: parsed.error,
        parseError: parsed.parseError,
      });
      return {
        filename,
        language,
        linesOfCode,
        issues: [parseFailureIssue(parsed)],
        summary: "Analysis encountered an error",
      };
    }

    const normalized = normalizeReview(parsed.data);
    if (normalized.dropped > 0) {
      logger.warn("Dropped malformed issue entries from model response", {
        filename,
        dropped: normalized.dropped,
        kept: normalized.issues.length,
      });
    }

    return {
      filename,
      language,
      linesOfCode,
      issues: normalized.issues,
      summary: normalized.summary,
    };
  }

  /**
   * Review a file from disk. The file name (not the full path) is reported.
   */
  async reviewFile(
    filePath: string,
    reviewType: ReviewType = "full",
    options: CallOptions = {}
  ): Promise<FileReview> {
    let stats: Stats;
    try {
      stats = await stat(filePath);
    } catch (error) {
      throw new ReviewFileError(`File not found: ${filePath}`, filePath, { cause: error });
    }
    if (!stats.isFile()) {
      throw new ReviewFileError(`Not a file: ${filePath}`, filePath);
    }

    const code = decodeSource(await readFile(filePath));
    return this.reviewCode({ code, filename: path.basename(filePath), reviewType }, options);
  }

  /**
   * Review several files one after another. A failure on one file becomes an
   * error review for that file; the rest of the batch continues.
   */
  async reviewMultiple(
    files: readonly string[],
    reviewType: ReviewType = "full",
    options: CallOptions = {}
  ): Promise<ReviewResult> {
    const started = Date.now();
    const result = new ReviewResult(randomUUID().slice(0, 8));

    for (const filePath of files) {
      try {
        result.addFileReview(await this.reviewFile(filePath, reviewType, options));
      } catch (error) {
        logger.error("File review failed", { file: filePath, error: errorMessage(error) });
        result.addFileReview(fileErrorReview(filePath, error));
      }
    }

    return this.finalize(result, started);
  }

  /**
   * Review one file and wrap it in a ReviewResult. Unlike `reviewMultiple`,
   * errors propagate.
   */
  async reviewSingleFile(
    filePath: string,
    reviewType: ReviewType = "full",
    options: CallOptions = {}
  ): Promise<ReviewResult> {
    const started = Date.now();
    const result = new ReviewResult(randomUUID().slice(0, 8));
    result.addFileReview(await this.reviewFile(filePath, reviewType, options));
    return this.finalize(result, started);
  }

  /**
   * Fill in timing, summary and score once every file is in.
   */
  finalize(result: ReviewResult, startedAt: number): ReviewResult {
    result.reviewTimeMs = Date.now() - startedAt;
    result.overallSummary = buildOverallSummary(result);
    result.overallScore = scoreReviewResult(result);

    logger.info("Review completed", {
      reviewId: result.id,
      files: result.files.length,
      totalIssues: result.totalIssues,
      score: result.overallScore,
      durationMs: result.reviewTimeMs,
    });
    return result;
  }
}
