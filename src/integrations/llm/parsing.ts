/**
 * JSON recovery and normalization for model responses.
 *
 * Models are asked for bare JSON but often wrap it in prose or code fences,
 * or leave trailing commas behind. Recovery is narrow: try a few candidate
 * regions of the text, parse, strip trailing commas, parse once more.
 * Anything else is reported back as a ParseFailure value.
 */

import { logger } from "../../logger";
import {
  Issue,
  IssueCategory,
  Severity,
  isIssueCategory,
  isSeverity,
} from "../../review/types";
import { ParsedResponse, RAW_RESPONSE_LIMIT } from "./types";

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/i;

function braceSpan(content: string): string | undefined {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  return start !== -1 && end > start ? content.slice(start, end + 1).trim() : undefined;
}

/**
 * Regions of the text that may hold the JSON document, most likely first:
 * the first fenced block, the widest `{ ... }` span, the whole text. Each is
 * trimmed; duplicates are dropped.
 *
 * The later regions matter when a string value itself contains a fence
 * (`suggested_code` often does), which cuts the fenced block short.
 */
export function jsonCandidates(content: string): string[] {
  const candidates: string[] = [];
  const fenced = FENCED_BLOCK.exec(content);
  if (fenced) {
    candidates.push(fenced[1].trim());
  }
  const span = braceSpan(content);
  if (span !== undefined) {
    candidates.push(span);
  }
  candidates.push(content.trim());
  return [...new Set(candidates)];
}

/**
 * The most likely JSON region of the text.
 */
export function extractJsonCandidate(content: string): string {
  return jsonCandidates(content)[0];
}

/**
 * Drop a comma that directly precedes a closing brace or bracket.
 *
 * This is textual: a string value that itself contains `,}` or `, ]` is
 * rewritten too. Input with other defects (unquoted keys, single quotes,
 * truncation) stays unparsable.
 */
export function repairTrailingCommas(candidate: string): string {
  return candidate.replace(/,\s*}/g, "}").replace(/,\s*]/g, "]");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return "array";
  if (value === null) return "null";
  return typeof value;
}

type Attempt = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParse(text: string): Attempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Recover the structured review from raw model output. Never throws.
 *
 * Every candidate is tried strictly before any is repaired, so valid JSON
 * gives the same result bare or fenced.
 */
export function parseReviewResponse(content: string): ParsedResponse {
  const candidates = jsonCandidates(content);
  let firstError: unknown;
  let wrongShape: unknown;
  let sawWrongShape = false;

  for (const repair of [false, true]) {
    for (const candidate of candidates) {
      const text = repair ? repairTrailingCommas(candidate) : candidate;
      if (repair && text === candidate) {
        continue;
      }

      const attempt = tryParse(text);
      if (!attempt.ok) {
        if (firstError === undefined) {
          firstError = attempt.error;
        }
        continue;
      }
      if (isRecord(attempt.value)) {
        if (repair) {
          logger.debug("[LLM] Parsed response after trailing comma repair");
        }
        return { kind: "parsed", data: attempt.value };
      }
      if (!sawWrongShape) {
        sawWrongShape = true;
        wrongShape = attempt.value;
      }
    }
  }

  const rawResponse = candidates[0].slice(0, RAW_RESPONSE_LIMIT);

  if (sawWrongShape) {
    return {
      kind: "error",
      error: "Unexpected LLM response shape",
      rawResponse,
      parseError: `Expected a JSON object but got ${describeValue(wrongShape)}`,
    };
  }

  const parseError = firstError instanceof Error ? firstError.message : String(firstError);
  logger.warn("[LLM] Failed to parse model response", { error: parseError, candidates: candidates.length });
  return {
    kind: "error",
    error: "Failed to parse LLM response",
    rawResponse,
    parseError,
  };
}

// ============================================================================
// Normalization
// ============================================================================

export interface NormalizedReview {
  summary?: string;
  qualityScore?: number;
  issues: Issue[];
  /** Entries in `issues` that were not JSON objects and were skipped. */
  dropped: number;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function optionalLine(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

function normalizeSeverity(value: unknown): Severity {
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (isSeverity(lowered)) {
      return lowered;
    }
  }
  return "medium";
}

function normalizeCategory(value: unknown): IssueCategory {
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (isIssueCategory(lowered)) {
      return lowered;
    }
  }
  return "best_practice";
}

/**
 * Map one issue object from the model onto an Issue. Returns null for
 * entries that are not objects.
 */
export function normalizeIssue(item: unknown): Issue | null {
  if (!isRecord(item)) {
    return null;
  }

  return {
    title: optionalString(item.title) ?? "Unknown Issue",
    description: optionalString(item.description) ?? "No description provided",
    severity: normalizeSeverity(item.severity),
    category: normalizeCategory(item.category),
    lineStart: optionalLine(item.line_start),
    lineEnd: optionalLine(item.line_end),
    codeSnippet: optionalString(item.code_snippet),
    suggestion: optionalString(item.suggestion),
    suggestedCode: optionalString(item.suggested_code),
  };
}

/**
 * Validate and normalize a parsed response body.
 */
export function normalizeReview(data: Record<string, unknown>): NormalizedReview {
  const issues: Issue[] = [];
  let dropped = 0;

  if (Array.isArray(data.issues)) {
    for (const item of data.issues) {
      const issue = normalizeIssue(item);
      if (issue) {
        issues.push(issue);
      } else {
        dropped += 1;
      }
    }
  } else if (data.issues !== undefined) {
    logger.warn("[LLM] Response field 'issues' is not an array, ignoring it");
  }

  const score = data.quality_score;
  const qualityScore =
    typeof score === "number" && Number.isFinite(score)
      ? Math.min(100, Math.max(0, Math.round(score)))
      : undefined;

  return {
    summary: optionalString(data.summary)?.trim(),
    qualityScore,
    issues,
    dropped,
  };
}
