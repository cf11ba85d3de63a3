/**
 * LLM integration module.
 *
 * - One request per review, no retries, explicit timeout.
 * - Responses are returned as raw text; `parseReviewResponse` recovers the
 *   JSON and reports failures as values instead of throwing.
 */

export type {
  LlmProvider,
  LlmSettings,
  LlmClient,
  ReviewRequest,
  CallOptions,
  PromptPair,
  ParsedResponse,
  ParseFailure,
  ParseSuccess,
} from "./types";

export {
  LLM_PROVIDERS,
  DEFAULT_MODELS,
  GROQ_BASE_URL,
  RAW_RESPONSE_LIMIT,
} from "./types";

export { OpenAiCompatibleClient, createLlmClient, resolveLlmSettings } from "./client";
export { buildReviewPrompt, buildSystemPrompt, RESPONSE_FORMAT } from "./prompts";
export {
  parseReviewResponse,
  extractJsonCandidate,
  jsonCandidates,
  repairTrailingCommas,
  normalizeIssue,
  normalizeReview,
} from "./parsing";
export type { NormalizedReview } from "./parsing";
