/**
 * LLM integration types and constants.
 */

import { ReviewType } from "../../review/types";

// ============================================================================
// Providers
// ============================================================================

export type LlmProvider = "groq" | "openai";

export const LLM_PROVIDERS: readonly LlmProvider[] = ["groq", "openai"];

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

export const DEFAULT_MODELS: Readonly<Record<LlmProvider, string>> = {
  groq: "llama-3.3-70b-versatile",
  openai: "gpt-4o-mini",
};

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Settings for one client instance. The provider tag selects the endpoint.
 */
export type LlmSettings =
  | {
      provider: "groq";
      apiKey?: string;
      model: string;
      baseURL: string;
      temperature: number;
      maxTokens: number;
      timeoutMs: number;
    }
  | {
      provider: "openai";
      apiKey?: string;
      model: string;
      baseURL?: string;
      temperature: number;
      maxTokens: number;
      timeoutMs: number;
    };

// ============================================================================
// Requests
// ============================================================================

export interface ReviewRequest {
  code: string;
  language: string;
  filename: string;
  reviewType: ReviewType;
}

export interface CallOptions {
  /** Aborts the in-flight request when the caller is cancelled. */
  signal?: AbortSignal;
}

export interface PromptPair {
  system: string;
  user: string;
}

/**
 * The one capability the analyzer needs from a model: send a review request
 * and hand back whatever text came out.
 */
export interface LlmClient {
  readonly provider: LlmProvider;
  readonly model: string;
  analyze(request: ReviewRequest, options?: CallOptions): Promise<string>;
}

// ============================================================================
// Parsed responses
// ============================================================================

/** Longest prefix of an unparsable response kept for diagnostics. */
export const RAW_RESPONSE_LIMIT = 500;

export interface ParseFailure {
  kind: "error";
  error: string;
  rawResponse: string;
  parseError: string;
}

export interface ParseSuccess {
  kind: "parsed";
  data: Record<string, unknown>;
}

export type ParsedResponse = ParseSuccess | ParseFailure;
