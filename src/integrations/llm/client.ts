/**
 * OpenAI-compatible chat completion client (Groq or OpenAI).
 */

import OpenAI from "openai";
import { AppConfig } from "../../env";
import { ConfigurationError, TransportError, httpStatusOf } from "../../errors";
import { logger } from "../../logger";
import { buildReviewPrompt } from "./prompts";
import {
  CallOptions,
  DEFAULT_MODELS,
  GROQ_BASE_URL,
  LLM_PROVIDERS,
  LlmClient,
  LlmProvider,
  LlmSettings,
  ReviewRequest,
} from "./types";

function isProvider(value: string): value is LlmProvider {
  return LLM_PROVIDERS.some((p) => p === value);
}

type LlmEnv = Pick<
  AppConfig,
  | "LLM_PROVIDER"
  | "GROQ_API_KEY"
  | "GROQ_MODEL"
  | "GROQ_BASE_URL"
  | "OPENAI_API_KEY"
  | "OPENAI_MODEL"
  | "LLM_TEMPERATURE"
  | "LLM_MAX_TOKENS"
  | "LLM_TIMEOUT_MS"
>;

/**
 * Turn environment configuration into client settings for the selected provider.
 */
export function resolveLlmSettings(env: LlmEnv, providerOverride?: string): LlmSettings {
  const provider = (providerOverride || env.LLM_PROVIDER).toLowerCase();
  if (!isProvider(provider)) {
    throw new ConfigurationError(
      `Unknown LLM provider "${provider}". Expected one of: ${LLM_PROVIDERS.join(", ")}`
    );
  }

  const shared = {
    temperature: env.LLM_TEMPERATURE,
    maxTokens: env.LLM_MAX_TOKENS,
    timeoutMs: env.LLM_TIMEOUT_MS,
  };

  if (provider === "groq") {
    return {
      provider,
      apiKey: env.GROQ_API_KEY,
      model: env.GROQ_MODEL || DEFAULT_MODELS.groq,
      baseURL: env.GROQ_BASE_URL || GROQ_BASE_URL,
      ...shared,
    };
  }

  return {
    provider,
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL || DEFAULT_MODELS.openai,
    ...shared,
  };
}

function credentialName(provider: LlmProvider): string {
  return provider === "groq" ? "GROQ_API_KEY" : "OPENAI_API_KEY";
}

/**
 * Sends exactly one chat completion per review. The SDK's own retries are
 * turned off; a failed call surfaces as a TransportError.
 */
export class OpenAiCompatibleClient implements LlmClient {
  readonly provider: LlmProvider;
  readonly model: string;

  private readonly openai: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(settings: LlmSettings) {
    if (!settings.apiKey) {
      throw new ConfigurationError(
        `${settings.provider} API key not found. Set ${credentialName(settings.provider)} or pass apiKey.`
      );
    }

    this.provider = settings.provider;
    this.model = settings.model;
    this.temperature = settings.temperature;
    this.maxTokens = settings.maxTokens;
    this.openai = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseURL,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async analyze(request: ReviewRequest, options: CallOptions = {}): Promise<string> {
    const { system, user } = buildReviewPrompt(request);
    const started = Date.now();

    let content: string | null | undefined;
    try {
      const completion = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: system },
            { role: "user", content: user },
          ],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        },
        { signal: options.signal }
      );
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown error";
      logger.error("[LLM] API call failed", {
        provider: this.provider,
        model: this.model,
        filename: request.filename,
        error: message,
      });
      throw new TransportError(`LLM request failed: ${message}`, {
        cause: error,
        status: httpStatusOf(error),
      });
    }

    logger.debug("[LLM] Completion received", {
      provider: this.provider,
      filename: request.filename,
      durationMs: Date.now() - started,
    });

    if (!content) {
      logger.warn("[LLM] Empty response from model", { filename: request.filename });
      return "";
    }
    return content;
  }
}

/**
 * Build the client for the configured provider. Both providers speak the
 * OpenAI chat completion protocol; only the endpoint and model differ.
 */
export function createLlmClient(settings: LlmSettings): LlmClient {
  const client = new OpenAiCompatibleClient(settings);
  logger.info("[LLM] Client configured", {
    provider: settings.provider,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
  });
  return client;
}
