import dotenv from "dotenv";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from "./integrations/llm/types";

dotenv.config();

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  PORT: process.env.PORT || "8000",
  LLM_PROVIDER: process.env.LLM_PROVIDER || "groq",
  GROQ_API_KEY: process.env.GROQ_API_KEY,
  GROQ_MODEL: process.env.GROQ_MODEL,
  GROQ_BASE_URL: process.env.GROQ_BASE_URL,
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  OPENAI_MODEL: process.env.OPENAI_MODEL,
  LLM_TEMPERATURE: numberFromEnv(process.env.LLM_TEMPERATURE, DEFAULT_TEMPERATURE),
  LLM_MAX_TOKENS: numberFromEnv(process.env.LLM_MAX_TOKENS, DEFAULT_MAX_TOKENS),
  LLM_TIMEOUT_MS: numberFromEnv(process.env.LLM_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
  GITHUB_APP_ID: process.env.GITHUB_APP_ID,
  GITHUB_PRIVATE_KEY: process.env.GITHUB_PRIVATE_KEY,
  GITHUB_WEBHOOK_SECRET: process.env.GITHUB_WEBHOOK_SECRET,
  GITHUB_TOKEN: process.env.GITHUB_TOKEN,
};

export type AppConfig = typeof config;
