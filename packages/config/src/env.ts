import { z } from "zod";
import type { AppConfig } from "@transcript-digest/types";

export const DEFAULT_LLM_BASE_URL = "http://localhost:11434/v1";
export const DEFAULT_LLM_MODEL = "gemma3:12b";

/**
 * Zod schema for the environment variables documented in .env.example.
 * Every variable has a default so a local Ollama install works out of the box.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

  // ---------- LLM endpoint ----------
  LLM_BASE_URL: z
    .string()
    .default(DEFAULT_LLM_BASE_URL)
    .refine((url) => /^https?:\/\//.test(url), {
      message: "LLM_BASE_URL must start with http:// or https://",
    }),
  LLM_API_KEY: z.string().min(1, "LLM_API_KEY must not be empty").default("ollama"),
  LLM_MODEL: z.string().min(1, "LLM_MODEL must not be empty").default(DEFAULT_LLM_MODEL),
  LLM_TEMPERATURE: z.string().default("0").transform(Number).pipe(z.number().min(0).max(2)),
  LLM_TIMEOUT_MS: z
    .string()
    .default("600000")
    .transform(Number)
    .pipe(z.number().int().positive()),
});

/**
 * Parse and validate process.env (or any compatible record) into an {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    llm: {
      baseUrl: parsed.LLM_BASE_URL.replace(/\/$/, ""),
      apiKey: parsed.LLM_API_KEY,
      model: parsed.LLM_MODEL,
      temperature: parsed.LLM_TEMPERATURE,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
    },
  };
}
