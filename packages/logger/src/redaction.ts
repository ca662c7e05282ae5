/**
 * Log redaction paths.
 *
 * The LLM endpoint key travels inside config objects, so every sensitive key is
 * covered both at the top level and one level down (e.g. `llm.apiKey`).
 */

export const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS = ["apiKey", "api_key", "authorization", "token", "secret"] as const;

export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];
