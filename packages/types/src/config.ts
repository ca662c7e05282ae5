export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: LogLevel;
  llm: LlmConfig;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LlmConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}
