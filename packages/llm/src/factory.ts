import type { LlmConfig } from "@transcript-digest/types";
import type { ITextGenerator } from "./text-generator.interface.js";
import { OpenAICompatibleGenerator } from "./openai-generator.js";

export function createTextGenerator(config: LlmConfig): ITextGenerator {
  return new OpenAICompatibleGenerator({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs,
  });
}
