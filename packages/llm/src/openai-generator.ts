import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ChatMessage } from "@transcript-digest/types";
import { ExternalServiceError, errorMessage } from "@transcript-digest/errors";
import type { ITextGenerator } from "./text-generator.interface.js";

const DEFAULT_TEMPERATURE = 0;
const DEFAULT_TIMEOUT_MS = 600_000;

export interface OpenAIGeneratorConfig {
  baseUrl: string;
  apiKey: string;
  temperature?: number;
  timeoutMs?: number;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

/**
 * Chat-completions generator for any OpenAI-compatible endpoint.
 * The default configuration targets a local Ollama server (`/v1` API).
 * Retries are disabled; a failed call surfaces immediately.
 */
export class OpenAICompatibleGenerator implements ITextGenerator {
  readonly name = "openai-compatible";
  readonly temperature: number;
  private client: OpenAI;

  constructor(config: OpenAIGeneratorConfig) {
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.client = new OpenAI({
      baseURL: config.baseUrl,
      apiKey: config.apiKey,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async generate(messages: ChatMessage[], model: string): Promise<string | null> {
    let content: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create({
        model,
        messages: messages.map(toMessageParam),
        temperature: this.temperature,
      });
      content = response.choices[0]?.message.content;
    } catch (err: unknown) {
      throw new ExternalServiceError(`Text generation failed: ${errorMessage(err)}`, this.name, {
        details: { model },
        cause: err,
      });
    }

    if (!content || content.trim().length === 0) return null;
    return content.trim();
  }
}
