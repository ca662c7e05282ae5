import type { ChatMessage } from "@transcript-digest/types";

/**
 * The single seam between the summarization core and an AI service.
 *
 * Resolves to the generated text, or `null` when the service produced nothing
 * usable. Transport and API failures reject.
 */
export interface ITextGenerator {
  readonly name: string;
  generate(messages: ChatMessage[], model: string): Promise<string | null>;
}
