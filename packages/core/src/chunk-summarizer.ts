import type { ChunkSummary } from "@transcript-digest/types";
import type { ITextGenerator } from "@transcript-digest/llm";
import { errorMessage } from "@transcript-digest/errors";
import { buildChunkSummaryMessages } from "./prompts.js";
import { countWords } from "./word-count.js";

export const EMPTY_CHUNK_MESSAGE = "Empty chunk content provided";
export const INVALID_INDEX_MESSAGE = "Chunk index must be a non-negative integer";
export const EMPTY_RESPONSE_MESSAGE = "AI client returned no response or empty response";

export interface SummarizeChunkOptions {
  /** User guidance the summary should address. */
  notes?: string;
}

function failure(chunkIndex: number, message: string): ChunkSummary {
  return { summary: "", chunkIndex, success: false, errorMessage: message, wordCount: 0 };
}

/**
 * Summarize one transcript chunk with a single generator call.
 *
 * Never rejects: empty input, empty responses and generator errors all
 * come back as a failed {@link ChunkSummary}.
 */
export async function summarizeChunk(
  content: string,
  chunkIndex: number,
  model: string,
  generator: ITextGenerator,
  options?: SummarizeChunkOptions,
): Promise<ChunkSummary> {
  if (content.trim().length === 0) {
    return failure(chunkIndex, EMPTY_CHUNK_MESSAGE);
  }
  if (!Number.isInteger(chunkIndex) || chunkIndex < 0) {
    return failure(chunkIndex, INVALID_INDEX_MESSAGE);
  }

  const messages = buildChunkSummaryMessages(content, chunkIndex + 1, options?.notes);

  let response: string | null;
  try {
    response = await generator.generate(messages, model);
  } catch (err: unknown) {
    return failure(chunkIndex, `Summarization failed: ${errorMessage(err)}`);
  }

  const summary = response?.trim() ?? "";
  if (summary.length === 0) {
    return failure(chunkIndex, EMPTY_RESPONSE_MESSAGE);
  }

  return {
    summary,
    chunkIndex,
    success: true,
    errorMessage: null,
    wordCount: countWords(summary),
  };
}
