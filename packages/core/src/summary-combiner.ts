import type { CombinedSummary } from "@transcript-digest/types";
import type { ITextGenerator } from "@transcript-digest/llm";
import { errorMessage } from "@transcript-digest/errors";
import { buildCombineMessages } from "./prompts.js";
import { countWords } from "./word-count.js";
import { EMPTY_RESPONSE_MESSAGE } from "./chunk-summarizer.js";

export const NO_SUMMARIES_MESSAGE = "No chunk summaries provided";
export const NO_VALID_SUMMARIES_MESSAGE = "No valid chunk summaries were provided to combine";

export interface CombineOptions {
  /** User guidance the combined summary should address. */
  notes?: string;
}

function failure(chunksProcessed: number, message: string): CombinedSummary {
  return { summary: "", success: false, chunksProcessed, errorMessage: message, wordCount: 0 };
}

/**
 * Merge chunk summaries, in the order given, into one summary with a single
 * generator call. Blank summaries are dropped first.
 */
export async function combineChunks(
  summaries: string[],
  model: string,
  generator: ITextGenerator,
  options?: CombineOptions,
): Promise<CombinedSummary> {
  if (summaries.length === 0) {
    return failure(0, NO_SUMMARIES_MESSAGE);
  }

  const valid = summaries.filter((s) => s.trim().length > 0);
  if (valid.length === 0) {
    return failure(0, NO_VALID_SUMMARIES_MESSAGE);
  }

  const messages = buildCombineMessages(valid, options?.notes);

  let response: string | null;
  try {
    response = await generator.generate(messages, model);
  } catch (err: unknown) {
    return failure(valid.length, `Combination failed: ${errorMessage(err)}`);
  }

  const summary = response?.trim() ?? "";
  if (summary.length === 0) {
    return failure(valid.length, EMPTY_RESPONSE_MESSAGE);
  }

  return {
    summary,
    success: true,
    chunksProcessed: valid.length,
    errorMessage: null,
    wordCount: countWords(summary),
  };
}
