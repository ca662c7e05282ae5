import type {
  ChunkParameters,
  ChunkSummary,
  SummarizationFailure,
  SummarizationResult,
  SummarizationSuccess,
  SummaryStrategy,
} from "@transcript-digest/types";
import type { ITextGenerator } from "@transcript-digest/llm";
import { BoundaryChunker, computeChunkParameters, estimateTokens } from "@transcript-digest/chunker";
import type { IChunker } from "@transcript-digest/chunker";
import { createSilentLogger } from "@transcript-digest/logger";
import type { Logger } from "@transcript-digest/logger";
import { summarizeChunk } from "./chunk-summarizer.js";
import { combineChunks } from "./summary-combiner.js";
import { countWords } from "./word-count.js";

export const ALL_CHUNKS_FAILED_MESSAGE = "Failed to summarize any chunks";

export interface SummarizationDependencies {
  generator: ITextGenerator;
  /** Model identifier passed to every generator call. */
  model: string;
  /**
   * User guidance. Sent with the single call of the direct strategy, or with
   * the combine step of the hierarchical one.
   */
  notes?: string;
  logger?: Logger;
  chunker?: IChunker;
}

/**
 * Summarization pipeline: Classify -> (Direct | Chunk -> Summarize each -> Combine)
 *
 * Every generator call is awaited before the next one starts. The result is
 * always resolved; failures are reported through `success: false`.
 */
export async function summarizeTranscript(
  transcript: string,
  deps: SummarizationDependencies,
): Promise<SummarizationResult> {
  const logger = deps.logger ?? createSilentLogger();
  const parameters = computeChunkParameters(transcript);

  logger.info(
    {
      characters: transcript.length,
      estimatedTokens: estimateTokens(transcript),
      category: parameters.category,
      hierarchical: parameters.shouldUseHierarchical,
    },
    "Analyzed transcript",
  );

  if (!parameters.shouldUseHierarchical) {
    return summarizeDirect(transcript, parameters, deps, logger);
  }
  return summarizeHierarchical(transcript, parameters, deps, logger);
}

async function summarizeDirect(
  transcript: string,
  parameters: ChunkParameters,
  deps: SummarizationDependencies,
  logger: Logger,
): Promise<SummarizationResult> {
  const result = await summarizeChunk(transcript, 0, deps.model, deps.generator, {
    notes: deps.notes,
  });

  if (!result.success) {
    const errorMessage = result.errorMessage ?? "Summarization failed";
    logger.error({ error: errorMessage }, "Direct summary failed");
    return failed("direct", parameters, errorMessage, 1, [0]);
  }

  logger.info({ words: result.wordCount }, "Direct summary created");
  return succeeded("direct", parameters, result.summary, "direct", 1, []);
}

async function summarizeHierarchical(
  transcript: string,
  parameters: ChunkParameters,
  deps: SummarizationDependencies,
  logger: Logger,
): Promise<SummarizationResult> {
  const chunker = deps.chunker ?? new BoundaryChunker();
  const chunks = chunker.chunk(transcript, {
    chunkSize: parameters.chunkSize,
    chunkOverlap: parameters.chunkOverlap,
  });
  logger.info(
    { chunks: chunks.length, chunkSize: parameters.chunkSize, overlap: parameters.chunkOverlap },
    "Created chunks",
  );

  const summaries: ChunkSummary[] = [];
  const failedChunks: number[] = [];

  for (const chunk of chunks) {
    const result = await summarizeChunk(chunk.content, chunk.chunkIndex, deps.model, deps.generator);

    if (result.success) {
      summaries.push(result);
      logger.info({ chunk: chunk.chunkIndex + 1, words: result.wordCount }, "Summarized chunk");
    } else {
      failedChunks.push(chunk.chunkIndex);
      logger.warn(
        { chunk: chunk.chunkIndex + 1, error: result.errorMessage },
        "Failed to summarize chunk",
      );
    }
  }

  if (summaries.length === 0) {
    logger.error({ chunks: chunks.length }, ALL_CHUNKS_FAILED_MESSAGE);
    return failed("hierarchical", parameters, ALL_CHUNKS_FAILED_MESSAGE, chunks.length, failedChunks);
  }

  const texts = summaries.map((s) => s.summary);
  logger.info({ summaries: texts.length }, "Combining chunk summaries");

  const combined = await combineChunks(texts, deps.model, deps.generator, { notes: deps.notes });

  if (combined.success) {
    logger.info({ words: combined.wordCount }, "Combined summary created");
    return succeeded("hierarchical", parameters, combined.summary, "combined", chunks.length, failedChunks);
  }

  logger.warn(
    { error: combined.errorMessage },
    "Failed to combine summaries; joining chunk summaries instead",
  );
  return succeeded(
    "hierarchical",
    parameters,
    texts.join("\n\n"),
    "concatenated",
    chunks.length,
    failedChunks,
  );
}

function succeeded(
  strategy: SummaryStrategy,
  parameters: ChunkParameters,
  summary: string,
  mode: SummarizationSuccess["mode"],
  chunkCount: number,
  failedChunks: number[],
): SummarizationSuccess {
  return {
    success: true,
    strategy,
    parameters,
    summary,
    mode,
    degraded: mode === "concatenated",
    chunkCount,
    failedChunks,
    wordCount: countWords(summary),
  };
}

function failed(
  strategy: SummaryStrategy,
  parameters: ChunkParameters,
  errorMessage: string,
  chunkCount: number,
  failedChunks: number[],
): SummarizationFailure {
  return { success: false, strategy, parameters, errorMessage, chunkCount, failedChunks };
}
