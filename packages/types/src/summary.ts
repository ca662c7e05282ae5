import type { ChunkParameters } from "./chunk.js";

export interface ChunkSummary {
  summary: string;
  chunkIndex: number;
  success: boolean;
  errorMessage: string | null;
  wordCount: number;
}

export interface CombinedSummary {
  summary: string;
  success: boolean;
  chunksProcessed: number;
  errorMessage: string | null;
  wordCount: number;
}

export type SummaryStrategy = "direct" | "hierarchical";

/**
 * How the final text was produced. `concatenated` means the combiner failed and
 * the chunk summaries were joined as-is.
 */
export type SummaryMode = "direct" | "combined" | "concatenated";

interface SummarizationOutcome {
  strategy: SummaryStrategy;
  parameters: ChunkParameters;
  chunkCount: number;
  failedChunks: number[];
}

export interface SummarizationSuccess extends SummarizationOutcome {
  success: true;
  summary: string;
  mode: SummaryMode;
  degraded: boolean;
  wordCount: number;
}

export interface SummarizationFailure extends SummarizationOutcome {
  success: false;
  errorMessage: string;
}

export type SummarizationResult = SummarizationSuccess | SummarizationFailure;
