export { summarizeTranscript, ALL_CHUNKS_FAILED_MESSAGE } from "./summarization-pipeline.js";
export type { SummarizationDependencies } from "./summarization-pipeline.js";

export {
  summarizeChunk,
  EMPTY_CHUNK_MESSAGE,
  EMPTY_RESPONSE_MESSAGE,
  INVALID_INDEX_MESSAGE,
} from "./chunk-summarizer.js";
export type { SummarizeChunkOptions } from "./chunk-summarizer.js";
export {
  combineChunks,
  NO_SUMMARIES_MESSAGE,
  NO_VALID_SUMMARIES_MESSAGE,
} from "./summary-combiner.js";
export type { CombineOptions } from "./summary-combiner.js";

export {
  buildChunkSummaryMessages,
  buildCombineMessages,
  formatSections,
  formatUserNotes,
} from "./prompts.js";
export { countWords } from "./word-count.js";
