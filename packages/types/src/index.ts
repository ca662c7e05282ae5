export { LENGTH_CATEGORIES } from "./chunk.js";
export type { LengthCategory, TextChunk, ChunkParameters, ChunkingConfig } from "./chunk.js";

export type {
  ChunkSummary,
  CombinedSummary,
  SummaryStrategy,
  SummaryMode,
  SummarizationSuccess,
  SummarizationFailure,
  SummarizationResult,
} from "./summary.js";

export type { ChatRole, ChatMessage } from "./llm.js";

export type { AppConfig, LogLevel, LlmConfig } from "./config.js";
