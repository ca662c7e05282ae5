import type { ChunkingConfig, TextChunk } from "@transcript-digest/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingConfig): TextChunk[];
}
