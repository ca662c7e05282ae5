export const LENGTH_CATEGORIES = ["very_short", "short", "medium", "long", "very_long"] as const;

export type LengthCategory = (typeof LENGTH_CATEGORIES)[number];

export interface TextChunk {
  content: string;
  /** Cursor offset in the source text; may precede leading whitespace trimmed from `content`. */
  startPosition: number;
  endPosition: number;
  chunkIndex: number;
  length: number;
}

export interface ChunkParameters {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly category: LengthCategory;
  readonly shouldUseHierarchical: boolean;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}
