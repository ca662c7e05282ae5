import type { ChunkingConfig, TextChunk } from "@transcript-digest/types";
import { ValidationError } from "@transcript-digest/errors";
import type { IChunker } from "./chunker.interface.js";
import { validateChunkSizing } from "./chunk-parameters.js";

/** Boundary patterns in order of preference. */
const BOUNDARY_PATTERNS: readonly string[] = [
  "[.!?]\\s+", // sentence end
  "\\n\\s*\\n", // paragraph break
  "\\n", // line break
];

/** Boundaries are only searched for in the last 20% of a window. */
const BOUNDARY_SEARCH_RATIO = 0.8;

/**
 * Character-window chunker that snaps chunk ends to natural boundaries.
 *
 * Each non-final chunk ends after the last sentence terminator found in the
 * tail of its window, falling back to a paragraph break, then a line break,
 * then a hard cut. Consecutive chunks share up to `chunkOverlap` characters.
 */
export class BoundaryChunker implements IChunker {
  readonly strategy = "boundary";

  chunk(content: string, config: ChunkingConfig): TextChunk[] {
    const { chunkSize, chunkOverlap } = config;
    const fields = validateChunkSizing(chunkSize, chunkOverlap);
    if (Object.keys(fields).length > 0) {
      throw new ValidationError("Invalid chunking config", fields);
    }

    if (content.trim().length === 0) return [];

    const results: TextChunk[] = [];
    const textLength = content.length;
    let start = 0;
    let index = 0;

    while (start < textLength) {
      let end = Math.min(start + chunkSize, textLength);

      if (end < textLength) {
        const searchStart = Math.max(start + Math.floor(chunkSize * BOUNDARY_SEARCH_RATIO), start + 1);
        const boundary = this.findBoundary(content, searchStart, end);
        if (boundary > start) end = boundary;
      }

      const chunk = content.slice(start, end).trim();
      if (chunk.length > 0) {
        results.push({
          content: chunk,
          startPosition: start,
          endPosition: end,
          chunkIndex: index,
          length: chunk.length,
        });
        index++;
      }

      if (end >= textLength) break;

      // Always advance, even when the overlap is as large as the chunk.
      start = Math.max(end - chunkOverlap, start + 1);
    }

    return results;
  }

  /**
   * Returns the position just past the last preferred boundary in
   * `[searchStart, maxEnd)`, or `maxEnd` when the window has none.
   */
  private findBoundary(text: string, searchStart: number, maxEnd: number): number {
    if (searchStart >= maxEnd) return maxEnd;

    const window = text.slice(searchStart, maxEnd);
    for (const source of BOUNDARY_PATTERNS) {
      const pattern = new RegExp(source, "g");
      let lastEnd = -1;
      let match: RegExpExecArray | null;
      while ((match = pattern.exec(window)) !== null) {
        lastEnd = match.index + match[0].length;
      }
      if (lastEnd > 0) return searchStart + lastEnd;
    }
    return maxEnd;
  }
}

const defaultChunker = new BoundaryChunker();

export function chunkText(text: string, chunkSize: number, overlap: number): TextChunk[] {
  return defaultChunker.chunk(text, { chunkSize, chunkOverlap: overlap });
}
