import type { ChunkParameters, LengthCategory } from "@transcript-digest/types";
import { ValidationError } from "@transcript-digest/errors";
import { classifyText } from "./length-classifier.js";

interface CategoryDefaults {
  chunkSize: number;
  chunkOverlap: number;
  shouldUseHierarchical: boolean;
}

/**
 * Chunking defaults per length category. Longer transcripts get larger
 * chunks and more overlap; anything from `medium` up is summarized hierarchically.
 */
export const CATEGORY_DEFAULTS: Readonly<Record<LengthCategory, CategoryDefaults>> = {
  very_short: { chunkSize: 2_000, chunkOverlap: 100, shouldUseHierarchical: false },
  short: { chunkSize: 3_000, chunkOverlap: 150, shouldUseHierarchical: false },
  medium: { chunkSize: 4_000, chunkOverlap: 200, shouldUseHierarchical: true },
  long: { chunkSize: 5_000, chunkOverlap: 300, shouldUseHierarchical: true },
  very_long: { chunkSize: 6_000, chunkOverlap: 400, shouldUseHierarchical: true },
};

/**
 * Validate chunk sizing values. Returns the offending fields, empty when valid.
 */
export function validateChunkSizing(chunkSize: number, chunkOverlap: number): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    fields["chunkSize"] = "must be a positive integer";
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    fields["chunkOverlap"] = "must be a non-negative integer";
  }
  return fields;
}

/**
 * Build an immutable {@link ChunkParameters}, rejecting invalid sizing.
 */
export function createChunkParameters(params: ChunkParameters): ChunkParameters {
  const fields = validateChunkSizing(params.chunkSize, params.chunkOverlap);
  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Invalid chunk parameters", fields, {
      details: { chunkSize: params.chunkSize, chunkOverlap: params.chunkOverlap },
    });
  }

  return Object.freeze({
    chunkSize: params.chunkSize,
    chunkOverlap: params.chunkOverlap,
    category: params.category,
    shouldUseHierarchical: params.shouldUseHierarchical,
  });
}

export function computeChunkParameters(text: string): ChunkParameters {
  const category = classifyText(text);
  return createChunkParameters({ category, ...CATEGORY_DEFAULTS[category] });
}
