import type { LengthCategory } from "@transcript-digest/types";

/**
 * Exclusive upper bound (in characters) for each category except the last.
 * Ordered by increasing length.
 */
const CATEGORY_UPPER_BOUNDS: ReadonlyArray<readonly [LengthCategory, number]> = [
  ["very_short", 2_000],
  ["short", 8_000],
  ["medium", 20_000],
  ["long", 50_000],
];

export function classifyLength(length: number): LengthCategory {
  for (const [category, upperBound] of CATEGORY_UPPER_BOUNDS) {
    if (length < upperBound) return category;
  }
  return "very_long";
}

export function classifyText(text: string): LengthCategory {
  return classifyLength(text.length);
}

/** Rough token estimate (~4 characters per token), used for log output only. */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}
