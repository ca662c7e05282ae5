const MAX_BASE_LENGTH = 80;
const MIN_HYPHEN_TRUNCATION = 10;
export const FALLBACK_BASE_NAME = "video-summary";

/**
 * Turn a video title into a lowercase, hyphen-separated filename stem.
 *
 * Bracketed or parenthesised text (usually "[Official Video]" style metadata)
 * and URLs are dropped entirely.
 */
export function sanitizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[([].+?[)\]]/g, "")
    .replace(/https?:\/\/\S+/g, "")
    .replace(/[|_\-:;]+/g, " ")
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/ /g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Shorten `name` to at most `maxLength` characters, cutting at a hyphen when
 * that still leaves a usable name.
 */
export function truncateAtHyphen(name: string, maxLength: number): string {
  if (name.length <= maxLength) return name;

  if (name.includes("-")) {
    const [first = "", ...rest] = name.split("-");
    let result = first;
    for (const part of rest) {
      if (result.length + 1 + part.length > maxLength) break;
      result += `-${part}`;
    }
    if (result.length >= MIN_HYPHEN_TRUNCATION && result.length <= maxLength) {
      return result;
    }
  }

  return name.slice(0, maxLength).replace(/[-_]+$/, "");
}

export function generateSummaryFilename(title?: string): string {
  const base = truncateAtHyphen(sanitizeTitle(title ?? ""), MAX_BASE_LENGTH);
  return `${base.length > 0 ? base : FALLBACK_BASE_NAME}.md`;
}
