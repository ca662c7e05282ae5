import type { SummaryMode, SummaryStrategy } from "@transcript-digest/types";

export interface SummaryDocument {
  title: string;
  summary: string;
  model: string;
  strategy: SummaryStrategy;
  mode: SummaryMode;
  sourceUrl?: string;
  generatedAt: Date;
}

export const CONCATENATED_NOTE =
  "> **Note:** the section summaries could not be combined and are listed in order.";

/**
 * Render the final markdown file: title, metadata block, rule, then the summary.
 */
export function buildSummaryMarkdown(doc: SummaryDocument): string {
  const metadata: string[] = [];
  if (doc.sourceUrl) {
    metadata.push(`- **Source:** ${doc.sourceUrl}`);
  }
  metadata.push(`- **Model:** ${doc.model}`);
  metadata.push(`- **Strategy:** ${doc.strategy}`);
  metadata.push(`- **Generated:** ${doc.generatedAt.toISOString().slice(0, 10)}`);

  const lines = [`# ${doc.title.trim()}`, "", ...metadata];
  if (doc.mode === "concatenated") {
    lines.push("", CONCATENATED_NOTE);
  }
  lines.push("", "---", "", doc.summary.trim(), "");

  return lines.join("\n");
}
