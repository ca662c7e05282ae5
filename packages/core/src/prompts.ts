import type { ChatMessage } from "@transcript-digest/types";

const CHUNK_SYSTEM_PROMPT = `You are an expert at creating concise, well-structured summaries.

FORMATTING REQUIREMENTS:
- Always use bullet points to organize information
- Use **bold** for key terms, concepts, and important names
- Keep each bullet point to 1-2 lines maximum
- Start each summary with 3-5 main bullet points
- Prioritize actionable insights and concrete information
- Avoid lengthy paragraphs; break content into digestible points
- Use clear, direct language without unnecessary words
- Format the whole response as markdown

EXAMPLE OUTPUT FORMAT:
\`\`\`markdown
# Container Orchestration Basics

Walkthrough of how schedulers place and heal workloads across a cluster.

## Core Concepts
- **Pods**: Smallest deployable unit, one or more co-located containers
- **Desired State**: Declared configuration the control plane converges toward
- **Health Probes**: Checks that decide when a container is restarted

## Practical Advice
- **Resource Limits**: Set them early to avoid noisy neighbours
- **Rolling Updates**: Ship changes without downtime
\`\`\``;

const COMBINE_SYSTEM_PROMPT =
  "You are an expert at synthesizing information from multiple sources into " +
  "cohesive, comprehensive summaries. Always use proper markdown formatting " +
  "including headers, bullet points, **bold** for emphasis, and *italic* for " +
  "additional emphasis. Focus on creating a logical narrative flow.";

const COMBINE_INSTRUCTIONS =
  "You have been given a series of summaries from consecutive sections of a long video transcript. " +
  "Synthesize them into a single, cohesive, and well-structured summary.\n\n" +
  "Focus on creating a final output that:\n" +
  "- **Integrates Key Themes**: Identify and merge the main ideas, concepts, and narratives from all sections.\n" +
  "- **Maintains Logical Flow**: Organize the content in a clear, logical order.\n" +
  "- **Eliminates Redundancy**: Remove duplicate information and consolidate related points.\n" +
  "- **Preserves Critical Information**: Keep essential facts, data, and takeaways.";

/**
 * The "USER NOTES" block, or `null` when there are no usable notes.
 */
export function formatUserNotes(notes?: string): string | null {
  if (!notes || notes.trim().length === 0) return null;
  return (
    "A user has provided the following notes to guide the summary. " +
    "Pay special attention to these points and address them prominently.\n\n" +
    `USER NOTES:\n${notes.trim()}`
  );
}

/**
 * Messages for summarizing one transcript section.
 *
 * @param sectionNumber - 1-based position of the section in the transcript
 * @param notes - user guidance, placed ahead of the content
 */
export function buildChunkSummaryMessages(
  content: string,
  sectionNumber: number,
  notes?: string,
): ChatMessage[] {
  const parts = [
    `This is section ${String(sectionNumber)} of a longer transcript.

Extract and summarize the most important information. Focus on:
- Key concepts and main ideas
- Important facts, data points, or statistics
- Actionable insights or practical takeaways
- Notable quotes or examples`,
  ];

  const notesBlock = formatUserNotes(notes);
  if (notesBlock) parts.push(notesBlock);

  parts.push(`Content to summarize:\n${content}`);
  const userContent = parts.join("\n\n");

  return [
    { role: "system", content: CHUNK_SYSTEM_PROMPT },
    { role: "user", content: userContent },
  ];
}

/**
 * Render summaries as numbered `## Section N` blocks, in the given order.
 */
export function formatSections(summaries: string[]): string {
  return summaries
    .map((summary, i) => `## Section ${String(i + 1)}\n\n${summary.trim()}`)
    .join("\n\n");
}

/**
 * Messages for merging section summaries into one summary.
 * `notes`, when given, are user guidance the merged summary must address.
 */
export function buildCombineMessages(summaries: string[], notes?: string): ChatMessage[] {
  const parts = [COMBINE_INSTRUCTIONS];

  const notesBlock = formatUserNotes(notes);
  if (notesBlock) parts.push(notesBlock);

  parts.push(`Here are the section summaries:\n\n${formatSections(summaries)}`);

  return [
    { role: "system", content: COMBINE_SYSTEM_PROMPT },
    { role: "user", content: parts.join("\n\n") },
  ];
}
