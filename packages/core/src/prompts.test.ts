import { describe, it, expect } from "vitest";
import {
  buildChunkSummaryMessages,
  buildCombineMessages,
  formatSections,
  formatUserNotes,
} from "./prompts.js";
import { countWords } from "./word-count.js";

describe("formatSections", () => {
  it("numbers summaries from 1 in order", () => {
    expect(formatSections(["first\n", "second"])).toBe(
      "## Section 1\n\nfirst\n\n## Section 2\n\nsecond",
    );
  });
});

describe("buildChunkSummaryMessages", () => {
  it("ends the user message with the chunk content", () => {
    const [system, user] = buildChunkSummaryMessages("Hello there.", 1);

    expect(system?.role).toBe("system");
    expect(user?.role).toBe("user");
    expect(user?.content.startsWith("This is section 1 of a longer transcript.")).toBe(true);
    expect(user?.content.endsWith("Content to summarize:\nHello there.")).toBe(true);
  });

  it("places notes between the instructions and the content", () => {
    const [, user] = buildChunkSummaryMessages("Hello there.", 1, "cover the demo");
    const content = user?.content ?? "";

    expect(content).toContain("USER NOTES:\ncover the demo\n\nContent to summarize:\nHello there.");
    expect(content.startsWith("This is section 1 of a longer transcript.")).toBe(true);
  });

  it("leaves notes out when none are given", () => {
    const [, user] = buildChunkSummaryMessages("Hello there.", 1);
    expect(user?.content).not.toContain("USER NOTES");
  });
});

describe("formatUserNotes", () => {
  it("returns null for missing or blank notes", () => {
    expect(formatUserNotes()).toBeNull();
    expect(formatUserNotes(" \n ")).toBeNull();
  });

  it("ends with the trimmed notes", () => {
    expect(formatUserNotes("  check the numbers ")?.endsWith("USER NOTES:\ncheck the numbers")).toBe(true);
  });
});

describe("buildCombineMessages", () => {
  it("ignores blank notes", () => {
    const [, user] = buildCombineMessages(["A"], "   ");
    expect(user?.content).not.toContain("USER NOTES");
  });

  it("places notes before the section summaries", () => {
    const [, user] = buildCombineMessages(["A"], "cover the demo");
    const content = user?.content ?? "";

    expect(content.indexOf("USER NOTES:\ncover the demo")).toBeGreaterThan(-1);
    expect(content.indexOf("USER NOTES")).toBeLessThan(content.indexOf("## Section 1"));
  });
});

describe("countWords", () => {
  it("counts whitespace-separated words", () => {
    expect(countWords("")).toBe(0);
    expect(countWords("  one\ttwo\n\nthree ")).toBe(3);
  });
});
