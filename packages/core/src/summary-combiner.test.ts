import { describe, it, expect, vi } from "vitest";
import type { ChatMessage } from "@transcript-digest/types";
import type { ITextGenerator } from "@transcript-digest/llm";
import {
  combineChunks,
  NO_SUMMARIES_MESSAGE,
  NO_VALID_SUMMARIES_MESSAGE,
} from "./summary-combiner.js";
import { EMPTY_RESPONSE_MESSAGE } from "./chunk-summarizer.js";

function fakeGenerator() {
  const generate = vi.fn<(messages: ChatMessage[], model: string) => Promise<string | null>>();
  const generator: ITextGenerator = { name: "fake", generate };
  return { generator, generate };
}

describe("combineChunks", () => {
  it("fails for an empty list without calling the generator", async () => {
    const { generator, generate } = fakeGenerator();

    const result = await combineChunks([], "m", generator);

    expect(result).toEqual({
      summary: "",
      success: false,
      chunksProcessed: 0,
      errorMessage: NO_SUMMARIES_MESSAGE,
      wordCount: 0,
    });
    expect(generate).not.toHaveBeenCalled();
  });

  it("fails when every summary is blank", async () => {
    const { generator, generate } = fakeGenerator();

    const result = await combineChunks(["", "  \n"], "m", generator);

    expect(result).toEqual({
      summary: "",
      success: false,
      chunksProcessed: 0,
      errorMessage: NO_VALID_SUMMARIES_MESSAGE,
      wordCount: 0,
    });
    expect(generate).not.toHaveBeenCalled();
  });

  it("embeds the non-blank summaries as numbered sections and returns the merged text", async () => {
    const { generator, generate } = fakeGenerator();
    generate.mockResolvedValueOnce("\n# Merged\n\n- one point\n");

    const result = await combineChunks(["A summary", "  ", "B summary"], "gemma3:12b", generator);

    expect(result).toEqual({
      summary: "# Merged\n\n- one point",
      success: true,
      chunksProcessed: 2,
      errorMessage: null,
      wordCount: 5,
    });

    const [messages, model] = generate.mock.calls[0]!;
    expect(model).toBe("gemma3:12b");
    expect(messages[0]!.role).toBe("system");
    expect(messages[0]!.content).toContain("markdown");
    expect(messages[1]!.content).toContain(
      "Here are the section summaries:\n\n## Section 1\n\nA summary\n\n## Section 2\n\nB summary",
    );
    expect(messages[1]!.content).not.toContain("USER NOTES");
  });

  it("includes user notes when provided", async () => {
    const { generator, generate } = fakeGenerator();
    generate.mockResolvedValueOnce("merged");

    await combineChunks(["A"], "m", generator, { notes: "  Focus on pricing  " });

    expect(generate.mock.calls[0]![0][1]!.content).toContain("USER NOTES:\nFocus on pricing");
  });

  it("reports an empty response with the count of valid summaries", async () => {
    const { generator, generate } = fakeGenerator();
    generate.mockResolvedValueOnce(null);

    const result = await combineChunks(["A", "B", ""], "m", generator);

    expect(result).toEqual({
      summary: "",
      success: false,
      chunksProcessed: 2,
      errorMessage: EMPTY_RESPONSE_MESSAGE,
      wordCount: 0,
    });
  });

  it("reports generator errors instead of rejecting", async () => {
    const { generator, generate } = fakeGenerator();
    generate.mockRejectedValueOnce(new Error("request timed out"));

    const result = await combineChunks(["A", "B", "C"], "m", generator);

    expect(result.success).toBe(false);
    expect(result.chunksProcessed).toBe(3);
    expect(result.errorMessage).toBe("Combination failed: request timed out");
  });
});
