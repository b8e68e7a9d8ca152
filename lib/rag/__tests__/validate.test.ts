import { describe, expect, it } from "vitest";
import { RequestValidationError } from "@/lib/server/http";
import { parseAnswerRequest, parseEmbedRequest, parseSearchRequest } from "../validate";

describe("parseSearchRequest", () => {
  it("defaults top_k to 5", () => {
    expect(parseSearchRequest({ query: "hello" })).toEqual({ query: "hello", top_k: 5 });
  });

  it("keeps an explicit top_k", () => {
    expect(parseSearchRequest({ query: "hello", top_k: 2 })).toEqual({ query: "hello", top_k: 2 });
  });

  it.each([0, -1, 2.5, "3"])("rejects top_k=%s", (topK) => {
    expect(() => parseSearchRequest({ query: "q", top_k: topK })).toThrow("top_k must be a positive integer");
  });

  it("requires a string query", () => {
    expect(() => parseSearchRequest({ top_k: 3 })).toThrow("query must be a string");
  });
});

describe("parseEmbedRequest", () => {
  it("accepts texts without metadata", () => {
    expect(parseEmbedRequest({ texts: ["a", "b"] })).toEqual({ texts: ["a", "b"] });
    expect(parseEmbedRequest({ texts: ["a"], metadata: null })).toEqual({ texts: ["a"] });
  });

  it("accepts parallel metadata with extra keys", () => {
    expect(parseEmbedRequest({ texts: ["a"], metadata: [{ source: "a.md", lang: "en" }] })).toEqual({
      texts: ["a"],
      metadata: [{ source: "a.md", lang: "en" }],
    });
  });

  it("rejects metadata of a different length", () => {
    expect(() => parseEmbedRequest({ texts: ["a", "b"], metadata: [{}] })).toThrow(
      "metadata length (1) must match texts length (2)"
    );
  });

  it("rejects known metadata fields of the wrong type", () => {
    expect(() => parseEmbedRequest({ texts: ["a"], metadata: [{ page: "two" }] })).toThrow(
      "metadata[0].page must be a number"
    );
  });

  it("names the offending text", () => {
    try {
      parseEmbedRequest({ texts: ["ok", 3] });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof RequestValidationError)) throw err;
      expect(err.message).toBe("texts[1] must be a string");
      expect(err.status).toBe(422);
    }
  });
});

describe("parseAnswerRequest", () => {
  it("accepts question and context", () => {
    expect(parseAnswerRequest({ question: "q", context: ["c"] })).toEqual({ question: "q", context: ["c"] });
  });

  it("parses search results and defaults missing metadata", () => {
    const parsed = parseAnswerRequest({
      question: "q",
      context: ["c"],
      search_results: [{ text: "c", score: 0.9, index: 4 }],
    });
    expect(parsed.search_results).toEqual([{ text: "c", metadata: {}, score: 0.9, index: 4 }]);
  });

  it("rejects malformed search results", () => {
    expect(() =>
      parseAnswerRequest({ question: "q", context: [], search_results: [{ text: "c", score: 1, index: 1.5 }] })
    ).toThrow("search_results[0].index must be an integer");
  });

  it("requires a context array", () => {
    expect(() => parseAnswerRequest({ question: "q", context: "c" })).toThrow("context must be an array of strings");
  });
});
