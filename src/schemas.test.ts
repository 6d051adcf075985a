import { describe, it, expect } from "vitest";
import { ValidationError } from "./errors";
import { parseExtractionRequest, parseSearchRequest } from "./schemas";

function validationErrorOf(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("parseSearchRequest", () => {
  it("fills in defaults", () => {
    expect(parseSearchRequest({ query: "  renewable energy " })).toEqual({
      query: "renewable energy",
      search_depth: "basic",
      max_results: 5,
      include_domains: [],
      exclude_domains: [],
      include_raw_content: false,
    });
  });

  it("rejects an empty query", () => {
    const err = validationErrorOf(() => parseSearchRequest({ query: "   " }));
    expect(err.field).toBe("query");
    expect(err.message).toBe("query: must not be empty");
  });

  it("rejects a missing query", () => {
    expect(validationErrorOf(() => parseSearchRequest({})).field).toBe("query");
  });

  it.each([0, 11, 50])("rejects max_results=%i", (max_results) => {
    const err = validationErrorOf(() => parseSearchRequest({ query: "q", max_results }));
    expect(err.message).toBe("max_results: must be between 1 and 10");
  });

  it("rejects a fractional max_results", () => {
    const err = validationErrorOf(() => parseSearchRequest({ query: "q", max_results: 2.5 }));
    expect(err.message).toBe("max_results: must be an integer");
  });

  it("rejects unknown enum values", () => {
    expect(validationErrorOf(() => parseSearchRequest({ query: "q", time_range: "decade" })).field).toBe(
      "time_range",
    );
  });

  it("normalizes and dedupes domains", () => {
    const request = parseSearchRequest({
      query: "q",
      include_domains: ["https://www.Example.com/x", "example.com", " "],
      exclude_domains: ["Spam.net"],
    });
    expect(request.include_domains).toEqual(["example.com"]);
    expect(request.exclude_domains).toEqual(["spam.net"]);
  });
});

describe("parseExtractionRequest", () => {
  it("fills in defaults", () => {
    expect(parseExtractionRequest({ urls: ["https://example.com"] })).toEqual({
      urls: ["https://example.com"],
      extract_depth: "basic",
      include_images: false,
    });
  });

  it("rejects an empty url list", () => {
    const err = validationErrorOf(() => parseExtractionRequest({ urls: [] }));
    expect(err.message).toBe("urls: must contain at least one URL");
  });

  it("rejects more than 20 urls", () => {
    const urls = Array.from({ length: 21 }, (_, i) => `https://example.com/${i}`);
    const err = validationErrorOf(() => parseExtractionRequest({ urls }));
    expect(err.message).toBe("urls: must contain at most 20 URLs");
  });

  it("keeps malformed entries for per-url handling", () => {
    expect(parseExtractionRequest({ urls: ["not-a-valid-url"] }).urls).toEqual(["not-a-valid-url"]);
  });
});
