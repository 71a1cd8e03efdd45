import { describe, expect, it } from "vitest";
import { summaryPayloadSchema, summaryResponseSchema } from "../../src/modules/summaries/types.js";

describe("modules/summaries/types", () => {
  it("accepts a payload with a url", () => {
    expect(summaryPayloadSchema.parse({ url: "https://example.com/article" })).toEqual({
      url: "https://example.com/article"
    });
  });

  it("rejects a payload without a url", () => {
    const result = summaryPayloadSchema.safeParse({});
    expect(result.success).toBe(false);
  });

  it("coerces the response id to a number", () => {
    expect(summaryResponseSchema.parse({ url: "https://example.com/article", id: "7" })).toEqual({
      url: "https://example.com/article",
      id: 7
    });
  });

  it("rejects a non-integer id", () => {
    expect(summaryResponseSchema.safeParse({ url: "https://example.com/article", id: "seven" }).success).toBe(false);
    expect(summaryResponseSchema.safeParse({ url: "https://example.com/article", id: 1.5 }).success).toBe(false);
  });
});
