/**
 * Unit Tests: Extraction Orchestrator
 *
 * Walks vision → text → fallback with a scripted LLM client and checks
 * which models were called, in what order, and which answer wins.
 */

import { describe, it, expect } from "vitest";
import { extractClassification, type ExtractionInput } from "../extraction/orchestrator";
import { EMPTY_CONTEXT } from "../extraction/types";
import { TierExhaustedError } from "../utils/errorHandler";
import { StubLLM, TEST_TIERS, makeCourses, rateLimited } from "./helpers/factories";

const INFO = JSON.stringify({
  type: "assignment_info",
  course_name: "Struktur Data",
  title: "LKP 14",
  deadline: "2026-01-20 23:59",
  description: "Implementasi AVL tree",
  parallel_code: "K2",
});
const UNRECOGNIZED = '{"type":"unrecognized"}';

const EXPECTED_INFO = {
  type: "assignment_info",
  courseName: "Struktur Data",
  title: "LKP 14",
  deadline: "2026-01-20 23:59",
  description: "Implementasi AVL tree",
  parallelCode: "K2",
};

const clock = () => new Date("2026-01-19T03:00:00Z");

function input(overrides: Partial<ExtractionInput> = {}): ExtractionInput {
  return {
    message: "LKP 14 strukdat K2 deadline 20 jan",
    courses: makeCourses(),
    activeAssignments: [],
    context: EMPTY_CONTEXT,
    ...overrides,
  };
}

const withImage = { imageBase64: "aW1n", imageMimeType: "image/png" };

describe("extractClassification", () => {
  it("uses the first text model for text-only messages", async () => {
    const llm = new StubLLM({ "text-a": INFO });
    const result = await extractClassification(input(), { llm, tiers: TEST_TIERS, clock });

    expect(result).toEqual({ classification: EXPECTED_INFO, tier: "text", model: "text-a", failures: [] });
    expect(llm.calls[0]).toMatchObject({ temperature: 0.2, maxTokens: 4096, jsonResponse: true });
    expect(llm.calls[0].imageBase64).toBeUndefined();
    expect(llm.calls[0].prompt).toContain('"LKP 14 strukdat K2 deadline 20 jan"');
  });

  it("falls over through rate limits and bad bodies to the second provider", async () => {
    const llm = new StubLLM({ "text-a": rateLimited("text-a"), "text-b": "oops", "fallback-a": INFO });
    const result = await extractClassification(input(), { llm, tiers: TEST_TIERS, clock });

    expect(llm.modelsCalled()).toEqual(["text-a", "text-b", "fallback-a"]);
    expect(result.tier).toBe("fallback");
    expect(result.model).toBe("fallback-a");
    expect(result.failures).toEqual([
      { tier: "text", model: "text-a", reason: "groq/text-a rate_limit: 429 Too Many Requests" },
      { tier: "text", model: "text-b", reason: "response is not a JSON object" },
    ]);
  });

  it("sends the image to the vision tier and stops at its second model", async () => {
    const llm = new StubLLM({ "vision-a": rateLimited("vision-a"), "vision-b": INFO });
    const result = await extractClassification(input(withImage), { llm, tiers: TEST_TIERS, clock });

    expect(llm.modelsCalled()).toEqual(["vision-a", "vision-b"]);
    expect(llm.calls[1]).toMatchObject({ imageBase64: "aW1n", imageMimeType: "image/png" });
    expect(result).toMatchObject({ classification: EXPECTED_INFO, tier: "vision", model: "vision-b" });
    expect(result.failures.map((f) => f.model)).toEqual(["vision-a"]);
  });

  it("retries text-only when vision says unrecognized", async () => {
    const llm = new StubLLM({ "vision-a": UNRECOGNIZED, "text-a": INFO });
    const result = await extractClassification(input(withImage), { llm, tiers: TEST_TIERS, clock });

    expect(llm.modelsCalled()).toEqual(["vision-a", "text-a"]);
    expect(llm.calls[1].imageBase64).toBeUndefined();
    expect(result).toMatchObject({ classification: EXPECTED_INFO, tier: "text", model: "text-a" });
  });

  it("keeps the vision verdict when every text model fails", async () => {
    const llm = new StubLLM({ "vision-a": UNRECOGNIZED });
    const result = await extractClassification(input(withImage), { llm, tiers: TEST_TIERS, clock });

    expect(result.classification).toEqual({ type: "unrecognized" });
    expect(result.tier).toBe("vision");
    expect(result.failures.map((f) => f.model)).toEqual(["text-a", "text-b", "fallback-a"]);
  });

  it("continues with text when the vision tier is exhausted", async () => {
    const llm = new StubLLM({ "text-a": INFO });
    const result = await extractClassification(input(withImage), { llm, tiers: TEST_TIERS, clock });

    expect(llm.modelsCalled()).toEqual(["vision-a", "vision-b", "text-a"]);
    expect(result.tier).toBe("text");
    expect(result.failures.map((f) => f.model)).toEqual(["vision-a", "vision-b"]);
  });

  it("reaches the fallback model when vision and text are all rate limited", async () => {
    const llm = new StubLLM({
      "vision-a": rateLimited("vision-a"),
      "vision-b": rateLimited("vision-b"),
      "text-a": rateLimited("text-a"),
      "text-b": rateLimited("text-b"),
      "fallback-a": INFO,
    });
    const result = await extractClassification(input(withImage), { llm, tiers: TEST_TIERS, clock });

    expect(llm.modelsCalled()).toEqual(["vision-a", "vision-b", "text-a", "text-b", "fallback-a"]);
    expect(result).toMatchObject({ classification: EXPECTED_INFO, tier: "fallback", model: "fallback-a" });
    expect(result.failures.map((f) => `${f.tier}/${f.model}`)).toEqual([
      "vision/vision-a",
      "vision/vision-b",
      "text/text-a",
      "text/text-b",
    ]);
  });

  it("accepts an unrecognized verdict from the text tier", async () => {
    const llm = new StubLLM({ "text-a": UNRECOGNIZED });
    const result = await extractClassification(input(), { llm, tiers: TEST_TIERS, clock });
    expect(result.classification).toEqual({ type: "unrecognized" });
    expect(llm.modelsCalled()).toEqual(["text-a"]);
  });

  it("throws TierExhaustedError with every failure when nothing answers", async () => {
    const llm = new StubLLM();
    const promise = extractClassification(input(), { llm, tiers: TEST_TIERS, clock });

    await expect(promise).rejects.toBeInstanceOf(TierExhaustedError);
    await expect(promise).rejects.toThrow("extraction: all model tiers exhausted after 3 attempt(s)");
  });
});
