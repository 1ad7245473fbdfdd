/**
 * Unit Tests: Model tier table
 */

import { describe, it, expect } from "vitest";
import { MODEL_TIERS, describeAttempt } from "../config/models";

describe("MODEL_TIERS", () => {
  it("matches updates over the same Gemini chain as the extraction fallback", () => {
    expect(MODEL_TIERS.matching.map(describeAttempt)).toEqual([
      "gemini/gemini-3-flash-preview",
      "gemini/gemini-2.5-flash",
      "gemini/gemini-2.5-flash-lite",
    ]);
    expect(MODEL_TIERS.matching).toEqual(MODEL_TIERS.fallback);
  });

  it("keeps the resolver models out of matching", () => {
    const resolverModels = new Set(MODEL_TIERS.contextResolver.map((a) => a.model));
    expect(MODEL_TIERS.matching.filter((a) => resolverModels.has(a.model))).toEqual([]);
  });
});
