/**
 * Unit Tests: Model JSON Handling
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { isBalancedJsonObject, parseModelJson, stripCodeFences, truncateForLog } from "../llm/jsonResponse";
import { ResponseFormatError } from "../utils/errorHandler";

const schema = z.object({ a: z.number() });

describe("stripCodeFences", () => {
  it("removes json fences", () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences('```\n{"a":1}```')).toBe('{"a":1}');
  });
});

describe("isBalancedJsonObject", () => {
  it("checks outer braces and brace counts", () => {
    expect(isBalancedJsonObject('{"a":{}}')).toBe(true);
    expect(isBalancedJsonObject('{"a":{}')).toBe(false);
    expect(isBalancedJsonObject("[1]")).toBe(false);
  });
});

describe("parseModelJson", () => {
  it("parses fenced JSON", () => {
    expect(parseModelJson('```json\n{"a": 1}\n```', schema)).toEqual({ a: 1 });
  });

  it("rejects prose", () => {
    expect(() => parseModelJson("Sure! Here it is.", schema)).toThrow(ResponseFormatError);
    expect(() => parseModelJson("Sure! Here it is.", schema)).toThrow("response is not a JSON object");
  });

  it("rejects invalid JSON and schema mismatches", () => {
    expect(() => parseModelJson('{"a": }', schema)).toThrow(/^invalid JSON:/);
    expect(() => parseModelJson('{"a": "x"}', schema)).toThrow(/^schema mismatch:/);
  });

  it("keeps the raw text on the error", () => {
    try {
      parseModelJson("nope", schema);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ResponseFormatError);
      if (err instanceof ResponseFormatError) expect(err.rawText).toBe("nope");
    }
  });
});

describe("truncateForLog", () => {
  it("flattens newlines and truncates", () => {
    expect(truncateForLog("ab\ncd", 3)).toBe("ab ...");
    expect(truncateForLog("short", 10)).toBe("short");
  });
});
