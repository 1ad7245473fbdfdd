import type { ZodType, ZodTypeDef } from "zod";
import { fromZodError } from "zod-validation-error";
import { ResponseFormatError } from "../utils/errorHandler";

/**
 * Models sometimes wrap JSON in markdown fences even in JSON mode.
 */
export function stripCodeFences(raw: string): string {
  let text = raw.trim();
  if (text.startsWith("```json")) {
    text = text.slice("```json".length);
  } else if (text.startsWith("```")) {
    text = text.slice(3);
  }
  if (text.endsWith("```")) {
    text = text.slice(0, -3);
  }
  return text.trim();
}

function count(text: string, ch: string): number {
  let n = 0;
  for (const c of text) {
    if (c === ch) n++;
  }
  return n;
}

/**
 * Structural pre-check: first and last characters are braces and the
 * brace counts agree.
 */
export function isBalancedJsonObject(text: string): boolean {
  return text.startsWith("{") && text.endsWith("}") && count(text, "{") === count(text, "}");
}

/**
 * Cleans, structurally checks, parses and validates a model body.
 * Throws ResponseFormatError at the first failing step.
 */
export function parseModelJson<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const cleaned = stripCodeFences(raw);
  if (!isBalancedJsonObject(cleaned)) {
    throw new ResponseFormatError("response is not a JSON object", raw);
  }

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (err) {
    throw new ResponseFormatError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`, raw);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ResponseFormatError(`schema mismatch: ${fromZodError(result.error).message}`, raw);
  }
  return result.data;
}

export function truncateForLog(text: string, maxLen: number): string {
  const clean = text.replace(/\n/g, " ");
  return clean.length <= maxLen ? clean : `${clean.slice(0, maxLen)}...`;
}
