/**
 * Clarification Reply Parser
 *
 * Purpose:
 * Maps a user's free-text answer to a clarification template back onto
 * assignment fields. Deterministic; no model calls.
 *
 * Order of checks:
 * 1. Cancellation keyword (exact match)
 * 2. Time-only reply ("08:00") that keeps the existing deadline's date
 * 3. Structured "Key: value" lines
 * 4. Unstructured fallback, only when step 3 found no recognized key
 *
 * Layer: Clarification (pure logic)
 */

import { CLARIFICATION_CONSTANTS } from "../config/constants";
import { formatCivilDate, makeTimeString } from "../utils/civilTime";
import { logWarn } from "../utils/logger";
import { DeadlineParseError, parseFlexibleDeadline, parseTimeOnly } from "./deadlineParser";
import { FIELD_PRESENTATION, CLARIFICATION_FIELDS, fieldForKey, type ClarificationField, type ClarificationUpdates } from "./fields";
import { detectParallelCode, normalizeParallelCode } from "./parallelCode";

export type ClarificationParseError = "no_date" | "no_data";

export type SkippedField = {
  field: ClarificationField;
  value: string;
  reason: string;
};

export type ClarificationParseResult =
  | { kind: "cancelled" }
  | { kind: "updates"; updates: ClarificationUpdates; skipped: SkippedField[] }
  | { kind: "error"; error: ClarificationParseError };

export type ClarificationParseContext = {
  /** Current deadline of the assignment being clarified (UTC). */
  existingDeadline: Date | null;
  /** Year used when the reply gives day and month only. */
  currentYear: number;
};

const CANCEL_KEYWORDS = new Set<string>(CLARIFICATION_CONSTANTS.CANCEL_KEYWORDS);
const ID_LINE = /\bid\s*:/i;
const SKIPPED_LINE_PREFIXES = ["(", "format", "tip", "💡", "_", "contoh"];
const FORMAT_HINTS = new Set(CLARIFICATION_FIELDS.map((f) => FIELD_PRESENTATION[f].formatHint.toLowerCase()));

function withoutIdLines(text: string): string {
  return text
    .split(/\r?\n/)
    .filter((line) => !ID_LINE.test(line))
    .join("\n")
    .trim();
}

export function isCancellation(text: string): boolean {
  return CANCEL_KEYWORDS.has(text.trim().toLowerCase());
}

function isPlaceholderValue(value: string): boolean {
  const v = value.trim().toLowerCase();
  if (!v) return true;
  if (v.startsWith("[") || v.startsWith("<")) return true;
  if (v === "..." || v === "…" || v === "-" || v === "—" || v === "–") return true;
  return FORMAT_HINTS.has(v);
}

function timeWithExistingDate(existing: Date, hour: number, minute: number): string {
  return `${formatCivilDate(existing)} ${makeTimeString(hour, minute)}`;
}

function parseDeadlineValue(value: string, ctx: ClarificationParseContext): string {
  const timeOnly = parseTimeOnly(value);
  if (timeOnly) {
    if (!ctx.existingDeadline) {
      throw new DeadlineParseError(value, "time given without a date");
    }
    return timeWithExistingDate(ctx.existingDeadline, timeOnly.hour, timeOnly.minute);
  }
  return parseFlexibleDeadline(value, ctx.currentYear);
}

type StructuredPass = {
  foundKeys: number;
  updates: ClarificationUpdates;
  skipped: SkippedField[];
};

function parseStructured(text: string, ctx: ClarificationParseContext): StructuredPass {
  const pass: StructuredPass = { foundKeys: 0, updates: {}, skipped: [] };

  for (const rawLine of text.replace(/`/g, "").split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const lower = line.toLowerCase();
    if (SKIPPED_LINE_PREFIXES.some((p) => lower.startsWith(p)) || ID_LINE.test(line)) continue;

    const colonAt = line.indexOf(":");
    if (colonAt === -1) continue;

    const field = fieldForKey(line.slice(0, colonAt));
    if (!field) continue;
    pass.foundKeys++;

    const value = line.slice(colonAt + 1).trim();
    if (isPlaceholderValue(value)) continue;

    switch (field) {
      case "deadline":
        try {
          pass.updates.deadline = parseDeadlineValue(value, ctx);
        } catch (err) {
          if (!(err instanceof DeadlineParseError)) throw err;
          logWarn("[Clarification] Skipping unparseable deadline", { value, error: err.message });
          pass.skipped.push({ field, value, reason: err.message });
        }
        break;
      case "parallel_code":
        pass.updates.parallel_code = normalizeParallelCode(value);
        break;
      case "course_name":
      case "title":
      case "description":
        pass.updates[field] = value;
        break;
      default: {
        const _exhaustive: never = field;
        throw new Error(`[Clarification] Unhandled field: ${_exhaustive}`);
      }
    }
  }

  return pass;
}

function parseUnstructured(text: string, ctx: ClarificationParseContext): ClarificationUpdates {
  const updates: ClarificationUpdates = {};

  const parallel = detectParallelCode(text);
  if (parallel) updates.parallel_code = parallel;

  try {
    updates.deadline = parseFlexibleDeadline(text, ctx.currentYear);
  } catch (err) {
    if (!(err instanceof DeadlineParseError)) throw err;
  }

  // id lines are already stripped from `text`
  if (Object.keys(updates).length === 0 && text.length >= CLARIFICATION_CONSTANTS.MIN_DESCRIPTION_LENGTH) {
    updates.description = text;
  }

  return updates;
}

export function parseClarificationResponse(text: string, ctx: ClarificationParseContext): ClarificationParseResult {
  const core = withoutIdLines(text);
  if (!core) return { kind: "error", error: "no_data" };

  if (isCancellation(core)) return { kind: "cancelled" };

  const timeOnly = parseTimeOnly(core);
  if (timeOnly) {
    if (!ctx.existingDeadline) return { kind: "error", error: "no_date" };
    return {
      kind: "updates",
      updates: { deadline: timeWithExistingDate(ctx.existingDeadline, timeOnly.hour, timeOnly.minute) },
      skipped: [],
    };
  }

  const structured = parseStructured(text, ctx);
  const updates = structured.foundKeys > 0 ? structured.updates : parseUnstructured(core.replace(/`/g, ""), ctx);

  if (Object.keys(updates).length === 0) {
    return { kind: "error", error: "no_data" };
  }
  return { kind: "updates", updates, skipped: structured.skipped };
}
