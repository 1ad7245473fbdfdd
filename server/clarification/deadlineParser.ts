/**
 * Flexible Deadline Parser
 *
 * Turns what students actually type ("15 Jan", "15/01 23.59", "1501",
 * "15 januari jam 08:00") into "YYYY-MM-DD" or "YYYY-MM-DD HH:MM".
 *
 * The year is supplied by the caller. Date shapes are tried in a fixed
 * order and the first match wins:
 *   1. month name with an adjacent day number
 *   2. two separate numbers (day, month)
 *   3. one concatenated number (DDMM / DMM)
 */

import { ValidationError } from "../utils/errorHandler";
import { isValidCalendarDate, makeDateString, makeTimeString } from "../utils/civilTime";

export class DeadlineParseError extends ValidationError {
  input: string;
  constructor(input: string, reason: string) {
    super(`Cannot parse deadline "${input}": ${reason}`);
    this.name = "DeadlineParseError";
    this.input = input;
  }
}

const MONTHS: Record<string, number> = {
  // Indonesian
  januari: 1, februari: 2, maret: 3, april: 4, mei: 5, juni: 6,
  juli: 7, agustus: 8, september: 9, oktober: 10, november: 11, desember: 12,
  // English
  january: 1, february: 2, march: 3, may: 5, june: 6,
  july: 7, august: 8, october: 10, december: 12,
  // Abbreviations
  jan: 1, feb: 2, mar: 3, apr: 4, jun: 6, jul: 7,
  agu: 8, ags: 8, aug: 8, sep: 9, sept: 9, okt: 10, oct: 10, nov: 11, des: 12, dec: 12,
};

export type TimeOfDay = { hour: number; minute: number };

function validTime(hour: number, minute: number): boolean {
  return hour >= 0 && hour < 24 && minute >= 0 && minute < 60;
}

/**
 * Parses a bare "HH:MM" / "HH.MM" reply. Returns null for anything else.
 */
export function parseTimeOnly(text: string): TimeOfDay | null {
  const match = /^(\d{1,2})[:.](\d{1,2})$/.exec(text.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  return validTime(hour, minute) ? { hour, minute } : null;
}

type ExtractedTime = { time: TimeOfDay | null; rest: string };

/**
 * Pulls the first valid time token out of the text. The colon form wins;
 * a dot form is only a time when it does not open the text and is not part
 * of a longer dotted number, so "15.01" stays a date.
 */
export function extractTime(text: string): ExtractedTime {
  const colon = /(?<!\d)(\d{1,2}):(\d{1,2})(?!\d)/g;
  for (const m of text.matchAll(colon)) {
    const hour = Number(m[1]);
    const minute = Number(m[2]);
    if (validTime(hour, minute) && m.index !== undefined) {
      return { time: { hour, minute }, rest: text.slice(0, m.index) + " " + text.slice(m.index + m[0].length) };
    }
  }

  const dotted = /(?<![\d.])(\d{1,2})\.(\d{1,2})(?![\d.])/g;
  for (const m of text.matchAll(dotted)) {
    if (m.index === undefined || text.slice(0, m.index).trim().length === 0) continue;
    const hour = Number(m[1]);
    const minute = Number(m[2]);
    if (validTime(hour, minute)) {
      return { time: { hour, minute }, rest: text.slice(0, m.index) + " " + text.slice(m.index + m[0].length) };
    }
  }

  return { time: null, rest: text };
}

type CivilDate = { year: number; month: number; day: number };

function asDay(token: string | undefined): number | null {
  if (token === undefined || !/^\d{1,2}$/.test(token)) return null;
  const n = Number(token);
  return n >= 1 && n <= 31 ? n : null;
}

function asYear(token: string | undefined): number | null {
  if (token === undefined || !/^\d{4}$/.test(token)) return null;
  return Number(token);
}

function trimPunctuation(token: string): string {
  return token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "");
}

function parseMonthName(text: string, currentYear: number): CivilDate | null {
  const tokens = text
    .split(/\s+/)
    .map((t) => trimPunctuation(t).toLowerCase())
    .filter((t) => t.length > 0);

  for (let i = 0; i < tokens.length; i++) {
    const month = MONTHS[tokens[i]];
    if (month === undefined) continue;

    const before = asDay(tokens[i - 1]);
    if (before !== null) {
      return { year: asYear(tokens[i + 1]) ?? currentYear, month, day: before };
    }
    const after = asDay(tokens[i + 1]);
    if (after !== null) {
      return { year: asYear(tokens[i + 2]) ?? currentYear, month, day: after };
    }
  }
  return null;
}

function numericTokens(text: string): string[] {
  return text
    .replace(/[-/.,]/g, " ")
    .split(/\s+/)
    .filter((t) => /^\d+$/.test(t));
}

function parseTwoNumbers(numbers: string[], currentYear: number): CivilDate | null {
  if (numbers.length < 2) return null;

  // 2026-01-15 typed in ISO order
  const isoYear = asYear(numbers[0]);
  if (isoYear !== null && numbers.length >= 3) {
    return { year: isoYear, month: Number(numbers[1]), day: Number(numbers[2]) };
  }

  const day = asDay(numbers[0]);
  const month = Number(numbers[1]);
  if (day === null || !/^\d{1,2}$/.test(numbers[1]) || month < 1 || month > 12) return null;
  return { year: asYear(numbers[2]) ?? currentYear, month, day };
}

function parseConcatenated(numbers: string[], currentYear: number): CivilDate | null {
  if (numbers.length !== 1 || !/^\d{3,4}$/.test(numbers[0])) return null;
  const n = Number(numbers[0]);
  if (n < 101 || n > 3112) return null;
  const day = Math.floor(n / 100);
  const month = n % 100;
  if (day < 1 || day > 31 || month < 1 || month > 12) return null;
  return { year: currentYear, month, day };
}

/**
 * Parses free deadline text. Throws DeadlineParseError when no date shape
 * matches or the date does not exist on the calendar.
 */
export function parseFlexibleDeadline(text: string, currentYear: number): string {
  const input = text.trim();
  if (!input) throw new DeadlineParseError(text, "empty");

  const { time, rest } = extractTime(input);
  const dateText = rest.trim();

  const date =
    parseMonthName(dateText, currentYear) ??
    parseTwoNumbers(numericTokens(dateText), currentYear) ??
    parseConcatenated(numericTokens(dateText), currentYear);

  if (!date) {
    throw new DeadlineParseError(text, "no recognizable date");
  }
  if (!isValidCalendarDate(date.year, date.month, date.day)) {
    throw new DeadlineParseError(text, "date does not exist");
  }

  const datePart = makeDateString(date.year, date.month, date.day);
  return time ? `${datePart} ${makeTimeString(time.hour, time.minute)}` : datePart;
}
