/**
 * Civil Time (GMT+7)
 *
 * Deadlines are stored in UTC, but every date a user types or reads is
 * Western Indonesian Time. Civil dates travel as "YYYY-MM-DD" strings and
 * civil times as "HH:MM" so nothing depends on the host timezone.
 */

import { addMinutes } from "date-fns";
import { CIVIL_TIME } from "../config/constants";

export type CivilDateTime = {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  weekday: number; // 0 = Monday .. 6 = Sunday
};

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function toCivil(instant: Date): CivilDateTime {
  const shifted = addMinutes(instant, CIVIL_TIME.OFFSET_MINUTES);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    weekday: (shifted.getUTCDay() + 6) % 7,
  };
}

export function formatCivilDate(instant: Date): string {
  const c = toCivil(instant);
  return `${c.year}-${pad(c.month)}-${pad(c.day)}`;
}

export function formatCivilTime(instant: Date): string {
  const c = toCivil(instant);
  return `${pad(c.hour)}:${pad(c.minute)}`;
}

export function formatCivilDateTime(instant: Date, withSeconds = false): string {
  const base = `${formatCivilDate(instant)} ${formatCivilTime(instant)}`;
  if (!withSeconds) return base;
  const seconds = addMinutes(instant, CIVIL_TIME.OFFSET_MINUTES).getUTCSeconds();
  return `${base}:${pad(seconds)}`;
}

export function makeDateString(year: number, month: number, day: number): string {
  return `${year}-${pad(month)}-${pad(day)}`;
}

export function makeTimeString(hour: number, minute: number): string {
  return `${pad(hour)}:${pad(minute)}`;
}

/**
 * Returns true when the triple names a real calendar day (rejects 31 Feb).
 */
export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1 || day > 31) return false;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day;
}

function parseDateString(date: string): { year: number; month: number; day: number } | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  return isValidCalendarDate(year, month, day) ? { year, month, day } : null;
}

export function addCivilDays(date: string, days: number): string {
  const parsed = parseDateString(date);
  if (!parsed) throw new RangeError(`Invalid civil date "${date}"`);
  const next = new Date(Date.UTC(parsed.year, parsed.month - 1, parsed.day + days));
  return makeDateString(next.getUTCFullYear(), next.getUTCMonth() + 1, next.getUTCDate());
}

/** 0 = Monday .. 6 = Sunday */
export function civilWeekday(date: string): number {
  const parsed = parseDateString(date);
  if (!parsed) throw new RangeError(`Invalid civil date "${date}"`);
  return (new Date(Date.UTC(parsed.year, parsed.month - 1, parsed.day)).getUTCDay() + 6) % 7;
}

export function civilDayDifference(from: string, to: string): number {
  const a = parseDateString(from);
  const b = parseDateString(to);
  if (!a || !b) throw new RangeError(`Invalid civil date "${a ? to : from}"`);
  const ms = Date.UTC(b.year, b.month - 1, b.day) - Date.UTC(a.year, a.month - 1, a.day);
  return Math.round(ms / 86_400_000);
}

/**
 * Converts "YYYY-MM-DD" or "YYYY-MM-DD HH:MM" civil text to a UTC instant.
 * A missing time becomes the end-of-day default.
 */
export function civilToUtc(value: string): Date | null {
  const match = /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{1,2}):(\d{2}))?/.exec(value.trim());
  if (!match) return null;
  const parsed = parseDateString(match[1]);
  if (!parsed) return null;

  let hour: number = CIVIL_TIME.DEFAULT_DEADLINE_HOUR;
  let minute: number = CIVIL_TIME.DEFAULT_DEADLINE_MINUTE;
  if (match[2] !== undefined && match[3] !== undefined) {
    hour = Number(match[2]);
    minute = Number(match[3]);
    if (hour > 23 || minute > 59) return null;
  }

  const asIfUtc = Date.UTC(parsed.year, parsed.month - 1, parsed.day, hour, minute);
  return addMinutes(new Date(asIfUtc), -CIVIL_TIME.OFFSET_MINUTES);
}
