/**
 * Schedule Oracle
 *
 * Purpose:
 * Static lookup of weekly class meetings, used to turn "sebelum pertemuan
 * berikutnya" / "before next class" into a concrete date and time.
 *
 * Built once from the timetable JSON (keyed by Indonesian weekday name)
 * and read-only afterwards.
 *
 * Layer: Domain data
 */

import * as fs from "fs";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ValidationError } from "../utils/errorHandler";
import { addCivilDays, civilWeekday } from "../utils/civilTime";

export const WEEKDAYS = ["Senin", "Selasa", "Rabu", "Kamis", "Jumat", "Sabtu", "Minggu"] as const;
export type WeekdayName = typeof WEEKDAYS[number];

/**
 * Course code -> lowercase fragments of the names students use for it.
 */
export const COURSE_CODE_ALIASES: Record<string, readonly string[]> = {
  kom1221: ["metode kuantitatif", "metkuan", "mk"],
  kom120d: ["matematika komputasi", "matkom", "pengantar matematika"],
  kom120c: ["pemrograman", "pemrog"],
  kom120g: ["organisasi dan arsitektur komputer", "orkom", "oaak"],
  kom120h: ["struktur data", "sd", "strukdat"],
  kom1231: ["rekayasa perangkat lunak", "rpl"],
  kom1232: ["desain pengalaman pengguna", "ux", "uxd", "dpp"],
  kom1304: ["grafika komputer dan visualisasi", "grafkom", "gkv"],
};

const scheduleEntrySchema = z.object({
  course: z.string().min(1),
  parallel: z.string().min(1),
  schedule: z.string().regex(/^\d{1,2}:\d{2}\s*-\s*\d{1,2}:\d{2}$/, "expected HH:MM-HH:MM"),
});

const timetableSchema = z.object({
  Senin: z.array(scheduleEntrySchema).default([]),
  Selasa: z.array(scheduleEntrySchema).default([]),
  Rabu: z.array(scheduleEntrySchema).default([]),
  Kamis: z.array(scheduleEntrySchema).default([]),
  Jumat: z.array(scheduleEntrySchema).default([]),
  Sabtu: z.array(scheduleEntrySchema).default([]),
  Minggu: z.array(scheduleEntrySchema).default([]),
});

export type ScheduleEntry = z.infer<typeof scheduleEntrySchema>;
export type Timetable = z.input<typeof timetableSchema>;

export type Meeting = {
  weekday: number; // 0 = Monday
  startTime: string; // "HH:MM"
};

export type NextMeeting = {
  date: string; // "YYYY-MM-DD"
  time: string; // "HH:MM"
};

type ScheduleKey = {
  code: string;
  parallel: string;
  meetings: Meeting[];
};

function normalizeStartTime(range: string): string {
  const start = range.split("-")[0]?.trim() ?? range;
  const [h, m] = start.split(":");
  return `${(h ?? "").padStart(2, "0")}:${m ?? "00"}`;
}

/**
 * Days from one weekday to the next occurrence of another. The same
 * weekday counts as a full week ahead.
 */
export function daysUntilWeekday(from: number, to: number): number {
  const diff = (to - from + 7) % 7;
  return diff === 0 ? 7 : diff;
}

export function courseMatchesCode(courseCode: string, courseName: string): boolean {
  const code = courseCode.toLowerCase();
  const name = courseName.toLowerCase();
  for (const [aliasCode, fragments] of Object.entries(COURSE_CODE_ALIASES)) {
    if (code.includes(aliasCode) && fragments.some((f) => name.includes(f))) {
      return true;
    }
  }
  return false;
}

export class ScheduleOracle {
  private readonly keys: ScheduleKey[];

  private constructor(keys: ScheduleKey[]) {
    this.keys = keys;
  }

  static fromTimetable(raw: unknown): ScheduleOracle {
    const parsed = timetableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Invalid timetable: ${fromZodError(parsed.error).message}`);
    }

    const keys: ScheduleKey[] = [];
    WEEKDAYS.forEach((dayName, weekday) => {
      for (const entry of parsed.data[dayName]) {
        const code = (entry.course.split(" - ")[0] ?? entry.course).trim();
        const parallel = entry.parallel.trim().toLowerCase();
        let key = keys.find((k) => k.code === code && k.parallel === parallel);
        if (!key) {
          key = { code, parallel, meetings: [] };
          keys.push(key);
        }
        key.meetings.push({ weekday, startTime: normalizeStartTime(entry.schedule) });
      }
    });

    console.log(`[ScheduleOracle] Loaded ${keys.length} course/parallel schedules`);
    return new ScheduleOracle(keys);
  }

  static loadFromFile(path: string): ScheduleOracle {
    let content: string;
    try {
      content = fs.readFileSync(path, "utf8");
    } catch (err) {
      throw new ValidationError(`Failed to read schedule file ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new ValidationError(`Failed to parse schedule JSON ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return ScheduleOracle.fromTimetable(raw);
  }

  static empty(): ScheduleOracle {
    return new ScheduleOracle([]);
  }

  getMeetings(courseName: string, parallelCode: string): Meeting[] | null {
    const parallel = parallelCode.trim().toLowerCase();
    const key = this.keys.find((k) => k.parallel === parallel && courseMatchesCode(k.code, courseName));
    return key ? [...key.meetings] : null;
  }

  /**
   * Earliest upcoming meeting after `fromDate` (civil "YYYY-MM-DD").
   * Only dates are compared; a meeting on the same weekday is next week's.
   */
  getNextMeeting(courseName: string, parallelCode: string, fromDate: string): NextMeeting | null {
    const meetings = this.getMeetings(courseName, parallelCode);
    if (!meetings || meetings.length === 0) return null;

    const fromWeekday = civilWeekday(fromDate);
    const candidates = meetings.map((m) => ({
      date: addCivilDays(fromDate, daysUntilWeekday(fromWeekday, m.weekday)),
      time: m.startTime,
    }));

    candidates.sort((a, b) => a.date.localeCompare(b.date) || a.time.localeCompare(b.time));
    return candidates[0] ?? null;
  }
}
