/**
 * Unit Tests: Civil Time (GMT+7)
 *
 * Deadlines are stored as UTC instants but read and typed in WIB.
 */

import { describe, it, expect } from "vitest";
import {
  addCivilDays,
  civilDayDifference,
  civilToUtc,
  civilWeekday,
  formatCivilDateTime,
  isValidCalendarDate,
  toCivil,
} from "../utils/civilTime";

describe("toCivil", () => {
  it("shifts a late-evening UTC instant into the next civil day", () => {
    const civil = toCivil(new Date("2026-01-14T17:30:00Z"));
    expect(civil).toEqual({ year: 2026, month: 1, day: 15, hour: 0, minute: 30, weekday: 3 });
  });

  it("formats with seconds when asked", () => {
    expect(formatCivilDateTime(new Date("2026-01-14T17:30:45Z"), true)).toBe("2026-01-15 00:30:45");
    expect(formatCivilDateTime(new Date("2026-01-14T17:30:45Z"))).toBe("2026-01-15 00:30");
  });
});

describe("civilToUtc", () => {
  it("defaults a bare date to 23:59 civil", () => {
    expect(civilToUtc("2026-01-15")?.toISOString()).toBe("2026-01-15T16:59:00.000Z");
  });

  it("keeps an explicit time", () => {
    expect(civilToUtc("2026-01-15 08:00")?.toISOString()).toBe("2026-01-15T01:00:00.000Z");
  });

  it("rejects impossible dates and times", () => {
    expect(civilToUtc("2026-02-30")).toBeNull();
    expect(civilToUtc("2026-01-15 24:00")).toBeNull();
    expect(civilToUtc("tomorrow")).toBeNull();
  });
});

describe("calendar helpers", () => {
  it("validates real calendar days", () => {
    expect(isValidCalendarDate(2028, 2, 29)).toBe(true);
    expect(isValidCalendarDate(2026, 2, 29)).toBe(false);
    expect(isValidCalendarDate(2026, 13, 1)).toBe(false);
  });

  it("adds days across a month boundary", () => {
    expect(addCivilDays("2026-01-31", 1)).toBe("2026-02-01");
    expect(addCivilDays("2026-03-01", -1)).toBe("2026-02-28");
  });

  it("numbers weekdays from Monday", () => {
    expect(civilWeekday("2026-01-19")).toBe(0);
    expect(civilWeekday("2026-01-25")).toBe(6);
  });

  it("counts whole days between civil dates", () => {
    expect(civilDayDifference("2026-01-15", "2026-01-18")).toBe(3);
    expect(civilDayDifference("2026-01-18", "2026-01-15")).toBe(-3);
  });

  it("throws on malformed input", () => {
    expect(() => addCivilDays("15-01-2026", 1)).toThrow(RangeError);
  });
});
