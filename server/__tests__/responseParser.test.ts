/**
 * Unit Tests: Clarification Reply Parser
 *
 * Replies arrive as filled-in templates, bare times or loose free text.
 */

import { describe, it, expect } from "vitest";
import { isCancellation, parseClarificationResponse, type ClarificationParseContext } from "../clarification/responseParser";
import { buildTemplate } from "../clarification/templates";
import { ASSIGNMENT_ID } from "./helpers/factories";

const ctx: ClarificationParseContext = {
  existingDeadline: new Date("2026-01-20T16:59:00Z"), // 2026-01-20 23:59 WIB
  currentYear: 2026,
};

describe("cancellation", () => {
  it("matches keywords exactly after trimming", () => {
    expect(isCancellation("  BATAL ")).toBe(true);
    expect(isCancellation("gak jadi")).toBe(true);
    expect(isCancellation("batal dulu")).toBe(false);
  });

  it("returns cancelled", () => {
    expect(parseClarificationResponse("batal", ctx)).toEqual({ kind: "cancelled" });
  });

  it.each(["cancel", "batalkan", "tidak", "Cancel"])("cancels on %s", (keyword) => {
    expect(parseClarificationResponse(keyword, ctx)).toEqual({ kind: "cancelled" });
  });
});

describe("time-only replies", () => {
  it("keeps the existing deadline date", () => {
    expect(parseClarificationResponse("08:00", ctx)).toEqual({
      kind: "updates",
      updates: { deadline: "2026-01-20 08:00" },
      skipped: [],
    });
  });

  it("errors when the assignment has no date yet", () => {
    expect(parseClarificationResponse("08:00", { ...ctx, existingDeadline: null })).toEqual({
      kind: "error",
      error: "no_date",
    });
  });
});

describe("structured replies", () => {
  it("parses a filled template and skips placeholders", () => {
    const reply = [
      `🆔 ID: \`${ASSIGNMENT_ID}\``,
      "Matkul: strukdat",
      "Judul: LKP 14",
      "Deadline: 15 Jan 23:59",
      "Paralel: K2",
      "Deskripsi: [keterangan singkat tugas]",
    ].join("\n");

    expect(parseClarificationResponse(reply, ctx)).toEqual({
      kind: "updates",
      updates: {
        course_name: "strukdat",
        title: "LKP 14",
        deadline: "2026-01-15 23:59",
        parallel_code: "k2",
      },
      skipped: [],
    });
  });

  it("applies a time-only deadline line to the existing date", () => {
    expect(parseClarificationResponse("Deadline: 09.30", ctx)).toEqual({
      kind: "updates",
      updates: { deadline: "2026-01-20 09:30" },
      skipped: [],
    });
  });

  it("reports an unreadable deadline but keeps the other fields", () => {
    expect(parseClarificationResponse("Deadline: besok lusa\nJudul: Kuis 2", ctx)).toEqual({
      kind: "updates",
      updates: { title: "Kuis 2" },
      skipped: [
        { field: "deadline", value: "besok lusa", reason: 'Cannot parse deadline "besok lusa": no recognizable date' },
      ],
    });
  });

  it("returns no_data when every recognized key is a placeholder", () => {
    const untouched = buildTemplate(ASSIGNMENT_ID, ["title", "description"]);
    expect(parseClarificationResponse(untouched, ctx)).toEqual({ kind: "error", error: "no_data" });
  });
});

describe("unstructured replies", () => {
  it("picks a parallel code and a date out of free text", () => {
    expect(parseClarificationResponse("K2 deadline 20 jan", ctx)).toEqual({
      kind: "updates",
      updates: { parallel_code: "k2", deadline: "2026-01-20" },
      skipped: [],
    });
  });

  it("uses long free text as the description", () => {
    expect(parseClarificationResponse("bikin laporan praktikum modul tiga", ctx)).toEqual({
      kind: "updates",
      updates: { description: "bikin laporan praktikum modul tiga" },
      skipped: [],
    });
  });

  it("reads a bare semua as the all parallel", () => {
    expect(parseClarificationResponse("semua", { existingDeadline: null, currentYear: 2026 })).toEqual({
      kind: "updates",
      updates: { parallel_code: "all" },
      skipped: [],
    });
  });

  it("returns no_data for an empty or blank reply", () => {
    expect(parseClarificationResponse("", ctx)).toEqual({ kind: "error", error: "no_data" });
    expect(parseClarificationResponse("   \n  ", ctx)).toEqual({ kind: "error", error: "no_data" });
  });

  it("returns no_data for short noise", () => {
    expect(parseClarificationResponse("ok", ctx)).toEqual({ kind: "error", error: "no_data" });
  });

  it("returns no_data when only the id line is present", () => {
    expect(parseClarificationResponse(`ID: ${ASSIGNMENT_ID}`, ctx)).toEqual({ kind: "error", error: "no_data" });
  });
});
