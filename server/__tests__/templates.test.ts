/**
 * Unit Tests: Clarification Messages
 */

import { describe, it, expect } from "vitest";
import { extractAssignmentId } from "../clarification/assignmentId";
import {
  buildClarificationCompleteMessage,
  buildClarificationMessages,
  buildParseErrorMessage,
  buildSkippedFieldsNote,
  buildTemplate,
} from "../clarification/templates";
import { ASSIGNMENT_ID, makeAssignment } from "./helpers/factories";

describe("buildTemplate", () => {
  it("embeds the id and one line per missing field", () => {
    expect(buildTemplate(ASSIGNMENT_ID, ["title", "deadline"])).toBe(
      [
        `🆔 ID: \`${ASSIGNMENT_ID}\``,
        "Judul: [judul spesifik, contoh: LKP 14]",
        "Deadline: [tanggal [jam], contoh: 15 Jan 23:59]",
      ].join("\n"),
    );
  });

  it("can be routed back by its id", () => {
    expect(extractAssignmentId(buildTemplate(ASSIGNMENT_ID, ["course_name"]))).toBe(ASSIGNMENT_ID);
  });
});

describe("buildClarificationMessages", () => {
  it("summarizes current values and lists the missing fields", () => {
    const { summary, template } = buildClarificationMessages(
      makeAssignment({ courseName: null, parallelCode: null }),
      ["course_name", "parallel_code"],
    );
    const lines = summary.split("\n");

    expect(lines[0]).toBe("⚠️ *PERLU KLARIFIKASI*");
    expect(lines).toContain("📌 Judul saat ini = LKP 14");
    expect(lines).toContain("📚 Matkul saat ini = -");
    expect(lines).toContain("⏰ Deadline saat ini = 2026-01-20 23:59");
    expect(lines).toContain("• 📚 Nama Mata Kuliah");
    expect(lines).toContain("• 🧩 Kode Paralel (K1/K2/P1/all)");
    expect(template).toBe(buildTemplate(ASSIGNMENT_ID, ["course_name", "parallel_code"]));
  });
});

describe("buildParseErrorMessage", () => {
  it("asks for a date when a bare time arrived first", () => {
    const message = buildParseErrorMessage("no_date", ASSIGNMENT_ID, ["deadline"]);
    expect(message.startsWith("⏰ Jam saja belum cukup")).toBe(true);
    expect(message.endsWith(buildTemplate(ASSIGNMENT_ID, ["deadline"]))).toBe(true);
  });

  it("falls back to the deadline field when nothing is missing", () => {
    const message = buildParseErrorMessage("no_data", ASSIGNMENT_ID, []);
    expect(message).toBe(
      `❓ Balasan belum bisa dibaca.\nIsi dengan format di bawah ini ya:\n\n${buildTemplate(ASSIGNMENT_ID, ["deadline"])}`,
    );
  });
});

describe("buildSkippedFieldsNote", () => {
  it("is null when nothing was skipped", () => {
    expect(buildSkippedFieldsNote([])).toBeNull();
  });

  it("quotes each skipped value", () => {
    expect(buildSkippedFieldsNote([{ field: "deadline", value: "besok lusa", reason: "x" }])).toBe(
      '⚠️ Bagian ini tidak terbaca dan dilewati:\n• ⏰ Deadline: "besok lusa"',
    );
  });
});

describe("buildClarificationCompleteMessage", () => {
  it("lists every field in civil time", () => {
    expect(buildClarificationCompleteMessage(makeAssignment())).toBe(
      [
        "✅ *Data tugas sudah lengkap!*",
        "",
        "📚 Struktur Data",
        "📝 LKP 14",
        "⏰ 2026-01-20 23:59",
        "🧩 k2",
        "📄 Implementasi AVL tree dan rotasi",
      ].join("\n"),
    );
  });
});
