/**
 * Clarification message builders (WhatsApp markdown).
 *
 * The template embeds the assignment id as "🆔 ID: `<uuid>`" so a reply
 * can be routed back without any stored conversation state.
 */

import type { AssignmentWithCourse } from "@shared/schema";
import { formatCivilDateTime } from "../utils/civilTime";
import { FIELD_PRESENTATION, type ClarificationField } from "./fields";
import type { ClarificationParseError, SkippedField } from "./responseParser";

export type ClarificationMessages = {
  summary: string;
  template: string;
};

function currentValue(value: string | null | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : "-";
}

export function buildTemplate(assignmentId: string, missing: readonly ClarificationField[]): string {
  const lines = [`🆔 ID: \`${assignmentId}\``];
  for (const field of missing) {
    const { templateKey, formatHint } = FIELD_PRESENTATION[field];
    lines.push(`${templateKey}: [${formatHint}]`);
  }
  return lines.join("\n");
}

export function buildClarificationMessages(
  assignment: AssignmentWithCourse,
  missing: readonly ClarificationField[],
): ClarificationMessages {
  const fieldList = missing.map((f) => `• ${FIELD_PRESENTATION[f].label}`).join("\n");
  const deadline = assignment.deadline ? formatCivilDateTime(assignment.deadline) : "-";

  const summary = [
    "⚠️ *PERLU KLARIFIKASI*",
    "━━━━━━━━━━━━━━━━━━",
    "Tugas baru terdeteksi tapi ada info yang kurang.",
    "",
    `📌 Judul saat ini = ${currentValue(assignment.title)}`,
    `📚 Matkul saat ini = ${currentValue(assignment.courseName)}`,
    `⏰ Deadline saat ini = ${deadline}`,
    "",
    "*Info yang dibutuhkan:*",
    fieldList,
    "",
    "💡 *Cara menjawab:*",
    "Salin pesan berikutnya, ganti bagian [...] dengan isinya, lalu kirim ke sini.",
    "_Ketik *batal* untuk membatalkan._",
  ].join("\n");

  return { summary, template: buildTemplate(assignment.id, missing) };
}

/**
 * Re-prompt after a reply that could not be applied.
 */
export function buildParseErrorMessage(
  error: ClarificationParseError,
  assignmentId: string,
  missing: readonly ClarificationField[],
): string {
  const header =
    error === "no_date"
      ? "⏰ Jam saja belum cukup karena tugas ini belum punya tanggal deadline.\nKirim tanggal dan jamnya, contoh: *15 Jan 23:59*"
      : "❓ Balasan belum bisa dibaca.\nIsi dengan format di bawah ini ya:";
  const fields: readonly ClarificationField[] = missing.length > 0 ? missing : ["deadline"];
  return `${header}\n\n${buildTemplate(assignmentId, fields)}`;
}

export function buildSkippedFieldsNote(skipped: readonly SkippedField[]): string | null {
  if (skipped.length === 0) return null;
  const items = skipped.map((s) => `• ${FIELD_PRESENTATION[s.field].label}: "${s.value}"`).join("\n");
  return `⚠️ Bagian ini tidak terbaca dan dilewati:\n${items}`;
}

export function buildClarificationCompleteMessage(assignment: AssignmentWithCourse): string {
  const deadline = assignment.deadline ? formatCivilDateTime(assignment.deadline) : "-";
  return [
    "✅ *Data tugas sudah lengkap!*",
    "",
    `📚 ${currentValue(assignment.courseName)}`,
    `📝 ${currentValue(assignment.title)}`,
    `⏰ ${deadline}`,
    `🧩 ${currentValue(assignment.parallelCode)}`,
    `📄 ${currentValue(assignment.description)}`,
  ].join("\n");
}

export const CLARIFICATION_CANCELLED_MESSAGE =
  "❎ Klarifikasi dibatalkan. Data tugas tidak diubah.";
