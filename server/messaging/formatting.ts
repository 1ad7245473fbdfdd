/**
 * WhatsApp text helpers for command replies.
 */

import { civilDayDifference, formatCivilDate, toCivil } from "../utils/civilTime";

const MONTHS_ID = ["Jan", "Feb", "Mar", "Apr", "Mei", "Jun", "Jul", "Agu", "Sep", "Okt", "Nov", "Des"] as const;

/**
 * User text must not toggle WhatsApp bold/italic/strike/mono.
 */
export function sanitizeWhatsAppMarkdown(text: string): string {
  return text
    .replace(/\*/g, "×")
    .replace(/_/g, " ")
    .replace(/~/g, "-")
    .replace(/`/g, "'");
}

/**
 * Single line, collapsed whitespace, cut at `maxChars` with an ellipsis.
 */
export function previewText(text: string, maxChars: number): string {
  const oneLine = text.split(/\s+/).filter(Boolean).join(" ");
  const chars = Array.from(oneLine);
  return chars.length > maxChars ? `${chars.slice(0, maxChars).join("")}…` : oneLine;
}

/** Civil days from today until the deadline's civil date. */
export function daysLeft(deadline: Date, now: Date): number {
  return civilDayDifference(formatCivilDate(now), formatCivilDate(deadline));
}

export function statusDot(deadline: Date | null, now: Date): string {
  if (!deadline) return "⚪";
  const days = daysLeft(deadline, now);
  if (days < 1) return "🔴";
  if (days === 1) return "🟠";
  if (days === 2) return "🟡";
  return "🟢";
}

/** "15 Jan 2026" */
export function formatDateId(instant: Date): string {
  const c = toCivil(instant);
  return `${c.day} ${MONTHS_ID[c.month - 1]} ${c.year}`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function humanizeDeadline(deadline: Date | null, now: Date): string {
  if (!deadline) return "⚠️ Belum ada deadline";

  const c = toCivil(deadline);
  const stamp = `${formatDateId(deadline)} ${pad(c.hour)}:${pad(c.minute)}`;
  const delta = daysLeft(deadline, now);

  if (delta === 0) return `Hari ini (${stamp})`;
  if (delta === 1) return `Besok (${stamp})`;
  if (delta >= 2) return `H-${delta} (${stamp})`;
  if (delta === -1) return `Kemarin (${stamp})`;
  return `lewat ${Math.abs(delta)} hari (${stamp})`;
}
