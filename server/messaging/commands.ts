/**
 * Command Handler
 *
 * Replies to "#" commands. Numbered commands (#done, #expand, #<n>) always
 * index the sender's own unfinished list, the one #todo shows.
 */

import type { AssignmentWithCourse } from "@shared/schema";
import { addDays } from "date-fns";
import { COMMAND_CONSTANTS } from "../config/constants";
import type { IStorage } from "../storage";
import { formatCivilDate, type Clock } from "../utils/civilTime";
import { getErrorMessage } from "../utils/errorHandler";
import type { RequestLogger } from "../utils/logger";
import type { BotCommand } from "./classifier";
import { humanizeDeadline, previewText, sanitizeWhatsAppMarkdown, statusDot } from "./formatting";

export type CommandContext = {
  senderId: string;
  chatId: string;
  isAcademicChannel: boolean;
  storage: IStorage;
  clock: Clock;
  logger?: RequestLogger;
};

const FETCH_FAILED = "❌ Maaf, terjadi kesalahan saat mengambil data tugas.\n_Coba lagi sebentar ya._";

export const HELP_TEXT = [
  "*[Bot Tugas Akademik]*",
  "",
  "*Perintah Umum:*",
  "• #ping - cek bot hidup & latency",
  "• #tugas - lihat semua tugas aktif",
  "• #today - tugas deadline hari ini",
  "• #week - tugas 7 hari ke depan",
  "• #help - bantuan",
  "",
  "*Perintah Personal:*",
  "• #todo - lihat tugas pribadi kamu",
  "• #<nomor> atau #expand <nomor> - detail tugas dari #todo",
  "• #done <nomor> - tandai selesai",
  "• #undo - batalkan #done terakhir",
  "",
  "*Penting:* nomor di #<nomor> dan #done selalu dari *#todo*.",
  "_Info tugas otomatis tersimpan dari grup info akademik._",
].join("\n");

function formatAssignmentEntry(a: AssignmentWithCourse, index: number, now: Date): string {
  const lines = [
    `${statusDot(a.deadline, now)} *[${index + 1}] [${previewText(sanitizeWhatsAppMarkdown(a.title), COMMAND_CONSTANTS.TITLE_PREVIEW_CHARS)}]*`,
    `📌 ${sanitizeWhatsAppMarkdown(a.courseName ?? "-")}`,
    `⏰ Deadline: ${humanizeDeadline(a.deadline, now)}`,
  ];
  const desc = sanitizeWhatsAppMarkdown(a.description).trim();
  if (desc) {
    lines.push(`📝 ${previewText(desc, COMMAND_CONSTANTS.DESCRIPTION_PREVIEW_CHARS)}`);
  }
  if (a.parallelCode) {
    lines.push(`🧩 Kode: ${sanitizeWhatsAppMarkdown(a.parallelCode)}`);
  }
  return lines.join("\n");
}

const PERSONAL_FOOTER = "_🔎 Detail: #<nomor>_\n_✅ Selesai: #done <nomor>_";

export function formatAssignmentList(
  assignments: readonly AssignmentWithCourse[],
  header: string,
  now: Date,
  personal: boolean,
): string {
  if (assignments.length === 0) {
    return personal
      ? `${header}\n\n🎉 *Selamat!* Semua tugas sudah selesai!\n✨ _Kamu keren banget!_`
      : `${header}\n\n📭 Belum ada tugas.`;
  }

  const entries = assignments.map((a, i) => formatAssignmentEntry(a, i, now)).join("\n\n");
  const footer = personal ? PERSONAL_FOOTER : "_💡 Gunakan #todo untuk list personal_";
  return `${header}\n\n${entries}\n\n${footer}`;
}

/**
 * A deadline window over the sender's to-do list. Entries keep their #todo
 * numbers so #done and #<nomor> work on them directly.
 */
export function formatDeadlineWindow(
  todo: readonly AssignmentWithCourse[],
  inWindow: (deadline: Date) => boolean,
  header: string,
  now: Date,
): string {
  const entries = todo.flatMap((a, i) => (a.deadline && inWindow(a.deadline) ? [formatAssignmentEntry(a, i, now)] : []));
  if (entries.length === 0) {
    return `${header}\n\n📭 Tidak ada tugas di rentang ini.`;
  }
  return `${header}\n\n${entries.join("\n\n")}\n\n${PERSONAL_FOOTER}`;
}

export function formatAssignmentDetail(a: AssignmentWithCourse, index: number, now: Date): string {
  const desc = sanitizeWhatsAppMarkdown(a.description).trim() || "-";
  const lines = [
    `🧾 *Detail Tugas #${index}*`,
    "Status: ⬜ BELUM SELESAI",
    "",
    `${statusDot(a.deadline, now)} *${sanitizeWhatsAppMarkdown(a.courseName ?? "-")}*`,
    `📌 ${sanitizeWhatsAppMarkdown(a.title)}`,
    `⏰ Deadline: ${humanizeDeadline(a.deadline, now)}`,
    `📝 ${desc}`,
  ];
  if (a.parallelCode) {
    lines.push(`🧩 Paralel: ${sanitizeWhatsAppMarkdown(a.parallelCode)}`);
  }
  return lines.join("\n");
}

function notFound(index: number): string {
  return `❌ Tugas nomor *${index}* tidak ditemukan di to-do list kamu.\n\n💡 _Tip: Ketik #todo untuk lihat daftar tugas._`;
}

async function handlePing(ctx: CommandContext): Promise<string> {
  const started = Date.now();
  let dbIcon = "🟢";
  let dbLatency: string;
  try {
    const dbStarted = Date.now();
    await ctx.storage.ping();
    dbLatency = `${Date.now() - dbStarted} ms`;
  } catch (err) {
    ctx.logger?.error("[Commands] Storage ping failed", err);
    dbIcon = "🔴";
    dbLatency = "Error / Disconnected";
  }

  return [
    "🏓 *PONG! - System Diagnostic*",
    "",
    "🖥️ *Server Status:*",
    "• Bot Logic: 🟢 Online",
    `• Database: ${dbIcon} ${dbIcon === "🟢" ? "Connected" : "Disconnected"}`,
    "",
    "⏱️ *Real-time Latency:*",
    `• 🗄️ Database Query: ${dbLatency}`,
    `• ⚙️ Bot Processing: ${Date.now() - started} ms`,
  ].join("\n");
}

async function loadTodo(ctx: CommandContext, now: Date): Promise<AssignmentWithCourse[]> {
  return ctx.storage.listActiveAssignments({ now, excludeCompletedBy: ctx.senderId });
}

export async function handleCommand(command: BotCommand, ctx: CommandContext): Promise<string> {
  const now = ctx.clock();
  ctx.logger?.info(`[Commands] ${command.type}`, { chatId: ctx.chatId, senderId: ctx.senderId });

  try {
    switch (command.type) {
      case "ping":
        return await handlePing(ctx);

      case "list": {
        const assignments = await ctx.storage.listActiveAssignments({ now });
        return formatAssignmentList(assignments, "*[Daftar Tugas Aktif]*", now, false);
      }

      case "todo": {
        const assignments = await loadTodo(ctx, now);
        return formatAssignmentList(assignments, "*[To-Do]*", now, true);
      }

      case "expand": {
        if (ctx.isAcademicChannel) {
          return "⚠️ _Command ini tidak boleh dijalankan di grup akademik._\nKetik command ini di chat pribadi ya.\n\n💡 _Gunakan #todo untuk lihat daftar tugas pribadi kamu._";
        }
        const assignments = await loadTodo(ctx, now);
        const target = assignments[command.index - 1];
        return target ? formatAssignmentDetail(target, command.index, now) : notFound(command.index);
      }

      case "done": {
        const assignments = await loadTodo(ctx, now);
        const target = assignments[command.index - 1];
        if (!target) return notFound(command.index);
        await ctx.storage.markAssignmentDone(target.id, ctx.senderId);
        return `✅ Mantap! Tugas *${sanitizeWhatsAppMarkdown(target.title)}* selesai.\n\n_Salah tandai? Ketik #undo_`;
      }

      case "undo": {
        const reverted = await ctx.storage.undoLastCompletion(ctx.senderId);
        if (!reverted) {
          return "❌ Tidak ada tugas yang baru saja kamu selesaikan.\n\n💡 _#undo hanya bisa membatalkan tugas terakhir yang kamu tandai selesai._";
        }
        return `↩️ Oke! Tugas *${sanitizeWhatsAppMarkdown(reverted.title)}* ditandai belum selesai.\n\n_Ketik #todo untuk lihat daftar terbaru._`;
      }

      case "today": {
        const today = formatCivilDate(now);
        const todo = await loadTodo(ctx, now);
        return formatDeadlineWindow(todo, (deadline) => formatCivilDate(deadline) === today, "*[Tugas Hari Ini]*", now);
      }

      case "week": {
        const weekEnd = addDays(now, 7);
        const todo = await loadTodo(ctx, now);
        return formatDeadlineWindow(todo, (deadline) => deadline.getTime() <= weekEnd.getTime(), "📆 *Tugas Minggu Ini (7 Hari)*", now);
      }

      case "help":
        return HELP_TEXT;

      case "unknown":
        return `❓ Command tidak dikenali: *${sanitizeWhatsAppMarkdown(command.command)}*\n\nKetik *#help* untuk melihat daftar command yang tersedia.`;
    }
  } catch (err) {
    ctx.logger?.error(`[Commands] ${command.type} failed`, err, { error: getErrorMessage(err) });
    return FETCH_FAILED;
  }
}
