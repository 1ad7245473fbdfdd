/**
 * Unit Tests: Message Pipeline
 *
 * End-to-end over MemStorage and a scripted LLM: commands, new
 * assignments, clarification replies and updates.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CLARIFICATION_CANCELLED_MESSAGE, buildParseErrorMessage, buildTemplate } from "../clarification/templates";
import { processIncomingMessage, type IncomingMessage, type PipelineDeps } from "../messaging/pipeline";
import { ScheduleOracle } from "../schedule/scheduleOracle";
import { MemStorage } from "../storage";
import { Whitelist } from "../whatsapp/whitelist";
import { GROUP, SENDER, StubLLM, TEST_TIERS, type StubReply } from "./helpers/factories";

// Monday 2026-01-19 10:00 WIB
const now = new Date("2026-01-19T03:00:00Z");
const clock = () => now;

const oracle = ScheduleOracle.fromTimetable({
  Senin: [{ course: "KOM120H - Struktur Data", parallel: "K2", schedule: "10:00-11:40" }],
  Kamis: [{ course: "KOM120H - Struktur Data", parallel: "K2", schedule: "08:00-09:40" }],
});

const whitelist = new Whitelist([GROUP]);

function info(fields: Record<string, string | null>): string {
  return JSON.stringify({ type: "assignment_info", ...fields });
}

function groupMessage(text: string, extra: Partial<IncomingMessage> = {}): IncomingMessage {
  return { senderId: SENDER, chatId: GROUP, text, messageId: "msg-1", ...extra };
}

function privateMessage(text: string, extra: Partial<IncomingMessage> = {}): IncomingMessage {
  return { senderId: SENDER, chatId: SENDER, text, messageId: "msg-2", ...extra };
}

describe("processIncomingMessage", () => {
  let storage: MemStorage;

  function deps(script: Record<string, StubReply | StubReply[]> = {}): PipelineDeps & { llm: StubLLM } {
    return { storage, oracle, llm: new StubLLM(script), tiers: TEST_TIERS, whitelist, clock };
  }

  beforeEach(() => {
    storage = new MemStorage({ clock });
  });

  describe("routing", () => {
    it("answers commands in any chat without a model call", async () => {
      const d = deps();
      const replies = await processIncomingMessage(privateMessage("#tugas"), d);

      expect(replies).toEqual([{ chatId: SENDER, text: "*[Daftar Tugas Aktif]*\n\n📭 Belum ada tugas." }]);
      expect(d.llm.calls).toHaveLength(0);
    });

    it("ignores ordinary text outside academic chats", async () => {
      const d = deps();
      expect(await processIncomingMessage(privateMessage("besok kumpul tugas strukdat"), d)).toEqual([]);
      expect(d.llm.calls).toHaveLength(0);
    });

    it("stays quiet on unrecognized messages", async () => {
      const d = deps({ "text-a": '{"type":"unrecognized"}' });
      expect(await processIncomingMessage(groupMessage("siapa yang bawa proyektor?"), d)).toEqual([]);
    });

    it("tells an academic chat when every model tier is down", async () => {
      const replies = await processIncomingMessage(groupMessage("LKP 14 strukdat besok"), deps());
      expect(replies).toEqual([
        {
          chatId: GROUP,
          text: "⚠️ Bot lagi kewalahan, semua model AI sedang tidak tersedia.\n_Kirim ulang pesan tugasnya beberapa menit lagi ya._",
        },
      ]);
    });
  });

  describe("new assignments", () => {
    it("stores a complete assignment and acknowledges it in the group", async () => {
      const d = deps({
        "context-a": JSON.stringify({
          parallel_code: "k2",
          parallel_confidence: 0.9,
          parallel_source: "explicit",
          deadline_type: "explicit",
          course_hints: [{ course_name: "Struktur Data", parallel_code: "k2" }],
        }),
        "text-a": info({
          course_name: "Struktur Data",
          title: "LKP 14",
          deadline: "2026-01-20 23:59",
          description: "Implementasi AVL tree dan rotasi",
          parallel_code: "K2",
        }),
      });

      const replies = await processIncomingMessage(groupMessage("LKP 14 strukdat K2 deadline 20 jan 23.59"), d);

      expect(d.llm.modelsCalled()).toEqual(["context-a", "text-a"]);
      expect(replies).toEqual([
        { chatId: GROUP, text: "✅ *Tugas baru tersimpan*\n\n📚 Struktur Data\n📝 LKP 14\n⏰ 2026-01-20 23:59\n🧩 K2" },
      ]);

      const [stored] = await storage.listActiveAssignments({ now });
      expect(stored).toMatchObject({
        courseName: "Struktur Data",
        title: "LKP 14",
        deadline: new Date("2026-01-20T16:59:00Z"),
        parallelCode: "k2",
        senderId: SENDER,
        messageIds: ["msg-1"],
      });
    });

    it("fills deadline and parallel from the resolver's next-meeting hint", async () => {
      const d = deps({
        "context-a": JSON.stringify({
          parallel_code: "k2",
          parallel_confidence: 0.9,
          parallel_source: "explicit",
          deadline_type: "next_meeting",
          course_hints: [{ course_name: "strukdat", parallel_code: "k2" }],
        }),
        "text-a": info({
          course_name: "Struktur Data",
          title: "LKP 15",
          deadline: null,
          description: "Rangkuman materi pertemuan 3",
          parallel_code: null,
        }),
      });

      const replies = await processIncomingMessage(groupMessage("LKP 15 strukdat k2 kumpul sebelum pertemuan berikutnya"), d);

      expect(replies).toEqual([
        { chatId: GROUP, text: "✅ *Tugas baru tersimpan*\n\n📚 Struktur Data\n📝 LKP 15\n⏰ 2026-01-22 08:00\n🧩 K2" },
      ]);
    });

    it("does not lend one course's deadline hint to another course", async () => {
      const d = deps({
        "context-a": JSON.stringify({
          parallel_code: "k2",
          parallel_confidence: 0.9,
          parallel_source: "explicit",
          deadline_type: "next_meeting",
          course_hints: [{ course_name: "strukdat", parallel_code: "k2" }],
        }),
        "text-a": info({
          course_name: "Pemrograman",
          title: "LKP 15",
          deadline: null,
          description: "Rangkuman materi pertemuan 3",
          parallel_code: null,
        }),
      });

      const replies = await processIncomingMessage(groupMessage("LKP 15 pemrog kumpul sebelum pertemuan berikutnya"), d);

      expect(replies[0]).toEqual({
        chatId: GROUP,
        text: "✅ *Tugas baru tersimpan*\n\n📚 Pemrograman\n📝 LKP 15\n⏰ Belum ada deadline\n\n_Ada info yang kurang, cek chat pribadi dari bot ya._",
      });
      const [created] = await storage.listActiveAssignments({ now });
      expect(created).toMatchObject({ courseName: "Pemrograman", deadline: null, parallelCode: null });
    });

    it("asks the sender privately for missing fields", async () => {
      const d = deps({
        "text-a": info({ course_name: "Struktur Data", title: "Tugas", deadline: null, description: "", parallel_code: null }),
      });

      const replies = await processIncomingMessage(groupMessage("ada tugas strukdat"), d);
      const [created] = await storage.listActiveAssignments({ now });

      expect(d.llm.modelsCalled()).toEqual(["context-a", "text-a"]);
      expect(replies).toHaveLength(3);
      expect(replies[0]).toEqual({
        chatId: GROUP,
        text: "✅ *Tugas baru tersimpan*\n\n📚 Struktur Data\n📝 Tugas\n⏰ Belum ada deadline\n\n_Ada info yang kurang, cek chat pribadi dari bot ya._",
      });
      expect(replies[1].chatId).toBe(SENDER);
      expect(replies[1].text.startsWith("⚠️ *PERLU KLARIFIKASI*")).toBe(true);
      expect(replies[2]).toEqual({
        chatId: SENDER,
        text: buildTemplate(created.id, ["title", "deadline", "parallel_code", "description"]),
      });
    });
  });

  describe("clarification replies", () => {
    async function seedIncomplete() {
      const sd = (await storage.listCourses()).find((c) => c.name === "Struktur Data");
      return storage.createAssignment({ title: "Tugas", courseId: sd?.id, senderId: SENDER, messageIds: ["msg-1"] });
    }

    it("completes the assignment from a filled template", async () => {
      const created = await seedIncomplete();
      const reply = [
        `🆔 ID: \`${created.id}\``,
        "Judul: LKP 14",
        "Deadline: 20 Jan 23:59",
        "Paralel: K2",
        "Deskripsi: Implementasi AVL tree dan rotasi",
      ].join("\n");

      const d = deps();
      const replies = await processIncomingMessage(privateMessage(reply), d);

      expect(d.llm.calls).toHaveLength(0);
      expect(replies).toEqual([
        {
          chatId: SENDER,
          text: "✅ *Data tugas sudah lengkap!*\n\n📚 Struktur Data\n📝 LKP 14\n⏰ 2026-01-20 23:59\n🧩 k2\n📄 Implementasi AVL tree dan rotasi",
        },
      ]);
      expect(await storage.getAssignment(created.id)).toMatchObject({
        title: "LKP 14",
        parallelCode: "k2",
        messageIds: ["msg-1", "msg-2"],
      });
    });

    it("re-prompts for what is still missing", async () => {
      const created = await seedIncomplete();
      const replies = await processIncomingMessage(privateMessage(`ID: ${created.id}\nJudul: LKP 14`), deps());

      expect(replies).toHaveLength(2);
      expect(replies[0].text.startsWith("⚠️ *PERLU KLARIFIKASI*")).toBe(true);
      expect(replies[1].text).toBe(buildTemplate(created.id, ["deadline", "parallel_code", "description"]));
    });

    it("finds the id in the quoted template", async () => {
      const created = await seedIncomplete();
      const quotedText = buildTemplate(created.id, ["deadline"]);

      await processIncomingMessage(privateMessage("Deadline: 20 Jan", { quotedText }), deps());

      expect((await storage.getAssignment(created.id))?.deadline).toEqual(new Date("2026-01-20T16:59:00Z"));
    });

    it("cancels without changing anything", async () => {
      const created = await seedIncomplete();
      const replies = await processIncomingMessage(
        privateMessage("batal", { quotedText: buildTemplate(created.id, ["title"]) }),
        deps(),
      );

      expect(replies).toEqual([{ chatId: SENDER, text: CLARIFICATION_CANCELLED_MESSAGE }]);
      expect((await storage.getAssignment(created.id))?.title).toBe("Tugas");
    });

    it("re-sends the template when the reply cannot be read", async () => {
      const created = await seedIncomplete();
      const replies = await processIncomingMessage(
        privateMessage("ok", { quotedText: buildTemplate(created.id, ["title"]) }),
        deps(),
      );

      expect(replies).toEqual([
        {
          chatId: SENDER,
          text: buildParseErrorMessage("no_data", created.id, ["title", "deadline", "parallel_code", "description"]),
        },
      ]);
    });

    it("explains values that could not be stored", async () => {
      const created = await seedIncomplete();
      const replies = await processIncomingMessage(
        privateMessage("Matkul: Kimia Dasar", { quotedText: buildTemplate(created.id, ["course_name"]) }),
        deps(),
      );

      expect(replies).toEqual([
        {
          chatId: SENDER,
          text: [
            '⚠️ Tidak disimpan:\n• 📚 Nama Mata Kuliah: "Kimia Dasar" (mata kuliah tidak terdaftar)',
            buildParseErrorMessage("no_data", created.id, ["title", "deadline", "parallel_code", "description"]),
          ].join("\n\n"),
        },
      ]);
    });
  });

  describe("updates", () => {
    const UPDATE = JSON.stringify({
      type: "assignment_update",
      reference_keywords: ["strukdat", "lkp 14"],
      changes: "deadline diundur ke 22 jan",
      new_deadline: "2026-01-22",
    });

    async function seedComplete() {
      const sd = (await storage.listCourses()).find((c) => c.name === "Struktur Data");
      return storage.createAssignment({
        title: "LKP 14",
        courseId: sd?.id,
        deadline: new Date("2026-01-20T16:59:00Z"),
        parallelCode: "k2",
        description: "Implementasi AVL tree dan rotasi",
        senderId: SENDER,
      });
    }

    it("applies a matched update", async () => {
      const existing = await seedComplete();
      const d = deps({
        "text-a": UPDATE,
        "match-a": JSON.stringify({ assignment_id: existing.id, confidence: "high", reason: "LKP 14 strukdat" }),
      });

      const replies = await processIncomingMessage(groupMessage("deadline LKP 14 strukdat diundur ke 22 jan"), d);

      expect(d.llm.modelsCalled()).toEqual(["context-a", "text-a", "match-a"]);
      expect(replies).toEqual([
        { chatId: GROUP, text: "🔄 *Tugas diperbarui*\n\n📚 Struktur Data\n📝 LKP 14\n\n⏰ Deadline: 2026-01-22 23:59" },
      ]);
      expect(await storage.getAssignment(existing.id)).toMatchObject({
        deadline: new Date("2026-01-22T16:59:00Z"),
        messageIds: ["msg-1"],
      });
    });

    it("does not guess when the match is uncertain", async () => {
      const existing = await seedComplete();
      const d = deps({
        "text-a": UPDATE,
        "match-a": '{"assignment_id": null, "confidence": "low", "reason": "two candidates"}',
      });

      const replies = await processIncomingMessage(groupMessage("deadline diundur ke 22 jan"), d);

      expect(replies).toEqual([
        {
          chatId: GROUP,
          text: "⚠️ *Update terdeteksi tapi tidak diterapkan otomatis*\n\n✏️ deadline diundur ke 22 jan\n\n_Tugas yang dimaksud belum bisa dipastikan. Sebutkan matkul dan judul tugasnya ya._",
        },
      ]);
      expect((await storage.getAssignment(existing.id))?.deadline).toEqual(new Date("2026-01-20T16:59:00Z"));
    });
  });
});
