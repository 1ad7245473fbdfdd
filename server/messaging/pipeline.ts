/**
 * Message Pipeline
 *
 * Purpose:
 * One inbound chat message in, zero or more replies out:
 *
 *   classify → command?            → command handler
 *            → carries a task id?   → clarification reply
 *            → academic chat?       → context → extraction → create / update
 *
 * The pipeline never sends anything itself; the transport delivers the
 * returned replies.
 *
 * Layer: Application
 */

import type { AssignmentWithCourse, Course } from "@shared/schema";
import type { ModelTierTable } from "../config/models";
import { identifyMissingFields } from "../clarification/missingFields";
import { extractAssignmentId } from "../clarification/assignmentId";
import { mergeClarificationUpdates, type DroppedUpdate } from "../clarification/merge";
import { isValidParallelCode, normalizeParallelCode } from "../clarification/parallelCode";
import { parseClarificationResponse } from "../clarification/responseParser";
import { FIELD_PRESENTATION } from "../clarification/fields";
import {
  CLARIFICATION_CANCELLED_MESSAGE,
  buildClarificationCompleteMessage,
  buildClarificationMessages,
  buildParseErrorMessage,
  buildSkippedFieldsNote,
} from "../clarification/templates";
import { EMPTY_CONTEXT, resolveMessageContext } from "../extraction/contextResolver";
import { extractClassification } from "../extraction/orchestrator";
import type { AssignmentInfo, AssignmentUpdate, CourseHint, MessageContext } from "../extraction/types";
import { applyAssignmentUpdate, matchUpdateToAssignment } from "../extraction/updateMatcher";
import type { LLMClient } from "../llm/client";
import type { ScheduleOracle } from "../schedule/scheduleOracle";
import { findCourse } from "../services/courseCatalog";
import type { IStorage } from "../storage";
import { civilToUtc, formatCivilDateTime, toCivil, type Clock } from "../utils/civilTime";
import { classifyPipelineError, getErrorMessage } from "../utils/errorHandler";
import { RequestLogger } from "../utils/logger";
import type { Whitelist } from "../whatsapp/whitelist";
import { classifyMessage } from "./classifier";
import { handleCommand } from "./commands";
import { sanitizeWhatsAppMarkdown } from "./formatting";

export type IncomingMessage = {
  senderId: string;
  chatId: string;
  text: string;
  imageBase64?: string;
  imageMimeType?: string;
  messageId?: string;
  /** Body of the message this one replies to, if any. */
  quotedText?: string;
};

export type OutgoingReply = {
  chatId: string;
  text: string;
};

export type PipelineDeps = {
  storage: IStorage;
  oracle: ScheduleOracle;
  llm: LLMClient;
  tiers: ModelTierTable;
  whitelist: Whitelist;
  clock: Clock;
};

type RunContext = {
  message: IncomingMessage;
  deps: PipelineDeps;
  logger: RequestLogger;
};

function reply(chatId: string, text: string): OutgoingReply {
  return { chatId, text };
}

function formatDroppedNote(dropped: readonly DroppedUpdate[]): string | null {
  if (dropped.length === 0) return null;
  const items = dropped.map((d) => `• ${FIELD_PRESENTATION[d.field].label}: "${d.value}" (${d.reason})`).join("\n");
  return `⚠️ Tidak disimpan:\n${items}`;
}

// ============================================================================
// Clarification replies
// ============================================================================

async function handleClarificationReply(run: RunContext, assignment: AssignmentWithCourse): Promise<OutgoingReply[]> {
  const { message, deps, logger } = run;
  const now = deps.clock();
  const missingBefore = identifyMissingFields(assignment);

  const parsed = parseClarificationResponse(message.text, {
    existingDeadline: assignment.deadline,
    currentYear: toCivil(now).year,
  });
  logger.info("[Pipeline] Clarification reply", { assignmentId: assignment.id, outcome: parsed.kind });

  if (parsed.kind === "cancelled") {
    return [reply(message.chatId, CLARIFICATION_CANCELLED_MESSAGE)];
  }
  if (parsed.kind === "error") {
    return [reply(message.chatId, buildParseErrorMessage(parsed.error, assignment.id, missingBefore))];
  }

  const courses = await deps.storage.listCourses();
  const { patch, dropped } = mergeClarificationUpdates(parsed.updates, courses);
  const notes = [buildSkippedFieldsNote(parsed.skipped), formatDroppedNote(dropped)].filter(
    (n): n is string => n !== null
  );

  if (Object.keys(patch).length === 0) {
    return [reply(message.chatId, [...notes, buildParseErrorMessage("no_data", assignment.id, missingBefore)].join("\n\n"))];
  }

  if (message.messageId && !assignment.messageIds.includes(message.messageId)) {
    patch.messageIds = [...assignment.messageIds, message.messageId];
  }

  const updated = await deps.storage.updateAssignment(assignment.id, patch);
  if (!updated) {
    return [reply(message.chatId, "❌ Tugas untuk klarifikasi ini sudah tidak ada.")];
  }

  const missing = identifyMissingFields(updated);
  logger.info("[Pipeline] Clarification merged", {
    assignmentId: updated.id,
    fields: Object.keys(patch).join(","),
    stillMissing: missing.join(","),
  });

  if (missing.length === 0) {
    return [reply(message.chatId, [...notes, buildClarificationCompleteMessage(updated)].join("\n\n"))];
  }

  const { summary, template } = buildClarificationMessages(updated, missing);
  return [
    reply(message.chatId, [...notes, summary].join("\n\n")),
    reply(message.chatId, template),
  ];
}

// ============================================================================
// Extraction outcomes
// ============================================================================

// Hints only ever fill in for the course they were computed for
function courseHintFor(courseName: string | null, context: MessageContext): CourseHint | undefined {
  return courseName === null ? undefined : context.courseHints.find((h) => h.courseName === courseName);
}

function pickParallelCode(info: AssignmentInfo, courseName: string | null, context: MessageContext): string | null {
  if (info.parallelCode) {
    const code = normalizeParallelCode(info.parallelCode);
    if (isValidParallelCode(code)) return code;
  }
  return courseHintFor(courseName, context)?.parallelCode ?? null;
}

function pickDeadline(
  info: AssignmentInfo,
  courseName: string | null,
  context: MessageContext,
  logger: RequestLogger,
): Date | null {
  if (info.deadline) {
    const deadline = civilToUtc(info.deadline);
    if (deadline) return deadline;
    logger.warn("[Pipeline] Unreadable deadline from model, leaving it empty", { deadline: info.deadline });
  }
  const hint = courseHintFor(courseName, context)?.deadlineHint;
  return hint ? civilToUtc(hint) : null;
}

async function createFromInfo(
  run: RunContext,
  info: AssignmentInfo,
  courses: readonly Course[],
  context: MessageContext,
): Promise<OutgoingReply[]> {
  const { message, deps, logger } = run;
  const course = findCourse(info.courseName, courses);

  const created = await deps.storage.createAssignment({
    courseId: course?.id ?? null,
    title: info.title,
    description: info.description,
    deadline: pickDeadline(info, course?.name ?? null, context, logger),
    parallelCode: pickParallelCode(info, course?.name ?? null, context),
    senderId: message.senderId,
    messageIds: message.messageId ? [message.messageId] : [],
  });
  const missing = identifyMissingFields(created);
  logger.info("[Pipeline] Assignment created", { assignmentId: created.id, missing: missing.join(",") });

  const ack = [
    "✅ *Tugas baru tersimpan*",
    "",
    `📚 ${sanitizeWhatsAppMarkdown(created.courseName ?? info.courseName)}`,
    `📝 ${sanitizeWhatsAppMarkdown(created.title)}`,
    `⏰ ${created.deadline ? formatCivilDateTime(created.deadline) : "Belum ada deadline"}`,
    ...(created.parallelCode ? [`🧩 ${created.parallelCode.toUpperCase()}`] : []),
  ];
  if (missing.length === 0) {
    return [reply(message.chatId, ack.join("\n"))];
  }

  ack.push("", "_Ada info yang kurang, cek chat pribadi dari bot ya._");
  const { summary, template } = buildClarificationMessages(created, missing);
  return [
    reply(message.chatId, ack.join("\n")),
    reply(message.senderId, summary),
    reply(message.senderId, template),
  ];
}

async function applyUpdate(
  run: RunContext,
  update: AssignmentUpdate,
  active: readonly AssignmentWithCourse[],
): Promise<OutgoingReply[]> {
  const { message, deps, logger } = run;
  const notApplied = [
    "⚠️ *Update terdeteksi tapi tidak diterapkan otomatis*",
    "",
    `✏️ ${sanitizeWhatsAppMarkdown(update.changes)}`,
    "",
    "_Tugas yang dimaksud belum bisa dipastikan. Sebutkan matkul dan judul tugasnya ya._",
  ].join("\n");

  const match = await matchUpdateToAssignment(update, active, {
    llm: deps.llm,
    tiers: deps.tiers,
    clock: deps.clock,
    logger,
  });
  const target = match.assignmentId ? active.find((a) => a.id === match.assignmentId) : undefined;
  if (!target) {
    return [reply(message.chatId, notApplied)];
  }

  const { patch, changes, ignored } = applyAssignmentUpdate(target, update, message.messageId);
  const updated = await deps.storage.updateAssignment(target.id, patch);
  if (!updated) {
    return [reply(message.chatId, notApplied)];
  }
  logger.info("[Pipeline] Assignment updated", { assignmentId: updated.id, changes: changes.length });

  const lines = [
    "🔄 *Tugas diperbarui*",
    "",
    `📚 ${sanitizeWhatsAppMarkdown(updated.courseName ?? "-")}`,
    `📝 ${sanitizeWhatsAppMarkdown(updated.title)}`,
    "",
    ...(changes.length > 0 ? changes : ["_Tidak ada perubahan data._"]),
  ];
  if (ignored.length > 0) {
    lines.push("", `⚠️ Diabaikan: ${ignored.join(", ")}`);
  }
  return [reply(message.chatId, lines.join("\n"))];
}

async function loadContext(run: RunContext): Promise<MessageContext> {
  try {
    return await resolveMessageContext(
      { message: run.message.text, senderId: run.message.senderId },
      { ...run.deps, logger: run.logger }
    );
  } catch (err) {
    run.logger.warn("[Pipeline] Context resolver failed, extracting without hints", { error: getErrorMessage(err) });
    return EMPTY_CONTEXT;
  }
}

async function runExtraction(run: RunContext): Promise<OutgoingReply[]> {
  const { message, deps, logger } = run;

  const context = await loadContext(run);
  const courses = await deps.storage.listCourses();
  const active = await deps.storage.listActiveAssignments({ now: deps.clock() });

  const { classification } = await extractClassification(
    {
      message: message.text,
      imageBase64: message.imageBase64,
      imageMimeType: message.imageMimeType,
      courses,
      activeAssignments: active,
      context,
    },
    { llm: deps.llm, tiers: deps.tiers, clock: deps.clock, logger }
  );

  switch (classification.type) {
    case "assignment_info":
      return createFromInfo(run, classification, courses, context);
    case "assignment_update":
      return applyUpdate(run, classification, active);
    case "unrecognized":
      return [];
  }
}

// ============================================================================
// Entry point
// ============================================================================

export async function processIncomingMessage(message: IncomingMessage, deps: PipelineDeps): Promise<OutgoingReply[]> {
  const logger = new RequestLogger(message.chatId, message.messageId, message.senderId);
  const run: RunContext = { message, deps, logger };
  const isAcademic = deps.whitelist.isAcademicChannel(message.chatId);

  const classified = classifyMessage(message.text);
  if (classified.kind === "command") {
    const text = await handleCommand(classified.command, {
      senderId: message.senderId,
      chatId: message.chatId,
      isAcademicChannel: isAcademic,
      storage: deps.storage,
      clock: deps.clock,
      logger,
    });
    return [reply(message.chatId, text)];
  }

  let repliesOnError = isAcademic;
  try {
    const assignmentId =
      extractAssignmentId(message.text) ?? (message.quotedText ? extractAssignmentId(message.quotedText) : null);
    if (assignmentId) {
      const assignment = await deps.storage.getAssignment(assignmentId);
      if (assignment) {
        repliesOnError = true;
        return await handleClarificationReply(run, assignment);
      }
      logger.info("[Pipeline] Message carries an unknown task id", { assignmentId });
    }

    const decision = deps.whitelist.shouldProcess(message.chatId, false);
    if (!decision.process) {
      logger.debug("[Pipeline] Ignoring message", { reason: decision.reason });
      return [];
    }

    const replies = await runExtraction(run);
    logger.info("[Pipeline] Done", { replies: replies.length, durationMs: logger.getDuration() });
    return replies;
  } catch (err) {
    const classifiedError = classifyPipelineError(err);
    logger.error(`[Pipeline] Failed (${classifiedError.type})`, err, { errorCode: classifiedError.errorCode });
    return repliesOnError ? [reply(message.chatId, classifiedError.userMessage)] : [];
  }
}
