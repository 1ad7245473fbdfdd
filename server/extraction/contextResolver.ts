/**
 * Context Resolver
 *
 * Purpose:
 * Lightweight pre-pass before extraction. One small-model call names the
 * courses in the message, the parallel code for each, and what kind of
 * deadline the message gives; deterministic code then turns "next meeting"
 * and "relative" deadlines into concrete civil date-times.
 *
 * Any failure rejects. The pipeline treats that as "no context" and
 * extracts with EMPTY_CONTEXT.
 *
 * Layer: Extraction
 */

import { z } from "zod";
import type { Course, SenderHistoryEntry } from "@shared/schema";
import { CIVIL_TIME, EXTRACTION_LIMITS, LLM_SAMPLING } from "../config/constants";
import type { ModelTierTable } from "../config/models";
import { buildContextResolverPrompt } from "../config/prompts";
import type { LLMClient } from "../llm/client";
import { runModelChain } from "../llm/fallback";
import { parseModelJson } from "../llm/jsonResponse";
import type { ScheduleOracle } from "../schedule/scheduleOracle";
import { canonicalCourseName } from "../services/courseCatalog";
import type { IStorage } from "../storage";
import { addCivilDays, formatCivilDate, makeTimeString, type Clock } from "../utils/civilTime";
import { TierExhaustedError, getErrorMessage } from "../utils/errorHandler";
import type { RequestLogger } from "../utils/logger";
import { isValidParallelCode, normalizeParallelCode } from "../clarification/parallelCode";
import type { CourseHint, DeadlineType, MessageContext } from "./types";

export { EMPTY_CONTEXT } from "./types";

const deadlineTypeSchema = z.enum(["explicit", "next_meeting", "relative", "unknown"]);

const contextHintsSchema = z.object({
  parallel_code: z.string().nullish(),
  parallel_confidence: z.number().catch(0).transform((n) => Math.min(1, Math.max(0, n))),
  parallel_source: z.enum(["explicit", "sender_history", "unknown"]).catch("unknown"),
  deadline_type: deadlineTypeSchema.catch("unknown"),
  course_hints: z
    .array(
      z.object({
        course_name: z.string().min(1),
        parallel_code: z.string().nullish(),
        deadline_type: deadlineTypeSchema.optional().catch(undefined),
      })
    )
    .default([]),
});

export type ContextHintsResponse = z.infer<typeof contextHintsSchema>;

export type ContextResolverDeps = {
  storage: IStorage;
  oracle: ScheduleOracle;
  llm: LLMClient;
  tiers: ModelTierTable;
  clock: Clock;
  logger?: RequestLogger;
};

function cleanParallel(code: string | null | undefined): string | null {
  if (!code) return null;
  const normalized = normalizeParallelCode(code);
  return isValidParallelCode(normalized) ? normalized : null;
}

/**
 * Concrete "YYYY-MM-DD HH:MM" for next-meeting and relative deadlines.
 * A next-meeting lookup needs a specific section; "all" has no single schedule.
 */
export function computeDeadlineHint(
  courseName: string,
  parallelCode: string | null,
  deadlineType: DeadlineType,
  oracle: ScheduleOracle,
  today: string,
): string | null {
  switch (deadlineType) {
    case "next_meeting": {
      if (!parallelCode || parallelCode === "all") return null;
      const meeting = oracle.getNextMeeting(courseName, parallelCode, today);
      return meeting ? `${meeting.date} ${meeting.time}` : null;
    }
    case "relative":
      return `${addCivilDays(today, 1)} ${makeTimeString(CIVIL_TIME.DEFAULT_DEADLINE_HOUR, CIVIL_TIME.DEFAULT_DEADLINE_MINUTE)}`;
    case "explicit":
    case "unknown":
      return null;
  }
}

/**
 * Deterministic half of the resolver: canonical names, clean codes,
 * per-course deadline hints and the global roll-up.
 */
export function buildMessageContext(
  hints: ContextHintsResponse,
  courses: readonly Course[],
  oracle: ScheduleOracle,
  now: Date,
): MessageContext {
  const today = formatCivilDate(now);

  const courseHints: CourseHint[] = hints.course_hints.map((h) => {
    const courseName = canonicalCourseName(h.course_name, courses);
    const parallelCode = cleanParallel(h.parallel_code);
    const deadlineType = h.deadline_type ?? hints.deadline_type;
    return {
      courseName,
      parallelCode,
      deadlineType,
      deadlineHint: computeDeadlineHint(courseName, parallelCode, deadlineType, oracle, today),
    };
  });

  const types = new Set(courseHints.map((h) => h.deadlineType));
  const deadlineType: MessageContext["deadlineType"] =
    types.size > 1 ? "mixed" : courseHints[0]?.deadlineType ?? hints.deadline_type;

  return {
    parallelCode: cleanParallel(hints.parallel_code),
    parallelConfidence: hints.parallel_confidence,
    parallelSource: hints.parallel_source,
    deadlineHint: courseHints.length === 1 ? courseHints[0].deadlineHint : null,
    deadlineType,
    courseHints,
  };
}

async function loadSenderHistory(storage: IStorage, senderId: string, logger?: RequestLogger): Promise<SenderHistoryEntry[]> {
  try {
    return await storage.getSenderHistory(senderId, EXTRACTION_LIMITS.SENDER_HISTORY_LIMIT);
  } catch (err) {
    logger?.warn("[ContextResolver] Sender history unavailable, continuing without it", { error: getErrorMessage(err) });
    return [];
  }
}

export async function resolveMessageContext(
  input: { message: string; senderId: string },
  deps: ContextResolverDeps,
): Promise<MessageContext> {
  const { logger } = deps;
  logger?.startStage("context");

  const history = await loadSenderHistory(deps.storage, input.senderId, logger);
  const courses = await deps.storage.listCourses();
  const prompt = buildContextResolverPrompt(input.message, history, courses);

  const result = await runModelChain(
    { tier: "contextResolver", attempts: deps.tiers.contextResolver, logger },
    async (attempt) => {
      const response = await deps.llm.generateText({
        provider: attempt.provider,
        model: attempt.model,
        prompt,
        temperature: LLM_SAMPLING.CONTEXT_RESOLVER.temperature,
        maxTokens: LLM_SAMPLING.CONTEXT_RESOLVER.maxTokens,
        jsonResponse: true,
      });
      return parseModelJson(response.text, contextHintsSchema);
    }
  );

  if (result.status === "exhausted") {
    logger?.endStage("context");
    throw new TierExhaustedError("context resolver", result.failures);
  }

  const context = buildMessageContext(result.value, courses, deps.oracle, deps.clock());
  const durationMs = logger?.endStage("context");
  logger?.info("[ContextResolver] Resolved", {
    durationMs,
    parallelCode: context.parallelCode,
    deadlineType: context.deadlineType,
    courses: context.courseHints.map((h) => h.courseName).join(", "),
    historyEntries: history.length,
  });
  return context;
}
