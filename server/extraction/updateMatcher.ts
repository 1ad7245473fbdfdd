/**
 * Update Matcher
 *
 * Purpose:
 * Resolves which active assignment an "update" message refers to, then
 * turns the update's field deltas into a storage patch.
 *
 * The match itself is a single model call on the matching tier. Only a
 * "high" confidence answer naming one of the offered candidates counts;
 * everything else (low confidence, null, unparseable body) means the
 * update is not applied automatically.
 *
 * Layer: Extraction
 */

import { z } from "zod";
import type { AssignmentPatch, AssignmentWithCourse } from "@shared/schema";
import { LLM_SAMPLING } from "../config/constants";
import type { ModelTierTable } from "../config/models";
import { buildMatchingPrompt } from "../config/prompts";
import type { LLMClient } from "../llm/client";
import { runModelChain } from "../llm/fallback";
import { parseModelJson, truncateForLog } from "../llm/jsonResponse";
import { civilToUtc, formatCivilDateTime, type Clock } from "../utils/civilTime";
import { ResponseFormatError, TierExhaustedError } from "../utils/errorHandler";
import type { RequestLogger } from "../utils/logger";
import { isValidParallelCode, normalizeParallelCode } from "../clarification/parallelCode";
import type { AssignmentUpdate } from "./types";

const SCOPE_PHRASES = ["scope", "untuk semua", "semua kelas", "semua paralel", "all parallel"];

// "pindah ke k2", "jadi k2", "changed to k2", "ganti ke p1"
const SECTION_REASSIGNMENT = /\b(?:pindah|jadi|jadinya|change|changed|ganti|diganti|moved?)\s+(?:ke\s+|to\s+)?(?:kelas\s+|paralel\s+|parallel\s+)?[kpr][1-4]\b/i;

/**
 * True when the update changes which section(s) the assignment covers,
 * so a parallel mismatch with the candidate is expected.
 */
export function detectScopeChange(text: string): boolean {
  const lower = text.toLowerCase();
  return SCOPE_PHRASES.some((p) => lower.includes(p)) || SECTION_REASSIGNMENT.test(text);
}

const matchResponseSchema = z.object({
  assignment_id: z.string().nullish(),
  confidence: z.string().transform((c) => c.trim().toLowerCase()),
  reason: z.string().nullish(),
});

export type MatchResult = {
  assignmentId: string | null;
  confidence: "high" | "low";
  reason: string;
};

/**
 * Never throws: a body that cannot be read is the same as "no match".
 */
export function parseMatchResult(raw: string, candidateIds: readonly string[]): MatchResult {
  let parsed: z.infer<typeof matchResponseSchema>;
  try {
    parsed = parseModelJson(raw, matchResponseSchema);
  } catch (err) {
    if (err instanceof ResponseFormatError) {
      return { assignmentId: null, confidence: "low", reason: `unparseable match response: ${err.message}` };
    }
    throw err;
  }

  const reason = parsed.reason ?? "";
  const id = parsed.assignment_id?.trim().toLowerCase() ?? null;
  if (parsed.confidence !== "high" || !id) {
    return { assignmentId: null, confidence: "low", reason };
  }

  const known = candidateIds.find((c) => c.toLowerCase() === id);
  if (!known) {
    return { assignmentId: null, confidence: "low", reason: `model picked unknown id ${id}` };
  }
  return { assignmentId: known, confidence: "high", reason };
}

export type UpdateMatcherDeps = {
  llm: LLMClient;
  tiers: ModelTierTable;
  clock: Clock;
  logger?: RequestLogger;
};

export async function matchUpdateToAssignment(
  update: AssignmentUpdate,
  candidates: readonly AssignmentWithCourse[],
  deps: UpdateMatcherDeps,
): Promise<MatchResult> {
  const { logger } = deps;
  if (candidates.length === 0) {
    return { assignmentId: null, confidence: "low", reason: "no active assignments" };
  }

  const scopeChange = detectScopeChange(update.changes);
  const prompt = buildMatchingPrompt(update, candidates, scopeChange, deps.clock());

  // Transport and status failures fall over; the body is judged once, outside the chain.
  const result = await runModelChain({ tier: "matching", attempts: deps.tiers.matching, logger }, async (attempt) => {
    const response = await deps.llm.generateText({
      provider: attempt.provider,
      model: attempt.model,
      prompt,
      temperature: LLM_SAMPLING.MATCHING.temperature,
      maxTokens: LLM_SAMPLING.MATCHING.maxTokens,
      jsonResponse: true,
    });
    return response.text;
  });

  if (result.status === "exhausted") {
    throw new TierExhaustedError("update matching", result.failures);
  }

  const match = parseMatchResult(result.value, candidates.map((c) => c.id));
  logger?.info("[UpdateMatcher] Match result", {
    assignmentId: match.assignmentId,
    confidence: match.confidence,
    scopeChange,
    reason: truncateForLog(match.reason, 120),
  });
  return match;
}

export type UpdateApplication = {
  patch: AssignmentPatch;
  /** Human-readable lines for the chat reply. */
  changes: string[];
  /** Values the update carried that could not be stored. */
  ignored: string[];
};

/**
 * Builds the patch for a matched assignment from the update's deltas.
 * The source message id is appended to the assignment's message trail.
 */
export function applyAssignmentUpdate(
  assignment: AssignmentWithCourse,
  update: AssignmentUpdate,
  messageId?: string,
): UpdateApplication {
  const patch: AssignmentPatch = {};
  const changes: string[] = [];
  const ignored: string[] = [];

  if (update.newDeadline) {
    const deadline = civilToUtc(update.newDeadline);
    if (deadline) {
      patch.deadline = deadline;
      changes.push(`⏰ Deadline: ${formatCivilDateTime(deadline)}`);
    } else {
      ignored.push(`deadline "${update.newDeadline}"`);
    }
  }

  if (update.newTitle && update.newTitle !== assignment.title) {
    patch.title = update.newTitle;
    changes.push(`📝 Judul: ${update.newTitle}`);
  }

  if (update.newDescription) {
    patch.description = update.newDescription;
    changes.push(`📄 Deskripsi: ${truncateForLog(update.newDescription, 80)}`);
  }

  if (update.parallelCode) {
    const code = normalizeParallelCode(update.parallelCode);
    if (!isValidParallelCode(code)) {
      ignored.push(`paralel "${update.parallelCode}"`);
    } else if (code !== assignment.parallelCode) {
      patch.parallelCode = code;
      changes.push(`🧩 Paralel: ${code.toUpperCase()}`);
    }
  }

  if (messageId && !assignment.messageIds.includes(messageId)) {
    patch.messageIds = [...assignment.messageIds, messageId];
  }

  return { patch, changes, ignored };
}
