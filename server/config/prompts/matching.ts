/**
 * Update Matching Prompt
 *
 * Asks the model which active assignment an update message refers to.
 */

import type { AssignmentWithCourse } from "@shared/schema";
import { differenceInDays, differenceInHours, differenceInMinutes } from "date-fns";
import { CIVIL_TIME, CLARIFICATION_CONSTANTS, MATCHING_CONSTANTS } from "../constants";
import { formatCivilDateTime } from "../../utils/civilTime";
import { truncateForLog } from "../../llm/jsonResponse";
import type { AssignmentUpdate } from "../../extraction/types";

export function formatTimeAgo(createdAt: Date, now: Date): string {
  const minutes = differenceInMinutes(now, createdAt);
  if (minutes < 60) return `${minutes} min ago`;
  const hours = differenceInHours(now, createdAt);
  if (hours < 24) return `${hours} hr ago`;
  return `${differenceInDays(now, createdAt)} days ago`;
}

export function formatMatchCandidate(a: AssignmentWithCourse, index: number, now: Date): string {
  const course = a.courseName ?? CLARIFICATION_CONSTANTS.UNKNOWN_COURSE;
  const desc = a.description.trim()
    ? truncateForLog(a.description, MATCHING_CONSTANTS.DESCRIPTION_PREVIEW_CHARS)
    : "(no description)";
  return `#${index + 1}: ${a.id} | ${course} | "${a.title}" | Parallel: ${a.parallelCode ?? "N/A"} | Desc: "${desc}" | ${formatTimeAgo(a.createdAt, now)}`;
}

export function buildMatchingPrompt(
  update: AssignmentUpdate,
  candidates: readonly AssignmentWithCourse[],
  scopeChange: boolean,
  now: Date,
): string {
  const list = candidates.length > 0
    ? candidates.map((a, i) => formatMatchCandidate(a, i, now)).join("\n")
    : "(none)";
  const parallelInfo = update.parallelCode
    ? `Parallel code in update: ${update.parallelCode}`
    : "Parallel code: (not specified)";
  const window = MATCHING_CONSTANTS.RECENT_WINDOW_MINUTES;

  return `Match this update to an existing assignment.

CONTEXT
Time (${CIVIL_TIME.LABEL}): ${formatCivilDateTime(now, true)}
Update: "${update.changes}"
Keywords: ${JSON.stringify(update.referenceKeywords)}
${parallelInfo}
Scope change: ${scopeChange ? "YES (the update changes which parallel the assignment applies to)" : "NO"}

Assignments:
${list}

DECISION PROCEDURE
1. Course filter: keep only assignments whose course matches the FIRST keyword (aliases count: "pemrog" = Pemrograman).
2. Content: rank the rest by meaning against the keywords and update text. Compare with title and description; do not require literal substrings.
3. Parallel:
   - Scope change YES → ignore parallel differences; the parallel is what is being changed.
   - Scope change NO and the update names a parallel → the candidate's parallel must be exactly the same code. "all" matches only a candidate whose parallel is "all".
   - Scope change NO and no parallel named → parallel does not decide.
4. Recency: break ties by the newest assignment. Anything created within the last ${window} minutes is a strong candidate, especially with a generic title; updates often follow right after an announcement.

Answer "high" only when exactly one assignment fits. Otherwise answer "low" or null.

OUTPUT: {"assignment_id":"uuid","confidence":"high","reason":"..."} or {"assignment_id":null,"confidence":"low","reason":"..."}
Return ONLY valid JSON.`;
}
