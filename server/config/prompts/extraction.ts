/**
 * Extraction Prompts
 *
 * The main classification prompt: turns one chat message plus the current
 * course list and active assignments into a single JSON classification
 * (new assignment, update, or unrecognized).
 */

import type { AssignmentWithCourse, Course } from "@shared/schema";
import { CIVIL_TIME, CLARIFICATION_CONSTANTS, EXTRACTION_LIMITS } from "../constants";
import { addCivilDays, formatCivilDate, formatCivilDateTime } from "../../utils/civilTime";
import { formatCourseList } from "../../services/courseCatalog";
import { truncateForLog } from "../../llm/jsonResponse";
import type { MessageContext } from "../../extraction/types";

const RULE = "═══════════════════════════════════════════════════════════════════";

export type ExtractionPromptInput = {
  message: string;
  courses: readonly Course[];
  activeAssignments: readonly AssignmentWithCourse[];
  context: MessageContext;
  now: Date;
};

/**
 * One line per active assignment in storage order (earliest deadline first), capped for prompt size.
 */
export function buildActiveAssignmentsList(assignments: readonly AssignmentWithCourse[]): string {
  if (assignments.length === 0) {
    return "No active assignments in database.";
  }

  const shown = assignments.slice(0, EXTRACTION_LIMITS.MAX_ACTIVE_ASSIGNMENTS);
  const list = shown
    .map((a) => {
      const deadline = a.deadline ? formatCivilDate(a.deadline) : "No deadline";
      const course = a.courseName ?? CLARIFICATION_CONSTANTS.UNKNOWN_COURSE;
      const desc = truncateForLog(a.description, EXTRACTION_LIMITS.DESCRIPTION_PREVIEW_CHARS);
      return `- Course: ${course}, Title: "${a.title}", Deadline: ${deadline}, Parallel: ${a.parallelCode ?? "N/A"}, Desc: "${desc}"`;
    })
    .join("\n");

  if (assignments.length > shown.length) {
    return `${list}\n(Showing ${shown.length} most recent out of ${assignments.length} total active assignments)`;
  }
  return list;
}

/**
 * Renders resolver output for the extractor. Hints are advisory: the
 * message text always wins.
 */
export function buildContextHintsBlock(context: MessageContext): string {
  if (context.courseHints.length === 0 && context.parallelCode === null && context.deadlineType === "unknown") {
    return "No pre-analysis available.";
  }

  const lines: string[] = [];
  if (context.parallelCode) {
    lines.push(
      `• Parallel: ${context.parallelCode} (confidence ${context.parallelConfidence.toFixed(2)}, source: ${context.parallelSource})`
    );
  } else {
    lines.push("• Parallel: unknown (leave parallel_code null unless the message states it)");
  }
  lines.push(`• Deadline type: ${context.deadlineType}`);
  if (context.deadlineHint) {
    lines.push(`• Deadline hint: ${context.deadlineHint} (use this when the message says "before next class" or similar)`);
  }

  if (context.courseHints.length > 0) {
    lines.push("• Courses mentioned:");
    for (const hint of context.courseHints) {
      const parts = [hint.courseName, `parallel ${hint.parallelCode ?? "unknown"}`];
      if (hint.deadlineHint) parts.push(`deadline hint ${hint.deadlineHint}`);
      lines.push(`  - ${parts.join(" | ")}`);
    }
  }
  return lines.join("\n");
}

export function buildExtractionPrompt(input: ExtractionPromptInput): string {
  const today = formatCivilDate(input.now);
  const tomorrow = addCivilDays(today, 1);
  const dayAfterTomorrow = addCivilDays(today, 2);
  const nextWeek = addCivilDays(today, 7);

  return `You are a bilingual (Indonesian/English) academic assistant that extracts structured assignment information from WhatsApp messages.

CONTEXT
${RULE}
Current time (${CIVIL_TIME.LABEL}): ${formatCivilDateTime(input.now, true)}
Today's date: ${today}

REFERENCE DATES (USE THESE EXACT DATES):
• Besok / Tomorrow : ${tomorrow}
• Lusa / Day after tomorrow : ${dayAfterTomorrow}
• Minggu depan / Next week : ${nextWeek}

Message: "${input.message}"

Available courses:
${formatCourseList(input.courses)}

Active assignments (recent):
${buildActiveAssignmentsList(input.activeAssignments)}

Pre-analysis hints:
${buildContextHintsBlock(input.context)}

TASK
${RULE}
Classify this message as exactly one of:
1. **NEW_ASSIGNMENT** - Announcing a new task
2. **UPDATE_ASSIGNMENT** - Modifying or clarifying an existing assignment
3. **UNRECOGNIZED** - Not about assignments

If the message lists several assignments, extract only the first one.

NEW_ASSIGNMENT signals:
• "ada tugas baru", "new assignment", clear announcement
• Contains course + deadline + description
• Sequential numbering not in the list above (LKP 15 when only LKP 14 exists)

UPDATE_ASSIGNMENT signals:
• Direct: "LKP 13 deadline berubah"
• Descriptive: "Tugas Pemrog yang [description]" referring to existing work
• Clarification: "jadinya", "ternyata", "sebenarnya"
• Changes: "ganti", "diundur", "dimajuin", "revisi"

Match updates semantically, not by exact strings:
• "coding pake kertas" can refer to "Coding on Paper Assignment"
• Match by course + identifying keywords (topic, number)
• Only classify as UPDATE when a reasonable match exists in the list above

UNRECOGNIZED:
• No course mentioned, social chat, vague references without context

PARALLEL CODES
${RULE}
Valid codes (lowercase): k1, k2, k3, p1, p2, p3, r1, r2, r3, all, null
Different codes are different assignments (k1 ≠ k2)

DATE PARSING (USE "REFERENCE DATES" ABOVE)
${RULE}
• "hari ini"/"today" → Today's date
• "besok"/"tomorrow" → Besok date
• "lusa" → Lusa date
• "minggu depan" → Minggu depan date
• Day names (e.g. "Senin") → next occurrence on the calendar
• "sebelum pertemuan berikutnya"/"before next class" → the deadline hint, if one is given
• Add " HH:MM" only when the message states a time

Do NOT calculate dates yourself when a reference is provided. Copy the exact YYYY-MM-DD string.

DESCRIPTION IS MANDATORY
${RULE}
Never leave description empty or null. If the message gives little detail, use "[Course] [assignment type] [identifier]".

OUTPUT FORMATS
${RULE}

NEW_ASSIGNMENT:
{"type":"assignment_info","course_name":"Pemrograman","title":"LKP 14","deadline":"2026-01-15","description":"Programming lab assignment 14","parallel_code":"k1"}

UPDATE_ASSIGNMENT:
{"type":"assignment_update","reference_keywords":["CourseName","identifier"],"changes":"what changed","new_deadline":"2026-01-14","new_title":null,"new_description":null,"parallel_code":"all"}

UNRECOGNIZED:
{"type":"unrecognized"}

PRINCIPLES
${RULE}
1. Semantic over literal: understand intent, not just keywords
2. Use the assignment list to inform decisions
3. Always write a description
4. High confidence → classify; low confidence → UNRECOGNIZED
5. Never match an update to an assignment from a different course
6. When uncertain: NEW > UPDATE (avoid bad matches)

Return ONLY valid JSON. No markdown, no explanations.`;
}
