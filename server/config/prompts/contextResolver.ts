/**
 * Context Resolver Prompt
 *
 * Cheap pre-pass that names the courses in a message and, per course, the
 * parallel code and what kind of deadline the message gives.
 */

import type { Course, SenderHistoryEntry } from "@shared/schema";
import { formatCourseList } from "../../services/courseCatalog";

export function formatSenderHistory(history: readonly SenderHistoryEntry[]): string {
  if (history.length === 0) return "No history";
  return history.map((h) => `${h.courseName}: ${h.parallelCode} (${h.count}x)`).join(", ");
}

export function buildContextResolverPrompt(
  message: string,
  history: readonly SenderHistoryEntry[],
  courses: readonly Course[],
): string {
  return `Quick analysis of this message.

MESSAGE: "${message}"

SENDER HISTORY: ${formatSenderHistory(history)}

KNOWN COURSES:
${formatCourseList(courses)}

ABSOLUTE RULES:
1. Never assume a parallel applies to several courses unless the message says so
2. Each course gets a parallel only if it is mentioned WITH that course, or the sender history has one for THAT course
3. "PEMROG K2, GKV KUIS" → only Pemrog gets k2, GKV gets null
4. "STRUKDAT K2, ORKOM KUIS" → only Strukdat gets k2, ORKOM gets null
5. Treat each course independently

TASK: Answer in JSON:

1. parallel_code: global parallel (k1/k2/k3/p1/p2/p3/r1/r2/r3/all/null)
   - Set only if EVERY course in the message carries the SAME parallel
   - "PEMROG K2, KALKULUS K2" → "k2"
   - "PEMROG K2, KALKULUS TUGAS" → null

2. parallel_confidence: 0.0-1.0
   - 1.0: every course explicitly mentions the same parallel
   - 0.85-0.9: single course with explicit parallel or strong history
   - 0.0: several courses and not all have an explicit parallel

3. parallel_source: "explicit" | "sender_history" | "unknown"

4. deadline_type: "explicit" | "next_meeting" | "relative" | "unknown"
   - explicit: a specific date ("15 Jan", "2026-01-15", "Senin")
   - next_meeting: "sebelum pertemuan", "before class", "before next meeting"
   - relative: "besok", "lusa", "minggu depan"
   - unknown: no deadline mentioned

5. course_hints: every course in the message, using the canonical names from KNOWN COURSES when one fits
   - { "course_name": "...", "parallel_code": "k2" | null }
   - Add "deadline_type" to a hint only when that course's deadline differs from the global one

Examples:

"STRUKDAT K2 TUGAS, ORKOM KUIS"
→ {"parallel_code":null,"parallel_confidence":0.0,"parallel_source":"explicit","deadline_type":"unknown","course_hints":[{"course_name":"Struktur Data","parallel_code":"k2"},{"course_name":"Organisasi dan Arsitektur Komputer","parallel_code":null}]}

"PEMROG TUGAS kumpul sebelum pertemuan" with history "Pemrograman: k2 (5x)"
→ {"parallel_code":"k2","parallel_confidence":0.85,"parallel_source":"sender_history","deadline_type":"next_meeting","course_hints":[{"course_name":"Pemrograman","parallel_code":"k2"}]}

OUTPUT: JSON only, no markdown.`;
}
