/**
 * Extraction Types
 *
 * Shapes shared by the context resolver, the extraction orchestrator, the
 * update matcher and the prompt builders.
 */

export type DeadlineType = "explicit" | "next_meeting" | "relative" | "unknown";

export type ParallelSource = "explicit" | "sender_history" | "unknown";

export type CourseHint = {
  courseName: string;
  parallelCode: string | null;
  deadlineType: DeadlineType;
  /** "YYYY-MM-DD HH:MM" in GMT+7, only for next_meeting and relative. */
  deadlineHint: string | null;
};

/**
 * Per-message hints computed before the extraction prompt is built.
 * Never stored.
 */
export type MessageContext = {
  parallelCode: string | null;
  parallelConfidence: number;
  parallelSource: ParallelSource;
  /** Set only when exactly one course is implicated. */
  deadlineHint: string | null;
  deadlineType: DeadlineType | "mixed";
  courseHints: CourseHint[];
};

export const EMPTY_CONTEXT: MessageContext = {
  parallelCode: null,
  parallelConfidence: 0,
  parallelSource: "unknown",
  deadlineHint: null,
  deadlineType: "unknown",
  courseHints: [],
};

export type AssignmentInfo = {
  type: "assignment_info";
  courseName: string;
  title: string;
  /** Civil "YYYY-MM-DD" or "YYYY-MM-DD HH:MM" as the model wrote it. */
  deadline: string | null;
  description: string;
  parallelCode: string | null;
};

export type AssignmentUpdate = {
  type: "assignment_update";
  referenceKeywords: string[];
  changes: string;
  newDeadline: string | null;
  newTitle: string | null;
  newDescription: string | null;
  parallelCode: string | null;
};

export type Unrecognized = { type: "unrecognized" };

export type Classification = AssignmentInfo | AssignmentUpdate | Unrecognized;
