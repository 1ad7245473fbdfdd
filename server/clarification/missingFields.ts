import type { AssignmentWithCourse } from "@shared/schema";
import { CLARIFICATION_CONSTANTS } from "../config/constants";
import type { ClarificationField } from "./fields";

const GENERIC_TITLES = new Set<string>(CLARIFICATION_CONSTANTS.GENERIC_TITLES);
const GENERIC_DESCRIPTIONS = new Set<string>(CLARIFICATION_CONSTANTS.GENERIC_DESCRIPTIONS);
const ECHO_DESCRIPTIONS = new Set<string>(CLARIFICATION_CONSTANTS.ECHO_DESCRIPTIONS);

export type ClarificationState = "complete" | "awaiting_clarification";

export function isMissingCourse(courseName: string | null | undefined): boolean {
  const name = courseName?.trim() ?? "";
  return name.length === 0 || name.toLowerCase() === CLARIFICATION_CONSTANTS.UNKNOWN_COURSE.toLowerCase();
}

export function isGenericTitle(title: string | null | undefined): boolean {
  const normalized = title?.trim().toLowerCase() ?? "";
  if (normalized.length < CLARIFICATION_CONSTANTS.MIN_TITLE_LENGTH) return true;
  if (GENERIC_TITLES.has(normalized)) return true;
  return CLARIFICATION_CONSTANTS.GENERIC_TITLE_FRAGMENTS.some((fragment) => normalized.includes(fragment));
}

export function isWeakDescription(description: string | null | undefined): boolean {
  const normalized = description?.trim().toLowerCase() ?? "";
  if (normalized.length < CLARIFICATION_CONSTANTS.MIN_DESCRIPTION_LENGTH) return true;
  return GENERIC_DESCRIPTIONS.has(normalized) || ECHO_DESCRIPTIONS.has(normalized);
}

/**
 * Ordered list of fields that are absent or too vague to be useful.
 */
export function identifyMissingFields(assignment: AssignmentWithCourse): ClarificationField[] {
  const missing: ClarificationField[] = [];

  if (isMissingCourse(assignment.courseName)) missing.push("course_name");
  if (isGenericTitle(assignment.title)) missing.push("title");
  if (!assignment.deadline) missing.push("deadline");
  if (!assignment.parallelCode) missing.push("parallel_code");
  if (isWeakDescription(assignment.description)) missing.push("description");

  return missing;
}

export function clarificationState(missing: readonly ClarificationField[]): ClarificationState {
  return missing.length === 0 ? "complete" : "awaiting_clarification";
}
