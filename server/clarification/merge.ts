import type { AssignmentPatch, Course } from "@shared/schema";
import { civilToUtc } from "../utils/civilTime";
import { findCourse } from "../services/courseCatalog";
import type { ClarificationField, ClarificationUpdates } from "./fields";
import { isValidParallelCode, normalizeParallelCode } from "./parallelCode";

export type DroppedUpdate = {
  field: ClarificationField;
  value: string;
  reason: string;
};

export type MergeResult = {
  patch: AssignmentPatch;
  dropped: DroppedUpdate[];
};

/**
 * Turns parsed clarification values into a storage patch. Civil deadlines
 * become UTC instants; course names become course ids; values that cannot
 * be stored are reported instead of written.
 */
export function mergeClarificationUpdates(updates: ClarificationUpdates, courses: readonly Course[]): MergeResult {
  const patch: AssignmentPatch = {};
  const dropped: DroppedUpdate[] = [];

  if (updates.course_name !== undefined) {
    const course = findCourse(updates.course_name, courses);
    if (course) {
      patch.courseId = course.id;
    } else {
      dropped.push({ field: "course_name", value: updates.course_name, reason: "mata kuliah tidak terdaftar" });
    }
  }

  if (updates.title !== undefined) {
    patch.title = updates.title.trim();
  }

  if (updates.description !== undefined) {
    patch.description = updates.description.trim();
  }

  if (updates.deadline !== undefined) {
    const deadline = civilToUtc(updates.deadline);
    if (deadline) {
      patch.deadline = deadline;
    } else {
      dropped.push({ field: "deadline", value: updates.deadline, reason: "format tanggal tidak valid" });
    }
  }

  if (updates.parallel_code !== undefined) {
    const code = normalizeParallelCode(updates.parallel_code);
    if (isValidParallelCode(code)) {
      patch.parallelCode = code;
    } else {
      dropped.push({ field: "parallel_code", value: updates.parallel_code, reason: "kode paralel tidak valid" });
    }
  }

  return { patch, dropped };
}
