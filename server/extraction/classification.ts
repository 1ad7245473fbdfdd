/**
 * Classification response parsing.
 *
 * The model writes snake_case JSON; the rest of the engine works with the
 * camelCase Classification union from ./types.
 */

import { z } from "zod";
import { parseModelJson } from "../llm/jsonResponse";
import { ResponseFormatError } from "../utils/errorHandler";
import type { Classification } from "./types";

const optionalText = z.string().nullish().transform((v) => {
  const trimmed = v?.trim();
  return trimmed ? trimmed : null;
});

const rawClassificationSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("assignment_info"),
    course_name: z.string(),
    title: z.string(),
    deadline: optionalText,
    description: z.string().nullish().transform((v) => v?.trim() ?? ""),
    parallel_code: optionalText,
  }),
  z.object({
    type: z.literal("assignment_update"),
    reference_keywords: z.array(z.string()).default([]),
    changes: z.string().nullish().transform((v) => v?.trim() ?? ""),
    new_deadline: optionalText,
    new_title: optionalText,
    new_description: optionalText,
    parallel_code: optionalText,
  }),
  z.object({
    type: z.literal("unrecognized"),
  }),
]);

/**
 * Fence strip → brace check → JSON → schema. Throws ResponseFormatError on
 * any failure, including an "unrecognized" verdict whose raw body never
 * spells the word out.
 */
export function parseClassificationText(raw: string): Classification {
  const parsed = parseModelJson(raw, rawClassificationSchema);

  switch (parsed.type) {
    case "assignment_info":
      return {
        type: "assignment_info",
        courseName: parsed.course_name.trim(),
        title: parsed.title.trim(),
        deadline: parsed.deadline,
        description: parsed.description,
        parallelCode: parsed.parallel_code,
      };
    case "assignment_update":
      return {
        type: "assignment_update",
        referenceKeywords: parsed.reference_keywords,
        changes: parsed.changes,
        newDeadline: parsed.new_deadline,
        newTitle: parsed.new_title,
        newDescription: parsed.new_description,
        parallelCode: parsed.parallel_code,
      };
    case "unrecognized":
      if (!/unrecognized/i.test(raw)) {
        throw new ResponseFormatError("suspicious unrecognized verdict", raw);
      }
      return { type: "unrecognized" };
  }
}

export function describeClassification(c: Classification): string {
  switch (c.type) {
    case "assignment_info":
      return `new assignment "${c.title}" (${c.courseName})`;
    case "assignment_update":
      return `update [${c.referenceKeywords.join(", ")}]: ${c.changes}`;
    case "unrecognized":
      return "unrecognized";
  }
}
