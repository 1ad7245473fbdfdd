/**
 * Course name resolution against the course table.
 *
 * Model output and user replies name courses loosely ("pemrog", "SD",
 * "struktur data k2"); this maps them to a stored course row.
 */

import type { Course } from "@shared/schema";

const MIN_FUZZY_LENGTH = 3;

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

function containsWord(haystack: string, word: string): boolean {
  const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?:^|[^\\p{L}\\p{N}])${escaped}(?:$|[^\\p{L}\\p{N}])`, "u").test(haystack);
}

/**
 * Exact name, then exact alias, then substring on names, then an alias
 * appearing as a whole word. Returns null when nothing matches.
 */
export function findCourse(name: string, courses: readonly Course[]): Course | null {
  const query = normalize(name);
  if (!query) return null;

  const byName = courses.find((c) => normalize(c.name) === query);
  if (byName) return byName;

  const byAlias = courses.find((c) => c.aliases.some((a) => normalize(a) === query));
  if (byAlias) return byAlias;

  if (query.length >= MIN_FUZZY_LENGTH) {
    const partial = courses.find((c) => {
      const courseName = normalize(c.name);
      return courseName.includes(query) || query.includes(courseName);
    });
    if (partial) return partial;
  }

  return courses.find((c) => c.aliases.some((a) => containsWord(query, normalize(a)))) ?? null;
}

export function canonicalCourseName(name: string, courses: readonly Course[]): string {
  return findCourse(name, courses)?.name ?? name.trim();
}

/**
 * "Name (aliases: a, b)" per line, for prompts.
 */
export function formatCourseList(courses: readonly Course[]): string {
  if (courses.length === 0) return "No courses registered.";
  return courses
    .map((c) => (c.aliases.length > 0 ? `- ${c.name} (aliases: ${c.aliases.join(", ")})` : `- ${c.name}`))
    .join("\n");
}
