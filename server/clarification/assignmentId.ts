import { validate as isUuid } from "uuid";

function cleanToken(token: string): string {
  return token.replace(/[`'"*_()[\]<>.,;]/g, "").trim();
}

/**
 * Recovers the assignment id embedded in a clarification template.
 *
 * Lines labelled "id:" are checked first (the token after the first colon);
 * otherwise any whitespace-separated token that is a valid uuid is taken.
 */
export function extractAssignmentId(text: string): string | null {
  for (const line of text.split(/\r?\n/)) {
    const lower = line.toLowerCase();
    const labelAt = lower.indexOf("id:");
    if (labelAt === -1) continue;

    const afterColon = line.slice(labelAt + 3).trim();
    const candidate = cleanToken(afterColon.split(/\s+/)[0] ?? "");
    if (isUuid(candidate)) return candidate.toLowerCase();
  }

  for (const token of text.split(/\s+/)) {
    const candidate = cleanToken(token);
    if (candidate && isUuid(candidate)) return candidate.toLowerCase();
  }

  return null;
}
