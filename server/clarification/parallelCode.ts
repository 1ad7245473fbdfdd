/**
 * Parallel (class section) codes: k1..k4, p1..p4, r1..r4 or "all".
 */

const ALL_SYNONYMS = new Set(["all", "semua", "semua parallel", "semua paralel", "semua kelas"]);

const VALID_CODE = /^(?:all|[kpr][1-4])$/i;
const CODE_TOKEN = /^[kpr][1-4]$/i;
const CLASS_PHRASE = /\b(?:kelas|parallel|paralel)\s*([1-4])\b/i;
const ALL_PHRASE = /\b(?:semua(?:\s+(?:parallel|paralel|kelas))?|untuk\s+semua|all)\b/i;

/**
 * Trims and lower-cases; the "all" family collapses to "all". Anything else
 * passes through without validation.
 */
export function normalizeParallelCode(code: string): string {
  const normalized = code.trim().toLowerCase().replace(/\s+/g, " ");
  if (ALL_SYNONYMS.has(normalized)) return "all";
  return normalized;
}

export function isValidParallelCode(code: string | null | undefined): code is string {
  return typeof code === "string" && VALID_CODE.test(code.trim());
}

/**
 * Finds a parallel code mentioned anywhere in free text.
 */
export function detectParallelCode(text: string): string | null {
  if (ALL_PHRASE.test(text)) return "all";

  for (const token of text.split(/[^\p{L}\p{N}]+/u)) {
    if (CODE_TOKEN.test(token)) return token.toLowerCase();
  }

  const phrase = CLASS_PHRASE.exec(text);
  if (phrase) return `k${phrase[1]}`;

  return null;
}
