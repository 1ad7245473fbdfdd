/**
 * Application Constants
 *
 * Centralized configuration values used across the bot.
 * Consolidates magic numbers and vocabularies for easier maintenance.
 */

/**
 * Civil time used for every user-facing date (WIB, GMT+7).
 */
export const CIVIL_TIME = {
  OFFSET_MINUTES: 7 * 60,
  LABEL: "GMT+7",
  /** Deadlines given without a time fall at the end of the day. */
  DEFAULT_DEADLINE_HOUR: 23,
  DEFAULT_DEADLINE_MINUTE: 59,
} as const;

/**
 * Limits for the context handed to the extraction prompt.
 */
export const EXTRACTION_LIMITS = {
  MAX_ACTIVE_ASSIGNMENTS: 100,
  DESCRIPTION_PREVIEW_CHARS: 80,
  SENDER_HISTORY_LIMIT: 10,
} as const;

export const MATCHING_CONSTANTS = {
  /** Assignments created this recently get extra weight when breaking ties. */
  RECENT_WINDOW_MINUTES: 30,
  DESCRIPTION_PREVIEW_CHARS: 60,
} as const;

/**
 * Sampling settings per model call site. All calls request a JSON object.
 */
export const LLM_SAMPLING = {
  EXTRACTION: { temperature: 0.2, maxTokens: 4096 },
  CONTEXT_RESOLVER: { temperature: 0.2, maxTokens: 800 },
  MATCHING: { temperature: 0.2, maxTokens: 1024 },
} as const;

export const CLARIFICATION_CONSTANTS = {
  UNKNOWN_COURSE: "Unknown Course",
  MIN_TITLE_LENGTH: 3,
  MIN_DESCRIPTION_LENGTH: 10,

  /**
   * Titles that say nothing about which assignment this is.
   * Compared case-insensitively against the trimmed title.
   */
  GENERIC_TITLES: [
    "tugas",
    "tugas baru",
    "pr",
    "lkp",
    "assignment",
    "new assignment",
    "homework",
    "task",
    "kuis",
    "quiz",
    "lab",
    "praktikum",
    "laporan",
    "report",
    "project",
    "proyek",
    "untitled",
    "no title",
    "tanpa judul",
    "judul",
    "title",
  ],

  /** Any title containing one of these is treated as a placeholder. */
  GENERIC_TITLE_FRAGMENTS: ["tugas baru", "new assignment"],

  GENERIC_DESCRIPTIONS: [
    "no description",
    "brief description",
    "description",
    "deskripsi",
    "keterangan",
    "tidak ada deskripsi",
    "tanpa deskripsi",
    "belum ada deskripsi",
    "tidak ada keterangan",
    "tanpa keterangan",
    "n/a",
    "none",
    "null",
    "-",
  ],

  /** Descriptions that only echo the word for "assignment". */
  ECHO_DESCRIPTIONS: ["assignment", "tugas"],

  CANCEL_KEYWORDS: [
    "cancel",
    "batal",
    "batalkan",
    "tidak",
    "gak jadi",
    "ga jadi",
    "nggak jadi",
    "skip",
    "stop",
  ],
} as const;

export const COMMAND_CONSTANTS = {
  PREFIX: "#",
  TITLE_PREVIEW_CHARS: 25,
  DESCRIPTION_PREVIEW_CHARS: 25,
} as const;

/**
 * Webhook deduplication. WAHA redelivers and echoes messages.
 */
export const DEDUPE_CONSTANTS = {
  TTL_HOURS: 1,
  MAX_MEMORY_SIZE: 500,
  CLEANUP_INTERVAL: 100,
  KEY_BODY_CHARS: 50,
} as const;
