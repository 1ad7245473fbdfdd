/**
 * Clarification field identifiers.
 *
 * Shared by the missing-field detector, the template builder and the reply
 * parser so a field can only ever be named one way.
 */

export const CLARIFICATION_FIELDS = [
  "course_name",
  "title",
  "deadline",
  "parallel_code",
  "description",
] as const;

export type ClarificationField = typeof CLARIFICATION_FIELDS[number];

export type ClarificationUpdates = Partial<Record<ClarificationField, string>>;

type FieldPresentation = {
  label: string;
  templateKey: string;
  formatHint: string;
};

export const FIELD_PRESENTATION: Record<ClarificationField, FieldPresentation> = {
  course_name: {
    label: "📚 Nama Mata Kuliah",
    templateKey: "Matkul",
    formatHint: "nama mata kuliah, contoh: Struktur Data",
  },
  title: {
    label: "📝 Judul Tugas",
    templateKey: "Judul",
    formatHint: "judul spesifik, contoh: LKP 14",
  },
  deadline: {
    label: "⏰ Deadline",
    templateKey: "Deadline",
    formatHint: "tanggal [jam], contoh: 15 Jan 23:59",
  },
  parallel_code: {
    label: "🧩 Kode Paralel (K1/K2/P1/all)",
    templateKey: "Paralel",
    formatHint: "K1/K2/K3/P1/P2/R1/all",
  },
  description: {
    label: "📄 Deskripsi/Keterangan",
    templateKey: "Deskripsi",
    formatHint: "keterangan singkat tugas",
  },
};

/**
 * Reply keys (lowercase) accepted for each field, Indonesian and English.
 */
const FIELD_KEY_SYNONYMS: Record<ClarificationField, readonly string[]> = {
  course_name: ["course", "course name", "mata kuliah", "matkul", "mk", "matakuliah"],
  title: ["title", "judul", "judul tugas", "nama tugas"],
  deadline: ["deadline", "due", "due date", "batas waktu", "tenggat", "dl"],
  parallel_code: ["parallel", "paralel", "pararel", "kode", "code", "kelas", "kode paralel"],
  description: ["description", "deskripsi", "keterangan", "desc", "ket", "detail"],
};

const KEY_LOOKUP = new Map<string, ClarificationField>();
for (const field of CLARIFICATION_FIELDS) {
  for (const key of FIELD_KEY_SYNONYMS[field]) {
    KEY_LOOKUP.set(key, field);
  }
}

/**
 * Maps a reply key to its field. Emoji and decoration around the key are
 * ignored so a line copied from the summary still matches.
 */
export function fieldForKey(rawKey: string): ClarificationField | null {
  const key = rawKey
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
  return KEY_LOOKUP.get(key) ?? null;
}
