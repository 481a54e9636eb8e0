import { normaliseField } from "./text-normalizer";

export const JLPT_LEVELS = ["N5", "N4", "N3", "N2", "N1"] as const;
export type JlptLevel = (typeof JLPT_LEVELS)[number];

export const ROW_FIELDS = ["term", "reading", "meaning", "example", "jlpt"] as const;
export type RowField = (typeof ROW_FIELDS)[number];

export interface VocabularyRow {
  term: string;
  reading: string;
  meaning: string;
  example: string;
  jlpt: JlptLevel | "";
}

export interface RowKey {
  term: string;
  reading: string;
}

export type RowInput =
  | ReadonlyArray<string | null | undefined>
  | Partial<Record<RowField, string | null | undefined>>;

const JLPT_SET: ReadonlySet<string> = new Set(JLPT_LEVELS);

function isJlptLevel(value: string): value is JlptLevel {
  return JLPT_SET.has(value);
}

/**
 * Folds the spellings found in the wild ("n2", "JLPT N2", "N-2", "Ｎ２") onto the
 * enumeration; anything else becomes "".
 */
export function normaliseJlpt(value: unknown): JlptLevel | "" {
  const compact = normaliseField(value)
    .normalize("NFKC")
    .toUpperCase()
    .replace(/[\s-]+/g, "")
    .replace(/JLPT/g, "");
  return isJlptLevel(compact) ? compact : "";
}

function isPositional(input: RowInput): input is ReadonlyArray<string | null | undefined> {
  return Array.isArray(input);
}

function fieldsOf(input: RowInput): Array<string | null | undefined> {
  if (isPositional(input)) {
    return ROW_FIELDS.map((_, index) => input[index]);
  }
  return ROW_FIELDS.map((field) => input[field]);
}

export function canonicalizeRow(input: RowInput): VocabularyRow {
  const [term, reading, meaning, example, jlpt] = fieldsOf(input);
  return {
    term: normaliseField(term),
    reading: normaliseField(reading),
    meaning: normaliseField(meaning),
    example: normaliseField(example),
    jlpt: normaliseJlpt(jlpt),
  };
}

export function emptyRow(term: string, reading = ""): VocabularyRow {
  return canonicalizeRow({ term, reading });
}

export function rowKey(row: RowKey): RowKey {
  return { term: normaliseField(row.term), reading: normaliseField(row.reading) };
}

/** Stable string identity of a key, for use in sets and maps. */
export function rowKeyId(key: RowKey): string {
  const { term, reading } = rowKey(key);
  return JSON.stringify([term, reading]);
}

export function rowsEqual(left: VocabularyRow, right: VocabularyRow): boolean {
  return ROW_FIELDS.every((field) => left[field] === right[field]);
}

export function rowToFields(row: VocabularyRow): [string, string, string, string, string] {
  return [row.term, row.reading, row.meaning, row.example, row.jlpt];
}
