import { toHiragana } from "wanakana";

export function toNfc(value: string): string {
  return value.normalize("NFC");
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ");
}

/** Trimmed NFC text; finite numbers are stringified and anything else becomes "". */
export function normaliseField(value: unknown): string {
  if (typeof value === "string") {
    return toNfc(value.trim());
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return "";
}

const KATAKANA_PATTERN = /[\u30A1-\u30F6]/u;

export function katakanaToHiragana(value: string): string {
  if (!KATAKANA_PATTERN.test(value)) {
    return value;
  }
  return toHiragana(value, { passRomaji: true, convertLongVowelMark: false });
}

const FURIGANA_PATTERN = /[(（][^)）]*[)）]/gu;

export function removeFurigana(value: string): string {
  return value.replace(FURIGANA_PATTERN, "");
}

export const JAPANESE_CHAR_PATTERN = /[\u3040-\u30FF\u3400-\u9FFF]/u;

export function containsJapanese(value: string): boolean {
  return JAPANESE_CHAR_PATTERN.test(value);
}

export function characterLength(value: string): number {
  return Array.from(value).length;
}

export function truncateSnippet(value: string, max = 240): string {
  const trimmed = value.trim();
  if (trimmed.length <= max) {
    return trimmed;
  }
  return `${trimmed.slice(0, max)}…`;
}
