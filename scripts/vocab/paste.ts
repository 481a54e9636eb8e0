import { collapseWhitespace } from "@shared/text-normalizer";
import { canonicalizeRow, type VocabularyRow } from "@shared/vocabulary";

/** Splits on commas outside ASCII parentheses; empty parts are dropped. */
export function splitMeanings(value: string): string[] {
  const parts: string[] = [];
  let current = "";
  let depth = 0;

  for (const ch of value) {
    if (ch === "(") {
      depth += 1;
    } else if (ch === ")" && depth > 0) {
      depth -= 1;
    }
    if (ch === "," && depth === 0) {
      const part = current.trim();
      if (part) parts.push(part);
      current = "";
    } else {
      current += ch;
    }
  }

  const last = current.trim();
  if (last) parts.push(last);
  return parts;
}

const JP_TOKEN = "(?:[^\\s（）()]*[\\u3040-\\u30FF\\u3400-\\u9FFF][^\\s（）()]*)";
const READING = "(?:\\s*[（(]([^）)]+)[）)])?";

const TERM_BLOCK = new RegExp(
  `\\s*(${JP_TOKEN})${READING}\\s+(.+?)(?=\\s+${JP_TOKEN}(?:\\s*[（(][^）)]+[）)])?\\s+|\\s*$)`,
  "gsu",
);

/**
 * Parses pasted study lists such as `経済（けいざい） economy, finance 政治 politics`.
 * Every block starts at a token containing Japanese, takes an optional
 * parenthesised reading, and runs until the next such token.
 */
export function parsePastedBlob(text: string): VocabularyRow[] {
  const compact = collapseWhitespace(text.trim());
  const rows: VocabularyRow[] = [];

  for (const match of compact.matchAll(TERM_BLOCK)) {
    const [, term = "", reading = "", meaning = ""] = match;
    rows.push(
      canonicalizeRow({
        term: term.trim(),
        reading: reading.trim(),
        meaning: splitMeanings(meaning.trim()).join(", "),
      }),
    );
  }

  return rows;
}
