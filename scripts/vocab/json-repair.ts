import { z } from "zod";

import { canonicalizeRow, rowKeyId, type VocabularyRow } from "@shared/vocabulary";

import { ParseError } from "./errors";

export interface ItemsEnvelope {
  items: unknown[];
}

const FENCED_BLOCK = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/;

export function extractFencedBlock(text: string): string | null {
  const match = FENCED_BLOCK.exec(text);
  const body = match?.[1]?.trim();
  return body ? body : null;
}

const CLOSERS: Record<string, string> = { "{": "}", "[": "]" };

/**
 * For each bracket kind, the span from its first opener to its last closer,
 * longest first.
 */
export function bracketSpans(text: string): string[] {
  const spans: string[] = [];
  for (const [opener, closer] of Object.entries(CLOSERS)) {
    const start = text.indexOf(opener);
    const end = text.lastIndexOf(closer);
    if (start !== -1 && end > start) {
      spans.push(text.slice(start, end + 1));
    }
  }
  return spans.sort((a, b) => b.length - a.length);
}

export function extractLargestSpan(text: string): string | null {
  return bracketSpans(text)[0] ?? null;
}

export function normaliseTypography(text: string): string {
  return text
    .replace(/[\u201C\u201D\u201E\u201F\u2033]/g, '"')
    .replace(/[\u2018\u2019\u201A\u201B\u2032]/g, "'")
    .replace(/[\u00A0\u2007\u202F]/g, " ");
}

export function wrapBareArray(text: string): string {
  const trimmed = text.trim();
  return trimmed.startsWith("[") ? `{"items": ${trimmed}}` : text;
}

type Quote = '"' | "'";

function isQuote(ch: string): ch is Quote {
  return ch === '"' || ch === "'";
}

/** Index just past the string literal opening at `start`, or the text length when unterminated. */
function skipString(text: string, start: number): number {
  const quote = text[start];
  let index = start + 1;
  while (index < text.length) {
    const ch = text[index];
    if (ch === "\\") {
      index += 2;
      continue;
    }
    index += 1;
    if (ch === quote) {
      return index;
    }
  }
  return text.length;
}

const BARE_KEY = /\s*([A-Za-z_$][\w$-]*)\s*:/y;

export function quoteBareKeys(text: string): string {
  let out = "";
  let index = 0;
  while (index < text.length) {
    const ch = text[index];
    if (isQuote(ch)) {
      const end = skipString(text, index);
      out += text.slice(index, end);
      index = end;
      continue;
    }
    out += ch;
    index += 1;
    if (ch !== "{" && ch !== ",") continue;

    BARE_KEY.lastIndex = index;
    const match = BARE_KEY.exec(text);
    if (match) {
      out += match[0].replace(match[1], `"${match[1]}"`);
      index = BARE_KEY.lastIndex;
    }
  }
  return out;
}

export function singleToDoubleQuotes(text: string): string {
  let out = "";
  let index = 0;
  while (index < text.length) {
    const ch = text[index];
    if (ch === '"') {
      const end = skipString(text, index);
      out += text.slice(index, end);
      index = end;
      continue;
    }
    if (ch !== "'") {
      out += ch;
      index += 1;
      continue;
    }

    let body = "";
    let cursor = index + 1;
    let closed = false;
    while (cursor < text.length) {
      const inner = text[cursor];
      if (inner === "\\" && cursor + 1 < text.length) {
        const next = text[cursor + 1];
        body += next === "'" ? "'" : `\\${next}`;
        cursor += 2;
        continue;
      }
      cursor += 1;
      if (inner === "'") {
        closed = true;
        break;
      }
      body += inner === '"' ? '\\"' : inner;
    }

    if (!closed) {
      out += text.slice(index);
      break;
    }
    out += `"${body}"`;
    index = cursor;
  }
  return out;
}

export function stripTrailingCommas(text: string): string {
  let out = "";
  let index = 0;
  while (index < text.length) {
    const ch = text[index];
    if (isQuote(ch)) {
      const end = skipString(text, index);
      out += text.slice(index, end);
      index = end;
      continue;
    }
    if (ch === ",") {
      let lookahead = index + 1;
      while (lookahead < text.length && /\s/.test(text[lookahead])) {
        lookahead += 1;
      }
      if (text[lookahead] === "}" || text[lookahead] === "]") {
        index += 1;
        continue;
      }
    }
    out += ch;
    index += 1;
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function toEnvelope(value: unknown): ItemsEnvelope | null {
  if (Array.isArray(value)) {
    return { items: value };
  }
  if (!isRecord(value)) {
    return null;
  }
  if (Array.isArray(value.items)) {
    return { items: value.items };
  }
  if (Array.isArray(value.words)) {
    return { items: value.words };
  }
  if (typeof value.term === "string") {
    return { items: [value] };
  }
  return null;
}

function attempt(text: string): ItemsEnvelope | null {
  try {
    return toEnvelope(JSON.parse(text));
  } catch {
    return null;
  }
}

const REPAIR_STEPS: Array<(text: string) => string> = [
  normaliseTypography,
  wrapBareArray,
  quoteBareKeys,
  singleToDoubleQuotes,
  stripTrailingCommas,
];

function repairAndParse(candidate: string): ItemsEnvelope | null {
  let text = candidate;

  const direct = attempt(text);
  if (direct) {
    return direct;
  }

  for (const repair of REPAIR_STEPS) {
    text = repair(text);
    const repaired = attempt(text);
    if (repaired) {
      return repaired;
    }
  }

  const narrowed = extractLargestSpan(text);
  if (narrowed && narrowed !== text) {
    return attempt(narrowed);
  }
  return null;
}

/**
 * Recovers `{ items: [...] }` from a model reply that drifted from strict JSON.
 * Each repair runs in turn and the first successful parse wins. Without a fenced
 * block, both bracket spans are tried, longest first.
 */
export function parseLenientJson(raw: string): ItemsEnvelope {
  const fenced = extractFencedBlock(raw);
  const spans = fenced ? [fenced] : bracketSpans(raw);
  const candidates = spans.length ? spans : [raw.trim()];

  for (const candidate of candidates) {
    const envelope = repairAndParse(candidate);
    if (envelope) {
      return envelope;
    }
  }

  throw new ParseError("No JSON items could be recovered from the reply", raw);
}

const fieldSchema = z
  .union([z.string(), z.number(), z.array(z.string())])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return "";
    if (Array.isArray(value)) return value.join(", ");
    return String(value);
  });

export const generatedItemSchema = z.object({
  term: fieldSchema,
  reading: fieldSchema,
  meaning: fieldSchema,
  example: fieldSchema,
  jlpt: fieldSchema,
});

export type GeneratedItem = z.infer<typeof generatedItemSchema>;

/**
 * Parses a reply into canonical rows. Items that are not objects or carry no term
 * are dropped, as are repeats of a key within the same reply.
 */
export function parseGeneratedRows(raw: string): VocabularyRow[] {
  const { items } = parseLenientJson(raw);
  const rows = new Map<string, VocabularyRow>();

  for (const item of items) {
    const parsed = generatedItemSchema.safeParse(item);
    if (!parsed.success) continue;
    const row = canonicalizeRow(parsed.data);
    if (!row.term) continue;
    const id = rowKeyId(row);
    if (!rows.has(id)) {
      rows.set(id, row);
    }
  }

  return Array.from(rows.values());
}
