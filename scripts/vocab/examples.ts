import { createScopedLogger } from "@shared/logger";
import {
  containsJapanese,
  removeFurigana,
  truncateSnippet,
} from "@shared/text-normalizer";
import { canonicalizeRow, type VocabularyRow } from "@shared/vocabulary";

import { EmptyYieldError } from "./errors";
import { parseLenientJson } from "./json-repair";
import type { ChatCompletionClient } from "./providers";
import { RetryPolicy, retryWithPolicy } from "./retry";

const logger = createScopedLogger("example-generator");

const SYSTEM_PROMPT =
  "You are a Japanese sentence generator. For each vocabulary item, produce EXACTLY ONE natural " +
  "Japanese sentence in Japanese that includes the term. Target 60-110 Japanese characters " +
  "(not words). Prefer context-rich usage (news/academic/professional). Return STRICT JSON only.";

export interface ExampleGenerationOptions {
  batchSize?: number;
  maxTokensPerBatch?: number;
  policy?: RetryPolicy;
}

/** The term to ask about: the reading when only the reading is Japanese. */
export function pickJapaneseTerm(term: string, reading: string): string {
  const trimmedTerm = term.trim();
  const trimmedReading = reading.trim();
  if (!containsJapanese(trimmedTerm) && containsJapanese(trimmedReading)) {
    return trimmedReading;
  }
  return trimmedTerm;
}

export function chunk<T>(values: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let index = 0; index < values.length; index += step) {
    chunks.push(values.slice(index, index + step));
  }
  return chunks;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/** Examples from one reply, keyed by furigana-free term; an example must contain its term. */
export function collectExamples(reply: string): Map<string, string> {
  const examples = new Map<string, string>();
  for (const item of parseLenientJson(reply).items) {
    if (!isRecord(item)) continue;
    const term = typeof item.term === "string" ? item.term.trim() : "";
    const example = typeof item.example === "string" ? item.example.trim() : "";
    if (!term || !example || !example.includes(term)) continue;
    examples.set(removeFurigana(term), example);
  }
  return examples;
}

/**
 * One generated sentence per term, batched. A batch that cannot be parsed or
 * yields nothing usable is retried under the policy, then skipped with a warning.
 */
export async function generateExamples(
  client: ChatCompletionClient,
  terms: readonly string[],
  options: ExampleGenerationOptions = {},
): Promise<Map<string, string>> {
  const batchSize = options.batchSize ?? 20;
  const maxTokens = options.maxTokensPerBatch ?? 2000;
  const policy =
    options.policy ?? new RetryPolicy({ maxAttempts: 3, baseDelayMs: 400, stepDelayMs: 400 });
  const result = new Map<string, string>();

  for (const group of chunk(terms, batchSize)) {
    let lastReply = "";
    const outcome = await retryWithPolicy(
      policy,
      async () => {
        lastReply = await client.complete({
          system: SYSTEM_PROMPT,
          user: JSON.stringify({
            instructions:
              "Return a JSON array of objects with keys 'term' and 'example'. Rules: the example " +
              "MUST include the exact JP term string and be about 60-110 JP characters.",
            terms: group,
          }),
          maxTokens,
        });
        const examples = collectExamples(lastReply);
        if (!examples.size) {
          throw new EmptyYieldError(lastReply);
        }
        return examples;
      },
      ({ attempt, error }) =>
        logger.debug("example_batch_retry", { attempt, size: group.length }, error),
    );

    if (outcome.ok) {
      for (const [term, example] of outcome.value) {
        result.set(term, example);
      }
    } else {
      logger.warn("example_batch_exhausted", {
        size: group.length,
        attempts: outcome.attempts,
        reply: truncateSnippet(lastReply),
      });
    }
  }

  return result;
}

export interface ApplyExamplesOptions {
  overwrite?: boolean;
}

export interface ApplyExamplesResult {
  rows: VocabularyRow[];
  updated: number;
}

export function exampleTermFor(row: VocabularyRow): string {
  return removeFurigana(pickJapaneseTerm(row.term, row.reading));
}

/** Writes generated examples into rows; only blank slots unless `overwrite`. */
export function applyExamples(
  rows: readonly VocabularyRow[],
  examples: ReadonlyMap<string, string>,
  options: ApplyExamplesOptions = {},
): ApplyExamplesResult {
  let updated = 0;
  const next = rows.map((row) => {
    if (row.example && !options.overwrite) {
      return row;
    }
    const example = examples.get(exampleTermFor(row));
    if (!example || example === row.example) {
      return row;
    }
    updated += 1;
    return canonicalizeRow({ ...row, example });
  });
  return { rows: next, updated };
}

/** Terms of rows that still need an example (all rows when `overwrite`). */
export function termsNeedingExamples(
  rows: readonly VocabularyRow[],
  options: ApplyExamplesOptions = {},
): string[] {
  const terms = new Set<string>();
  for (const row of rows) {
    if (row.example && !options.overwrite) continue;
    const term = exampleTermFor(row);
    if (term) {
      terms.add(term);
    }
  }
  return Array.from(terms);
}
