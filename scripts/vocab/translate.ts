import { createScopedLogger } from "@shared/logger";
import { truncateSnippet } from "@shared/text-normalizer";
import { canonicalizeRow, type VocabularyRow } from "@shared/vocabulary";

import { EmptyYieldError, TranslationError } from "./errors";
import { chunk } from "./examples";
import { generatedItemSchema, parseLenientJson } from "./json-repair";
import type { ChatCompletionClient } from "./providers";
import { RetryPolicy, retryWithPolicy } from "./retry";

const logger = createScopedLogger("translator");

const SYSTEM_PROMPT =
  "You are a careful bilingual lexicographer and Japanese sentence writer. Given English seed " +
  "terms, produce ONE Japanese vocabulary entry per seed. term is the Japanese headword (never " +
  "the English seed), reading is kana, meaning starts with the seed in [brackets] followed by " +
  "concise English glosses, example is one natural Japanese sentence (60-110 characters) " +
  "containing the exact term, jlpt is N5-N1 or empty. Prefer common native equivalents over " +
  "katakana unless the loanword is standard. Respond ONLY with strict JSON.";

const SEED_SEPARATORS = /[,\n;\t|]+/;
const LATIN_LETTER = /[A-Za-z]/;

/** Seeds from free text; pieces without a Latin letter are dropped. */
export function splitEnglishSeeds(text: string): string[] {
  return text
    .split(SEED_SEPARATORS)
    .map((part) => part.trim())
    .filter((part) => part && LATIN_LETTER.test(part));
}

export interface TranslationOptions {
  batchSize?: number;
  maxTokensPerBatch?: number;
  policy?: RetryPolicy;
}

/** `[seed] gloss`, unless the gloss already opens with a bracketed seed. */
export function tagMeaning(seed: string | undefined, meaning: string): string {
  if (!seed || meaning.startsWith("[")) {
    return meaning;
  }
  return meaning ? `[${seed}] ${meaning}` : `[${seed}]`;
}

/**
 * Rows from one reply. Items answer the seeds in order; an item without term or
 * reading is skipped, and an example missing its headword is blanked.
 */
export function collectTranslations(reply: string, seeds: readonly string[]): VocabularyRow[] {
  const rows: VocabularyRow[] = [];

  parseLenientJson(reply).items.forEach((item, index) => {
    const parsed = generatedItemSchema.safeParse(item);
    if (!parsed.success) return;
    const fields = canonicalizeRow(parsed.data);
    const head = fields.term || fields.reading;
    if (!head) return;

    rows.push(
      canonicalizeRow({
        term: head,
        reading: fields.reading,
        meaning: tagMeaning(seeds[index], fields.meaning),
        example: fields.example.includes(head) ? fields.example : "",
        jlpt: fields.jlpt,
      }),
    );
  });

  return rows;
}

/**
 * Translates English seeds into Japanese rows in batches. A batch that fails or
 * yields nothing is retried under the policy; an exhausted batch is skipped with a
 * warning, unless nothing has been translated yet, which raises TranslationError.
 */
export async function translateEnglishTerms(
  client: ChatCompletionClient,
  seeds: readonly string[],
  options: TranslationOptions = {},
): Promise<VocabularyRow[]> {
  const terms = seeds.map((seed) => seed.trim()).filter(Boolean);
  const batchSize = options.batchSize ?? 25;
  const maxTokens = options.maxTokensPerBatch ?? 1200;
  const policy = options.policy ?? new RetryPolicy({ maxAttempts: 3, stepDelayMs: 400 });
  const rows: VocabularyRow[] = [];

  for (const group of chunk(terms, batchSize)) {
    let lastReply = "";
    const outcome = await retryWithPolicy(
      policy,
      async () => {
        lastReply = await client.complete({
          system: SYSTEM_PROMPT,
          user: JSON.stringify({
            instructions:
              "Return {\"items\": [...]} with one item per seed, in the same order, each with " +
              "term, reading, meaning, example and jlpt.",
            seeds: group,
          }),
          jsonMode: true,
          maxTokens,
        });
        const translated = collectTranslations(lastReply, group);
        if (!translated.length) {
          throw new EmptyYieldError(lastReply);
        }
        return translated;
      },
      ({ attempt, error }) =>
        logger.debug("translation_batch_retry", { attempt, size: group.length }, error),
    );

    if (outcome.ok) {
      rows.push(...outcome.value);
      continue;
    }
    if (!rows.length) {
      throw new TranslationError(group, lastReply);
    }
    logger.warn("translation_batch_exhausted", {
      seeds: group,
      attempts: outcome.attempts,
      reply: truncateSnippet(lastReply),
    });
  }

  return rows;
}
