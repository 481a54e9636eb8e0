import { createScopedLogger } from "@shared/logger";
import { truncateSnippet } from "@shared/text-normalizer";
import {
  canonicalizeRow,
  rowKeyId,
  type RowKey,
  type VocabularyRow,
} from "@shared/vocabulary";

import {
  CapExceededError,
  EmptyYieldError,
  GenerationCancelledError,
  ParseError,
  StallError,
} from "./errors";
import { parseGeneratedRows } from "./json-repair";
import type { ChatCompletionClient, DictionaryLookup } from "./providers";
import { RetryPolicy } from "./retry";

const logger = createScopedLogger("topic-generator");

export const DEFAULT_ROUND_CAP = 12;
export const DEFAULT_STALL_ROUNDS = 6;
const MAX_AVOID_PAIRS = 250;
const FINAL_REQUEST_SLACK = 10;

const BASE_RULES = [
  "Return unique items only; no duplicates within output.",
  "Do not include any pair present in 'avoid_pairs'.",
  "reading must be kana (hiragana/katakana).",
  "example must be 1 short-medium, natural Japanese sentence using the term.",
  "meaning should be brief English; several close senses may be listed, e.g. 'harm, damage'.",
  "jlpt is one of N5,N4,N3,N2,N1 or empty if unknown.",
  "If the topic starts with 'Phrases about', return phrases rather than single words.",
];

const ESCALATING_RULES: ReadonlyArray<{ fromAttempt: number; rule: string }> = [
  {
    fromAttempt: 3,
    rule: "Choose more specific or less common items still clearly within the topic.",
  },
  {
    fromAttempt: 6,
    rule: "Consider adjacent subtopics to avoid repeats while staying relevant.",
  },
  {
    fromAttempt: 9,
    rule: "Avoid very high-frequency duplicates; diversify parts of speech.",
  },
];

const SYSTEM_PROMPT = "You are a Japanese vocabulary generator. Respond ONLY with valid JSON.";

export interface TopicBatchRequest {
  topic: string;
  count: number;
  avoid: readonly RowKey[];
  attempt: number;
}

export function guidanceFor(attempt: number): string[] {
  return [
    ...BASE_RULES,
    ...ESCALATING_RULES.filter((entry) => attempt >= entry.fromAttempt).map((entry) => entry.rule),
  ];
}

export function batchSizeFor(remaining: number): number {
  return Math.min(remaining + 8, Math.max(remaining + 4, 24));
}

export function formatAvoidPairs(avoid: readonly RowKey[]): string {
  return avoid
    .slice(0, MAX_AVOID_PAIRS)
    .map((key) => `${key.term}|${key.reading}`)
    .join("; ");
}

export function buildTopicPrompt(request: TopicBatchRequest): string {
  return JSON.stringify({
    instruction: "Generate Japanese vocabulary strictly as JSON with key 'items'.",
    topic: request.topic,
    count: request.count,
    avoid_pairs: formatAvoidPairs(request.avoid),
    rules: guidanceFor(request.attempt),
    schema: {
      term: "Kanji or kana headword",
      reading: "Hiragana or katakana reading",
      meaning: "Short English gloss",
      example: "One short Japanese sentence using the term",
      jlpt: "N5|N4|N3|N2|N1 or empty",
    },
  });
}

export type GenerationPhase = "round" | "final" | "enrich";

export interface GenerationProgress {
  phase: GenerationPhase;
  attempt: number;
  collected: number;
  target: number;
  added: number;
}

export interface TopicGenerationRequest {
  topic: string;
  count: number;
  /** Skip dictionary enrichment. */
  gptOnly?: boolean;
  avoid?: Iterable<RowKey>;
  signal?: AbortSignal;
  onProgress?: (progress: GenerationProgress) => void;
}

export interface TopicGeneratorDependencies {
  client: ChatCompletionClient;
  dictionary?: DictionaryLookup;
  policy?: RetryPolicy;
  stallRounds?: number;
}

type RoundOutcome =
  | { kind: "rows"; rows: VocabularyRow[] }
  | { kind: "failed"; error: unknown };

class TopicCollection {
  private readonly avoidIds: Set<string>;
  private readonly avoidKeys: RowKey[];
  readonly collected = new Map<string, VocabularyRow>();

  constructor(
    avoid: Iterable<RowKey>,
    readonly target: number,
  ) {
    this.avoidKeys = [];
    this.avoidIds = new Set();
    for (const key of avoid) {
      const id = rowKeyId(key);
      if (this.avoidIds.has(id)) continue;
      this.avoidIds.add(id);
      this.avoidKeys.push({ term: key.term, reading: key.reading });
    }
  }

  get size(): number {
    return this.collected.size;
  }

  get remaining(): number {
    return Math.max(0, this.target - this.collected.size);
  }

  exclusions(): RowKey[] {
    const collectedKeys = Array.from(this.collected.values(), (row) => ({
      term: row.term,
      reading: row.reading,
    }));
    return [...this.avoidKeys, ...collectedKeys];
  }

  /** Folds a batch in; returns how many rows were new. */
  absorb(rows: readonly VocabularyRow[]): number {
    let added = 0;
    for (const candidate of rows) {
      if (this.collected.size >= this.target) break;
      const row = canonicalizeRow(candidate);
      if (!row.term) continue;
      const id = rowKeyId(row);
      if (this.avoidIds.has(id) || this.collected.has(id)) continue;
      this.collected.set(id, row);
      added += 1;
    }
    return added;
  }
}

/**
 * Collects exactly `count` rows for a topic whose keys avoid `avoid` and each other.
 * Throws StallError, CapExceededError or GenerationCancelledError when that is not
 * reachable; never resolves with fewer rows than requested.
 */
export class TopicGenerator {
  private readonly client: ChatCompletionClient;
  private readonly dictionary?: DictionaryLookup;
  private readonly policy: RetryPolicy;
  private readonly stallRounds: number;

  constructor(dependencies: TopicGeneratorDependencies) {
    this.client = dependencies.client;
    this.dictionary = dependencies.dictionary;
    this.policy = dependencies.policy ?? new RetryPolicy({ maxAttempts: DEFAULT_ROUND_CAP });
    this.stallRounds = Math.max(1, dependencies.stallRounds ?? DEFAULT_STALL_ROUNDS);
  }

  async generateRows(request: TopicGenerationRequest): Promise<VocabularyRow[]> {
    const { topic, signal, onProgress } = request;
    const target = Math.max(0, Math.floor(request.count));
    const collection = new TopicCollection(request.avoid ?? [], target);

    let attempt = 0;
    let barrenRounds = 0;

    while (collection.size < target && attempt < this.policy.maxAttempts) {
      if (signal?.aborted) {
        throw new GenerationCancelledError(topic, attempt);
      }
      attempt += 1;

      const outcome = await this.runRound(
        topic,
        batchSizeFor(collection.remaining),
        collection,
        attempt,
      );
      const added = outcome.kind === "rows" ? collection.absorb(outcome.rows) : 0;

      if (outcome.kind === "rows") {
        barrenRounds = added > 0 ? 0 : barrenRounds + 1;
      }
      logger.debug("round_complete", {
        topic,
        attempt,
        added,
        collected: collection.size,
        target,
        outcome: outcome.kind,
      });
      onProgress?.({ phase: "round", attempt, collected: collection.size, target, added });

      if (barrenRounds >= this.stallRounds) {
        throw new StallError(topic, attempt, collection.size, target);
      }
      if (collection.size < target) {
        await this.policy.backoff(attempt);
      }
    }

    if (collection.size < target) {
      if (signal?.aborted) {
        throw new GenerationCancelledError(topic, attempt);
      }
      const outcome = await this.runRound(
        topic,
        collection.remaining + FINAL_REQUEST_SLACK,
        collection,
        attempt + 1,
      );
      const added = outcome.kind === "rows" ? collection.absorb(outcome.rows) : 0;
      onProgress?.({ phase: "final", attempt: attempt + 1, collected: collection.size, target, added });
    }

    if (collection.size < target) {
      throw new CapExceededError(topic, target, collection.size, attempt + 1);
    }

    let rows = Array.from(collection.collected.values());
    if (!request.gptOnly && this.dictionary) {
      rows = await this.enrich(rows, request);
    }
    return rows.slice(0, target);
  }

  private async runRound(
    topic: string,
    count: number,
    collection: TopicCollection,
    attempt: number,
  ): Promise<RoundOutcome> {
    let reply = "";
    try {
      reply = await this.client.complete({
        system: SYSTEM_PROMPT,
        user: buildTopicPrompt({ topic, count, avoid: collection.exclusions(), attempt }),
        jsonMode: true,
      });
      const rows = parseGeneratedRows(reply);
      if (!rows.length) {
        throw new EmptyYieldError(reply);
      }
      return { kind: "rows", rows };
    } catch (error) {
      const kind =
        error instanceof ParseError
          ? "parse_failed"
          : error instanceof EmptyYieldError
            ? "empty_yield"
            : "request_failed";
      logger.warn(
        kind,
        { topic, attempt, requested: count, reply: truncateSnippet(reply) },
        error,
      );
      return { kind: "failed", error };
    }
  }

  private async enrich(
    rows: readonly VocabularyRow[],
    request: TopicGenerationRequest,
  ): Promise<VocabularyRow[]> {
    const dictionary = this.dictionary;
    if (!dictionary) {
      return [...rows];
    }

    const enriched: VocabularyRow[] = [];
    for (const [index, row] of rows.entries()) {
      enriched.push(await enrichRow(dictionary, row));
      request.onProgress?.({
        phase: "enrich",
        attempt: index + 1,
        collected: rows.length,
        target: rows.length,
        added: 0,
      });
    }
    return enriched;
  }
}

/**
 * Dictionary values win for meaning, example and level. Term and reading stay as
 * generated, so the row keeps the key it was admitted under.
 */
export async function enrichRow(
  dictionary: DictionaryLookup,
  row: VocabularyRow,
): Promise<VocabularyRow> {
  try {
    const found = await dictionary.lookup(row.term, row.reading || undefined);
    if (!found) {
      return row;
    }
    return canonicalizeRow({
      term: row.term,
      reading: row.reading,
      meaning: found.meaning || row.meaning,
      example: found.example || row.example,
      jlpt: found.jlpt || row.jlpt,
    });
  } catch (error) {
    logger.warn("enrichment_failed", { term: row.term, reading: row.reading }, error);
    return row;
  }
}

export function generateTopicRows(
  request: TopicGenerationRequest,
  dependencies: TopicGeneratorDependencies,
): Promise<VocabularyRow[]> {
  return new TopicGenerator(dependencies).generateRows(request);
}
