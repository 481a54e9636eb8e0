import { readFile } from "node:fs/promises";

import { createScopedLogger } from "@shared/logger";
import { rowKey, type VocabularyRow } from "@shared/vocabulary";

import type { CollectorConfig } from "./config";
import { UsageError } from "./errors";
import { applyExamples, generateExamples, termsNeedingExamples } from "./examples";
import { buildRowsFromText } from "./extractor";
import { enrichRow, TopicGenerator } from "./generator";
import { DEFAULT_MERGE_POLICY, mergePolicyFromName, mergeRows, type MergeResult } from "./merge";
import type {
  EnrichCliOptions,
  ExtractCliOptions,
  GenerateCliOptions,
  MergeCliOptions,
  TranslateCliOptions,
} from "./options";
import { parsePastedBlob } from "./paste";
import type { ChatCompletionClient, DictionaryLookup } from "./providers";
import { RetryPolicy, type Sleep } from "./retry";
import { readTableCsv, readTableCsvIfExists, writeTableCsv } from "./table-io";
import type { TokenizerAdapter } from "./tokenizer";
import { splitEnglishSeeds, translateEnglishTerms } from "./translate";

const logger = createScopedLogger("pipeline");

/** Collaborators are built lazily by the caller so that unused ones need no credentials. */
export interface PipelineDependencies {
  client?: () => ChatCompletionClient;
  dictionary?: () => DictionaryLookup;
  tokenizer?: () => Promise<TokenizerAdapter>;
  sleep?: Sleep;
}

export interface TableUpdate {
  path: string;
  merge: MergeResult;
}

function resolveDependency<T>(factory: (() => T) | undefined, name: string): T {
  if (!factory) {
    throw new Error(`No ${name} configured for this run`);
  }
  return factory();
}

async function mergeIntoTable(
  tablePath: string,
  incoming: readonly VocabularyRow[],
  config: CollectorConfig,
  policyName = config.mergePolicy,
  outputPath = tablePath,
): Promise<TableUpdate> {
  const existing = await readTableCsvIfExists(tablePath);
  const merge = mergeRows(existing, incoming, mergePolicyFromName(policyName));
  await writeTableCsv(outputPath, merge.rows);
  logger.info("table_written", {
    path: outputPath,
    rows: merge.rows.length,
    added: merge.added,
    updated: merge.updated,
  });
  return { path: outputPath, merge };
}

export async function runExtract(
  options: ExtractCliOptions,
  config: CollectorConfig,
  dependencies: PipelineDependencies,
): Promise<TableUpdate> {
  const text = await readFile(options.input, "utf8");
  let rows: VocabularyRow[];
  if (options.paste) {
    rows = parsePastedBlob(text);
  } else {
    const tokenizer = await resolveDependency(dependencies.tokenizer, "tokenizer");
    rows = buildRowsFromText(text, tokenizer, {
      topK: options.topK,
      minFreq: options.minFreq,
      maxNgramLen: options.maxNgramLen,
      allowPhrases: options.allowPhrases,
    });
  }
  logger.info("candidates_extracted", { input: options.input, candidates: rows.length });
  return mergeIntoTable(options.table, rows, config, options.policy);
}

export async function runGenerate(
  options: GenerateCliOptions,
  config: CollectorConfig,
  dependencies: PipelineDependencies,
  signal?: AbortSignal,
): Promise<TableUpdate> {
  const existing = await readTableCsvIfExists(options.table);
  const gptOnly = options.gptOnly ?? config.gptOnly;
  const generator = new TopicGenerator({
    client: resolveDependency(dependencies.client, "chat client"),
    dictionary: gptOnly || !dependencies.dictionary ? undefined : dependencies.dictionary(),
    policy: new RetryPolicy({
      maxAttempts: config.roundCap,
      baseDelayMs: config.retryBaseDelayMs,
      stepDelayMs: config.retryStepDelayMs,
      sleep: dependencies.sleep,
    }),
    stallRounds: config.stallRounds,
  });

  const rows = await generator.generateRows({
    topic: options.topic,
    count: options.count,
    gptOnly,
    avoid: existing.filter((row) => row.term).map(rowKey),
    signal,
    onProgress: (progress) => logger.debug("generation_progress", { ...progress }),
  });
  return mergeIntoTable(options.table, rows, config, options.policy);
}

export async function runMerge(
  options: MergeCliOptions,
  config: CollectorConfig,
): Promise<TableUpdate> {
  const incoming = await readTableCsv(options.source);
  return mergeIntoTable(options.target, incoming, config, options.policy, options.output);
}

/** English seeds from a text file, translated into rows and merged into the table. */
export async function runTranslate(
  options: TranslateCliOptions,
  config: CollectorConfig,
  dependencies: PipelineDependencies,
): Promise<TableUpdate> {
  const seeds = splitEnglishSeeds(await readFile(options.input, "utf8"));
  if (!seeds.length) {
    throw new UsageError(`No English terms found in ${options.input}`);
  }

  const client = resolveDependency(dependencies.client, "chat client");
  const rows = await translateEnglishTerms(client, seeds, {
    policy: new RetryPolicy({ maxAttempts: 3, stepDelayMs: 400, sleep: dependencies.sleep }),
  });
  logger.info("seeds_translated", { input: options.input, seeds: seeds.length, rows: rows.length });
  return mergeIntoTable(options.table, rows, config, options.policy);
}

export interface EnrichSummary extends TableUpdate {
  enriched: number;
  examplesAdded: number;
}

/**
 * Fills blank meaning, example and level cells from the dictionary, then asks the
 * chat client for example sentences where any are still missing.
 */
export async function runEnrich(
  options: EnrichCliOptions,
  config: CollectorConfig,
  dependencies: PipelineDependencies,
): Promise<EnrichSummary> {
  let rows = await readTableCsv(options.table);
  let enriched = 0;

  if (options.dictionary && !config.gptOnly && dependencies.dictionary) {
    const dictionary = dependencies.dictionary();
    const lookups: VocabularyRow[] = [];
    for (const row of rows) {
      if (!row.term) continue;
      lookups.push(await enrichRow(dictionary, row));
    }
    const merged = mergeRows(rows, lookups, DEFAULT_MERGE_POLICY);
    rows = merged.rows;
    enriched = merged.updated;
  }

  let examplesAdded = 0;
  if (options.examples) {
    const terms = termsNeedingExamples(rows, { overwrite: options.overwriteExamples });
    if (terms.length) {
      const client = resolveDependency(dependencies.client, "chat client");
      const examples = await generateExamples(client, terms, {
        batchSize: config.exampleBatchSize,
        policy: new RetryPolicy({
          maxAttempts: 3,
          baseDelayMs: 400,
          stepDelayMs: 400,
          sleep: dependencies.sleep,
        }),
      });
      const applied = applyExamples(rows, examples, { overwrite: options.overwriteExamples });
      rows = applied.rows;
      examplesAdded = applied.updated;
    }
  }

  const outputPath = options.output ?? options.table;
  await writeTableCsv(outputPath, rows);
  logger.info("table_enriched", { path: outputPath, enriched, examplesAdded });
  return {
    path: outputPath,
    merge: { rows, added: 0, updated: enriched + examplesAdded, addedKeys: [] },
    enriched,
    examplesAdded,
  };
}
