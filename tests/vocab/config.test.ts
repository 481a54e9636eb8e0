import { describe, expect, it } from 'vitest';

import { parseMergePolicy, resolveConfigFromEnv } from '../../scripts/vocab/config';
import { UsageError } from '../../scripts/vocab/errors';
import {
  parseArgv,
  parseEnrichOptions,
  parseExtractOptions,
  parseGenerateOptions,
  parseMergeOptions,
  parseTranslateOptions,
} from '../../scripts/vocab/options';

describe('resolveConfigFromEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(resolveConfigFromEnv({}, {})).toEqual({
      openAiApiKey: undefined,
      openAiModel: 'gpt-4o-mini',
      temperature: 0.4,
      roundCap: 12,
      stallRounds: 6,
      retryBaseDelayMs: 0,
      retryStepDelayMs: 200,
      exampleBatchSize: 20,
      gptOnly: false,
      mergePolicy: 'fill-blank',
    });
  });

  it('reads every setting from the environment', () => {
    const config = resolveConfigFromEnv(
      {},
      {
        OPENAI_API_KEY: ' test-secret ',
        OPENAI_MODEL: 'gpt-4o',
        OPENAI_TEMPERATURE: '0.9',
        TOPIC_ROUND_CAP: '20',
        TOPIC_STALL_ROUNDS: '3',
        RETRY_BASE_DELAY_MS: '100',
        RETRY_STEP_DELAY_MS: '0',
        EXAMPLE_BATCH_SIZE: '10',
        GPT_ONLY: 'yes',
        MERGE_POLICY: 'PREFER_INCOMING',
      },
    );

    expect(config).toEqual({
      openAiApiKey: 'test-secret',
      openAiModel: 'gpt-4o',
      temperature: 0.9,
      roundCap: 20,
      stallRounds: 3,
      retryBaseDelayMs: 100,
      retryStepDelayMs: 0,
      exampleBatchSize: 10,
      gptOnly: true,
      mergePolicy: 'prefer-incoming',
    });
  });

  it('ignores invalid values', () => {
    const config = resolveConfigFromEnv(
      {},
      {
        OPENAI_TEMPERATURE: 'warm',
        TOPIC_ROUND_CAP: '0',
        TOPIC_STALL_ROUNDS: '-2',
        RETRY_STEP_DELAY_MS: 'soon',
        GPT_ONLY: 'maybe',
        MERGE_POLICY: 'newest',
      },
    );

    expect(config).toMatchObject({
      temperature: 0.4,
      roundCap: 12,
      stallRounds: 6,
      retryStepDelayMs: 200,
      gptOnly: false,
      mergePolicy: 'fill-blank',
    });
  });

  it('lets overrides win over the environment', () => {
    const config = resolveConfigFromEnv({ roundCap: 2, gptOnly: false }, { TOPIC_ROUND_CAP: '30', GPT_ONLY: '1' });
    expect(config.roundCap).toBe(2);
    expect(config.gptOnly).toBe(false);
  });

  it('maps policy aliases', () => {
    expect(parseMergePolicy('fill')).toBe('fill-blank');
    expect(parseMergePolicy('overwrite')).toBe('prefer-incoming');
    expect(parseMergePolicy('conflict_aware')).toBe('conflict-aware');
    expect(parseMergePolicy(undefined)).toBeUndefined();
  });
});

describe('parseArgv', () => {
  it('handles values, switches, negations and positionals', () => {
    const args = parseArgv(
      ['--topic', 'Food', '--count=5', '--gpt-only', '--no-examples', 'table.csv', '--', '--raw'],
      ['gpt-only', 'examples'],
    );

    expect(Object.fromEntries(args.values)).toEqual({ topic: 'Food', count: '5' });
    expect(Object.fromEntries(args.switches)).toEqual({ 'gpt-only': true, examples: false });
    expect(args.positionals).toEqual(['table.csv', '--raw']);
  });

  it('reads explicit switch values', () => {
    expect(parseArgv(['--paste=false'], ['paste']).switches.get('paste')).toBe(false);
  });

  it('rejects a flag without its value', () => {
    expect(() => parseArgv(['--topic'])).toThrow(UsageError);
    expect(() => parseArgv(['--topic', '--count', '3'])).toThrow('Missing value for --topic');
  });
});

describe('command options', () => {
  it('parses extraction options with positional paths', () => {
    expect(parseExtractOptions(['notes.txt', 'vocab.csv', '--top-k', '40', '--no-phrases'])).toEqual({
      input: 'notes.txt',
      table: 'vocab.csv',
      paste: false,
      topK: 40,
      minFreq: undefined,
      maxNgramLen: undefined,
      allowPhrases: false,
      policy: undefined,
    });
  });

  it('requires a positive integer count for generation', () => {
    expect(() => parseGenerateOptions(['--topic', 'Food', '--table', 'v.csv'])).toThrow('--count is required');
    expect(() => parseGenerateOptions(['--topic', 'Food', '--table', 'v.csv', '--count', '2.5'])).toThrow(
      UsageError,
    );
    expect(
      parseGenerateOptions(['--topic', 'Food', '--table', 'v.csv', '--count', '30', '--policy', 'conflict-aware']),
    ).toEqual({ topic: 'Food', count: 30, table: 'v.csv', gptOnly: undefined, policy: 'conflict-aware' });
  });

  it('rejects unknown merge policies', () => {
    expect(() => parseMergeOptions(['--into', 'a.csv', '--from', 'b.csv', '--policy', 'newest'])).toThrow(
      UsageError,
    );
  });

  it('parses merge and enrichment options', () => {
    expect(parseMergeOptions(['a.csv', 'b.csv', '--output', 'c.csv'])).toEqual({
      target: 'a.csv',
      source: 'b.csv',
      output: 'c.csv',
      policy: undefined,
    });
    expect(parseEnrichOptions(['--table', 'a.csv', '--no-dictionary', '--overwrite-examples'])).toEqual({
      table: 'a.csv',
      output: undefined,
      dictionary: false,
      examples: true,
      overwriteExamples: true,
    });
  });

  it('parses translation options', () => {
    expect(parseTranslateOptions(['seeds.txt', '--table', 'v.csv', '--policy', 'overwrite'])).toEqual({
      input: 'seeds.txt',
      table: 'v.csv',
      policy: 'prefer-incoming',
    });
  });
});
