import { describe, expect, it, vi } from 'vitest';

import { TranslationError } from '../../scripts/vocab/errors';
import type { ChatCompletionClient, ChatRequest } from '../../scripts/vocab/providers';
import { RetryPolicy } from '../../scripts/vocab/retry';
import {
  collectTranslations,
  splitEnglishSeeds,
  tagMeaning,
  translateEnglishTerms,
} from '../../scripts/vocab/translate';

const DICTIONARY: Record<string, [string, string]> = {
  economy: ['経済', 'けいざい'],
  politics: ['政治', 'せいじ'],
  culture: ['文化', 'ぶんか'],
};

function seedsOf(request: ChatRequest): string[] {
  const payload: { seeds: string[] } = JSON.parse(request.user);
  return payload.seeds;
}

function translationsFor(seeds: string[]): string {
  return JSON.stringify({
    items: seeds.map((seed) => {
      const [term, reading] = DICTIONARY[seed];
      return { term, reading, meaning: seed, example: `${term}について話す。` };
    }),
  });
}

function scriptedClient(reply: (request: ChatRequest, call: number) => string) {
  const requests: ChatRequest[] = [];
  const client: ChatCompletionClient = {
    model: 'test-model',
    complete: vi.fn(async (request: ChatRequest) => {
      requests.push(request);
      return reply(request, requests.length);
    }),
  };
  return { client, requests };
}

function quietPolicy(sleep = vi.fn(async (_ms: number) => {})) {
  return new RetryPolicy({ maxAttempts: 3, stepDelayMs: 400, sleep });
}

describe('splitEnglishSeeds', () => {
  it('splits on separators and keeps pieces with Latin letters', () => {
    expect(splitEnglishSeeds('economy, politics\nculture;;  42 | tea\tcoffee')).toEqual([
      'economy',
      'politics',
      'culture',
      'tea',
      'coffee',
    ]);
  });
});

describe('tagMeaning', () => {
  it('prefixes the seed in brackets unless one is already there', () => {
    expect(tagMeaning('economy', 'economy, finance')).toBe('[economy] economy, finance');
    expect(tagMeaning('economy', '[economy] economy')).toBe('[economy] economy');
    expect(tagMeaning('tea', '')).toBe('[tea]');
    expect(tagMeaning(undefined, 'finance')).toBe('finance');
  });
});

describe('collectTranslations', () => {
  it('pairs items with seeds, falls back to the reading and blanks stray examples', () => {
    const reply = JSON.stringify({
      items: [
        { term: '経済', reading: 'けいざい', meaning: 'economy', example: '経済が回復した。', jlpt: 'n3' },
        { term: '', reading: 'おちゃ', meaning: '[tea] green tea', example: 'お茶を飲む。' },
        { term: '', reading: '' },
        'not an item',
      ],
    });

    expect(collectTranslations(reply, ['economy', 'tea', 'water', 'milk'])).toEqual([
      { term: '経済', reading: 'けいざい', meaning: '[economy] economy', example: '経済が回復した。', jlpt: 'N3' },
      { term: 'おちゃ', reading: 'おちゃ', meaning: '[tea] green tea', example: '', jlpt: '' },
    ]);
  });
});

describe('translateEnglishTerms', () => {
  it('sends seeds in batches and keeps their order', async () => {
    const { client, requests } = scriptedClient((request) => translationsFor(seedsOf(request)));

    const rows = await translateEnglishTerms(client, ['economy', ' politics ', '', 'culture'], {
      batchSize: 2,
      policy: quietPolicy(),
    });

    expect(requests.map(seedsOf)).toEqual([['economy', 'politics'], ['culture']]);
    expect(requests[0].jsonMode).toBe(true);
    expect(requests[0].maxTokens).toBe(1200);
    expect(rows.map((row) => [row.term, row.meaning])).toEqual([
      ['経済', '[economy] economy'],
      ['政治', '[politics] politics'],
      ['文化', '[culture] culture'],
    ]);
  });

  it('retries a batch whose reply cannot be parsed', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const { client, requests } = scriptedClient((request, call) =>
      call === 1 ? 'Sorry, I cannot do that.' : translationsFor(seedsOf(request)),
    );

    const rows = await translateEnglishTerms(client, ['economy'], { policy: quietPolicy(sleep) });

    expect(rows.map((row) => row.term)).toEqual(['経済']);
    expect(requests).toHaveLength(2);
    expect(sleep.mock.calls).toEqual([[400]]);
  });

  it('raises TranslationError with the reply snippet when nothing is translated', async () => {
    const { client, requests } = scriptedClient(() => '{"items": []}');

    const error = await translateEnglishTerms(client, ['economy'], { policy: quietPolicy() }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(TranslationError);
    expect(error).toMatchObject({ seeds: ['economy'], snippet: '{"items": []}' });
    expect(requests).toHaveLength(3);
  });

  it('skips an exhausted batch once earlier batches produced rows', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { client, requests } = scriptedClient((request) => {
      const seeds = seedsOf(request);
      return seeds[0] === 'economy' ? translationsFor(seeds) : '{"items": []}';
    });

    const rows = await translateEnglishTerms(client, ['economy', 'politics'], {
      batchSize: 1,
      policy: quietPolicy(),
    });

    expect(rows.map((row) => row.term)).toEqual(['経済']);
    expect(requests).toHaveLength(4);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
