import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MissingApiKeyError, ProviderRequestError } from '../../scripts/vocab/errors';
import {
  createJishoDictionary,
  createOpenAiChatClient,
  summariseMeanings,
} from '../../scripts/vocab/providers';

const fetchMock = vi.hoisted(() => vi.fn());

vi.mock('node-fetch', () => ({
  default: fetchMock,
}));

function createResponse(body: unknown, status = 200) {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    status,
    ok: status >= 200 && status < 300,
    text: async () => text,
    json: async () => JSON.parse(text),
  };
}

function requestedUrl(call: number): URL {
  return new URL(String(fetchMock.mock.calls[call][0]));
}

describe('createOpenAiChatClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('refuses to start without an API key', () => {
    expect(() => createOpenAiChatClient({ apiKey: undefined, model: 'gpt-4o-mini' })).toThrow(
      MissingApiKeyError,
    );
  });

  it('posts a chat completion and returns the message content', async () => {
    fetchMock.mockResolvedValueOnce(
      createResponse({ choices: [{ message: { content: '{"items": []}' } }] }),
    );
    const client = createOpenAiChatClient({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    const reply = await client.complete({ system: 'sys', user: 'hello', jsonMode: true });

    expect(reply).toBe('{"items": []}');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init.method).toBe('POST');
    expect(init.headers.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(init.body)).toEqual({
      model: 'gpt-4o-mini',
      temperature: 0.4,
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hello' },
      ],
      response_format: { type: 'json_object' },
    });
  });

  it('returns an empty string when the reply has no content', async () => {
    fetchMock.mockResolvedValueOnce(createResponse({ choices: [] }));
    const client = createOpenAiChatClient({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    await expect(client.complete({ system: 's', user: 'u', maxTokens: 50 })).resolves.toBe('');
    expect(JSON.parse(fetchMock.mock.calls[0][1].body).max_tokens).toBe(50);
  });

  it('raises ProviderRequestError on a failed response', async () => {
    fetchMock.mockResolvedValueOnce(createResponse('rate limited', 429));
    const client = createOpenAiChatClient({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    const error = await client.complete({ system: 's', user: 'u' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error).toMatchObject({ provider: 'openai', status: 429, body: 'rate limited' });
  });
});

describe('summariseMeanings', () => {
  it('joins up to two non-Wikipedia senses', () => {
    expect(
      summariseMeanings([
        { english_definitions: ['Keizai'], parts_of_speech: ['Wikipedia definition'] },
        { english_definitions: ['economy', 'economics'], parts_of_speech: ['Noun'] },
        { english_definitions: [] },
        { english_definitions: ['finances'], parts_of_speech: ['Noun'] },
        { english_definitions: ['thrift'], parts_of_speech: ['Noun'] },
      ]),
    ).toBe('economy, economics; finances');
  });
});

describe('createJishoDictionary', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('builds a row from the first entry and a Tatoeba example', async () => {
    fetchMock
      .mockResolvedValueOnce(
        createResponse({
          data: [
            {
              japanese: [{ word: '経済', reading: 'けいざい' }],
              senses: [{ english_definitions: ['economy', 'economics'], parts_of_speech: ['Noun'] }],
              jlpt: ['jlpt-n3'],
            },
          ],
        }),
      )
      .mockResolvedValueOnce(
        createResponse({ results: [{ text: '経済（けいざい）が回復した。' }] }),
      );

    const row = await createJishoDictionary().lookup('経済');

    expect(row).toEqual({
      term: '経済',
      reading: 'けいざい',
      meaning: 'economy, economics',
      example: '経済が回復した。',
      jlpt: 'N3',
    });
    expect(requestedUrl(0).searchParams.get('keyword')).toBe('経済');
    expect(requestedUrl(1).searchParams.get('query')).toBe('経済');
    expect(requestedUrl(1).searchParams.get('from')).toBe('jpn');
  });

  it('retries the search with the reading hint and skips examples when disabled', async () => {
    fetchMock
      .mockResolvedValueOnce(createResponse({ data: [] }))
      .mockResolvedValueOnce(
        createResponse({
          data: [{ japanese: [{ reading: 'すごい' }], senses: [{ english_definitions: ['amazing'] }] }],
        }),
      );

    const row = await createJishoDictionary({ withExamples: false }).lookup('凄い', 'すごい');

    expect(row).toEqual({ term: 'すごい', reading: 'すごい', meaning: 'amazing', example: '', jlpt: '' });
    expect(requestedUrl(1).searchParams.get('keyword')).toBe('すごい');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('returns null when no entry is found', async () => {
    fetchMock.mockResolvedValueOnce(createResponse({ data: [] }));
    await expect(createJishoDictionary().lookup('ぬぬぬ')).resolves.toBeNull();
  });

  it('leaves the example blank when the example lookup fails', async () => {
    fetchMock
      .mockResolvedValueOnce(
        createResponse({ data: [{ japanese: [{ word: '政治', reading: 'せいじ' }], senses: [] }] }),
      )
      .mockResolvedValueOnce(createResponse('unavailable', 503));

    const row = await createJishoDictionary().lookup('政治');

    expect(row).toEqual({ term: '政治', reading: 'せいじ', meaning: '', example: '', jlpt: '' });
  });

  it('propagates dictionary search failures', async () => {
    fetchMock.mockResolvedValueOnce(createResponse('down', 500));
    await expect(createJishoDictionary().lookup('政治')).rejects.toBeInstanceOf(ProviderRequestError);
  });
});
