import { describe, expect, it } from 'vitest';

import { ParseError } from '../../scripts/vocab/errors';
import {
  bracketSpans,
  extractFencedBlock,
  extractLargestSpan,
  parseGeneratedRows,
  parseLenientJson,
  quoteBareKeys,
  singleToDoubleQuotes,
  stripTrailingCommas,
} from '../../scripts/vocab/json-repair';

const ITEMS = [
  { term: '経済', reading: 'けいざい' },
  { term: '政治', reading: 'せいじ' },
];

describe('parseLenientJson', () => {
  it.each([
    ['strict object', JSON.stringify({ items: ITEMS })],
    ['bare array', JSON.stringify(ITEMS)],
    [
      'fenced block with prose',
      `Here you go:\n\`\`\`json\n${JSON.stringify({ items: ITEMS }, null, 2)}\n\`\`\`\nEnjoy!`,
    ],
    [
      'single quotes, bare keys and trailing commas',
      "{items: [{term: '経済', reading: 'けいざい',}, {term: '政治', reading: 'せいじ',},],}",
    ],
    [
      'smart quotes',
      '{“items”: [{“term”: “経済”, “reading”: “けいざい”}, {“term”: “政治”, “reading”: “せいじ”}]}',
    ],
    ['leading chatter', `Sure! ${JSON.stringify({ items: ITEMS })} Let me know.`],
    ['bracket in the leading prose', `Here [1] is ${JSON.stringify({ items: ITEMS })}`],
  ])('recovers the same items from a %s', (_label, raw) => {
    expect(parseLenientJson(raw).items).toEqual(ITEMS);
  });

  it('accepts a words alias and a lone item object', () => {
    expect(parseLenientJson(JSON.stringify({ words: ITEMS })).items).toEqual(ITEMS);
    expect(parseLenientJson(JSON.stringify(ITEMS[0])).items).toEqual([ITEMS[0]]);
  });

  it('throws ParseError with a snippet when nothing can be recovered', () => {
    const raw = 'I could not think of any words for that topic.';
    expect(() => parseLenientJson(raw)).toThrow(ParseError);
    try {
      parseLenientJson(raw);
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError ? error.snippet : '').toBe(raw);
    }
  });

  it('rejects valid JSON that carries no items', () => {
    expect(() => parseLenientJson('{"status": "ok"}')).toThrow(ParseError);
  });
});

describe('repair steps', () => {
  it('leaves apostrophes inside double-quoted strings alone', () => {
    const text = `{meaning: "one's own", 'term': '自分'}`;
    expect(singleToDoubleQuotes(quoteBareKeys(text))).toBe(
      `{"meaning": "one's own", "term": "自分"}`,
    );
  });

  it('escapes double quotes found inside single-quoted strings', () => {
    expect(singleToDoubleQuotes(`['say "hi"']`)).toBe(`["say \\"hi\\""]`);
  });

  it('does not strip commas inside strings', () => {
    expect(stripTrailingCommas('{"a": ",}", "b": [1, 2,],}')).toBe('{"a": ",}", "b": [1, 2]}');
  });

  it('extracts fenced blocks and the widest bracketed span', () => {
    expect(extractFencedBlock('x\n```\n[1]\n```')).toBe('[1]');
    expect(extractFencedBlock('no fence')).toBeNull();
    expect(extractLargestSpan('a {"b": {"c": 1}} d')).toBe('{"b": {"c": 1}}');
    expect(extractLargestSpan('nothing here')).toBeNull();
    expect(bracketSpans('see [1]: {"a": 2}')).toEqual(['{"a": 2}', '[1]']);
  });
});

describe('parseGeneratedRows', () => {
  it('canonicalizes fields, joins list meanings and drops blank or repeated terms', () => {
    const raw = JSON.stringify({
      items: [
        { term: ' 経済 ', reading: 'けいざい', meaning: ['economy', 'finance'], jlpt: 'n3' },
        { term: '経済', reading: 'けいざい', meaning: 'duplicate' },
        { term: '', reading: 'から' },
        'not an object',
        { term: 42, reading: null },
      ],
    });

    expect(parseGeneratedRows(raw)).toEqual([
      { term: '経済', reading: 'けいざい', meaning: 'economy, finance', example: '', jlpt: 'N3' },
      { term: '42', reading: '', meaning: '', example: '', jlpt: '' },
    ]);
  });
});
