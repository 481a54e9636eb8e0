import { createScopedLogger } from "@shared/logger";
import { characterLength } from "@shared/text-normalizer";
import { emptyRow, type VocabularyRow } from "@shared/vocabulary";

import type { Morpheme, TokenizerAdapter } from "./tokenizer";

export type CandidateOrigin = "word" | "phrase";

export interface Candidate {
  term: string;
  reading: string;
  score: number;
  origin: CandidateOrigin;
}

export interface ExtractionOptions {
  topK?: number;
  minFreq?: number;
  allowPhrases?: boolean;
  maxNgramLen?: number;
}

const DEFAULT_OPTIONS: Required<ExtractionOptions> = {
  topK: 80,
  minFreq: 2,
  allowPhrases: true,
  maxNgramLen: 3,
};

const PUNCTUATION = new Set(
  Array.from("。．、，・！？!?（）()［］[]{}：；「」『』…—- \n\t\r"),
);

export const STOP_TERMS: ReadonlySet<string> = new Set([
  "する",
  "ある",
  "いる",
  "こと",
  "もの",
  "これ",
  "それ",
  "あれ",
  "ため",
  "よう",
  "さん",
  "できる",
  "なる",
  "及び",
  "また",
  "など",
  "ようだ",
  "ように",
  "そして",
]);

const PHRASE_BONUS = 0.5;
const logger = createScopedLogger("extractor");
const MIN_TERM_LENGTH = 2;

function isPunctuation(morpheme: Morpheme): boolean {
  return morpheme.pos === "punctuation" || PUNCTUATION.has(morpheme.surface);
}

function headwordOf(morpheme: Morpheme): string | null {
  switch (morpheme.pos) {
    case "noun":
      return morpheme.surface;
    case "verb":
    case "adjective":
      return morpheme.lemma;
    default:
      return null;
  }
}

interface WordTally {
  count: number;
  readings: Map<string, number>;
}

function majorityReading(readings: Map<string, number>): string {
  let best = "";
  let bestCount = 0;
  // Strictly greater: the first reading seen keeps ties.
  for (const [reading, count] of readings) {
    if (count > bestCount) {
      best = reading;
      bestCount = count;
    }
  }
  return best;
}

export function rankSingleWords(morphemes: readonly Morpheme[], minFreq: number): Candidate[] {
  const tallies = new Map<string, WordTally>();

  for (const morpheme of morphemes) {
    if (isPunctuation(morpheme)) continue;
    const head = headwordOf(morpheme);
    if (!head || STOP_TERMS.has(head)) continue;

    const tally = tallies.get(head) ?? { count: 0, readings: new Map<string, number>() };
    tally.count += 1;
    tally.readings.set(morpheme.reading, (tally.readings.get(morpheme.reading) ?? 0) + 1);
    tallies.set(head, tally);
  }

  const ranked: Candidate[] = [];
  for (const [term, tally] of tallies) {
    if (tally.count < minFreq) continue;
    ranked.push({
      term,
      reading: majorityReading(tally.readings),
      score: tally.count + Math.min(2, Math.floor(characterLength(term) / 2)),
      origin: "word",
    });
  }
  return ranked.sort((a, b) => b.score - a.score);
}

function scorePhrase(tokens: readonly Morpheme[]): Candidate {
  const term = tokens.map((token) => token.surface).join("");
  const reading = tokens.map((token) => token.reading).join("");
  return {
    term,
    reading,
    score: 2.0 + 0.4 * tokens.length + Math.min(2, Math.floor(characterLength(term) / 3)),
    origin: "phrase",
  };
}

function nounRuns(sequence: readonly Morpheme[]): Candidate[] {
  const phrases: Candidate[] = [];
  let run: Morpheme[] = [];
  for (const morpheme of sequence) {
    if (morpheme.pos === "noun") {
      run.push(morpheme);
      continue;
    }
    if (run.length >= 2) {
      phrases.push(scorePhrase(run));
    }
    run = [];
  }
  if (run.length >= 2) {
    phrases.push(scorePhrase(run));
  }
  return phrases;
}

function adjectiveNounPairs(sequence: readonly Morpheme[]): Candidate[] {
  const phrases: Candidate[] = [];
  for (let index = 0; index < sequence.length - 1; index += 1) {
    const first = sequence[index];
    const second = sequence[index + 1];
    if (first.pos === "adjective" && second.pos === "noun") {
      phrases.push(scorePhrase([first, second]));
    }
  }
  return phrases;
}

function nounHeavyNgrams(sequence: readonly Morpheme[], maxNgramLen: number): Candidate[] {
  const phrases: Candidate[] = [];
  const upper = Math.max(2, maxNgramLen);
  for (let size = 2; size <= upper; size += 1) {
    for (let start = 0; start + size <= sequence.length; start += 1) {
      const window = sequence.slice(start, start + size);
      if (window.some(isPunctuation)) continue;
      const nouns = window.filter((token) => token.pos === "noun").length;
      if (nouns >= 2) {
        phrases.push(scorePhrase(window));
      }
    }
  }
  return phrases;
}

export function rankPhrases(morphemes: readonly Morpheme[], maxNgramLen: number): Candidate[] {
  const sequence = morphemes.filter((morpheme) => !isPunctuation(morpheme));
  return [
    ...nounRuns(sequence),
    ...adjectiveNounPairs(sequence),
    ...nounHeavyNgrams(sequence, maxNgramLen),
  ];
}

export function combineCandidates(
  words: readonly Candidate[],
  phrases: readonly Candidate[],
  topK: number,
): Candidate[] {
  const seen = new Set<string>();
  const combined: Candidate[] = [];

  for (const candidate of words) {
    if (seen.has(candidate.term)) continue;
    seen.add(candidate.term);
    combined.push(candidate);
  }
  for (const candidate of phrases) {
    if (!candidate.term || STOP_TERMS.has(candidate.term) || seen.has(candidate.term)) continue;
    seen.add(candidate.term);
    combined.push({ ...candidate, score: candidate.score + PHRASE_BONUS });
  }

  // Array#sort is stable, so equal scores keep first-seen order.
  combined.sort((a, b) => b.score - a.score);

  return combined
    .filter((candidate) => characterLength(candidate.term) >= MIN_TERM_LENGTH)
    .slice(0, Math.max(0, topK));
}

export function extractCandidatesFromMorphemes(
  morphemes: readonly Morpheme[],
  options: ExtractionOptions = {},
): Candidate[] {
  const topK = options.topK ?? DEFAULT_OPTIONS.topK;
  const minFreq = options.minFreq ?? DEFAULT_OPTIONS.minFreq;
  const allowPhrases = options.allowPhrases ?? DEFAULT_OPTIONS.allowPhrases;
  const maxNgramLen = options.maxNgramLen ?? DEFAULT_OPTIONS.maxNgramLen;
  if (!morphemes.length) {
    return [];
  }

  const words = rankSingleWords(morphemes, minFreq);
  const phrases = allowPhrases ? rankPhrases(morphemes, maxNgramLen) : [];
  return combineCandidates(words, phrases, topK);
}

/** Ranked (term, reading) candidates for raw Japanese text; never throws. */
export function extractCandidates(
  text: string,
  tokenizer: TokenizerAdapter,
  options: ExtractionOptions = {},
): Candidate[] {
  if (!text.trim()) {
    return [];
  }

  let morphemes: Morpheme[];
  try {
    morphemes = tokenizer.tokenize(text);
  } catch (error) {
    logger.warn("tokenize_failed", { length: text.length }, error);
    return [];
  }
  return extractCandidatesFromMorphemes(morphemes, options);
}

/** Rows with only term and reading filled, ready for enrichment. */
export function buildRowsFromText(
  text: string,
  tokenizer: TokenizerAdapter,
  options: ExtractionOptions = {},
): VocabularyRow[] {
  return extractCandidates(text, tokenizer, options).map((candidate) =>
    emptyRow(candidate.term, candidate.reading),
  );
}
