import { createRequire } from "node:module";
import path from "node:path";

import kuromoji from "kuromoji";
import type { IpadicFeatures, Tokenizer } from "kuromoji";

import { katakanaToHiragana } from "@shared/text-normalizer";

export type PartOfSpeech =
  | "noun"
  | "verb"
  | "adjective"
  | "adverb"
  | "particle"
  | "auxiliary"
  | "punctuation"
  | "other";

export interface Morpheme {
  readonly surface: string;
  readonly lemma: string;
  readonly pos: PartOfSpeech;
  /** Hiragana. */
  readonly reading: string;
}

export interface TokenizerAdapter {
  tokenize(text: string): Morpheme[];
}

const IPADIC_POS: Record<string, PartOfSpeech> = {
  名詞: "noun",
  動詞: "verb",
  形容詞: "adjective",
  副詞: "adverb",
  助詞: "particle",
  助動詞: "auxiliary",
  記号: "punctuation",
};

export function toMorpheme(token: IpadicFeatures): Morpheme {
  const surface = token.surface_form;
  const lemma = token.basic_form && token.basic_form !== "*" ? token.basic_form : surface;
  const rawReading = token.reading && token.reading !== "*" ? token.reading : surface;
  return {
    surface,
    lemma,
    pos: IPADIC_POS[token.pos] ?? "other",
    reading: katakanaToHiragana(rawReading),
  };
}

export class KuromojiTokenizer implements TokenizerAdapter {
  constructor(private readonly tokenizer: Tokenizer<IpadicFeatures>) {}

  tokenize(text: string): Morpheme[] {
    if (!text.trim()) {
      return [];
    }
    return this.tokenizer.tokenize(text).map(toMorpheme);
  }
}

export function resolveDictionaryPath(): string {
  const require = createRequire(import.meta.url);
  return path.join(path.dirname(require.resolve("kuromoji/package.json")), "dict");
}

/** Loads the IPADIC dictionary shipped with kuromoji; slow, so build once and share. */
export function createKuromojiTokenizer(
  dicPath: string = resolveDictionaryPath(),
): Promise<KuromojiTokenizer> {
  return new Promise((resolve, reject) => {
    kuromoji.builder({ dicPath }).build((err, tokenizer) => {
      if (err) {
        reject(err);
      } else {
        resolve(new KuromojiTokenizer(tokenizer));
      }
    });
  });
}
