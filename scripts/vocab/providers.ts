import fetch from "node-fetch";

import { createScopedLogger } from "@shared/logger";
import { removeFurigana } from "@shared/text-normalizer";
import { canonicalizeRow, type VocabularyRow } from "@shared/vocabulary";

import { MissingApiKeyError, ProviderRequestError } from "./errors";

const REQUEST_HEADERS = {
  Accept: "application/json",
  "User-Agent": "nihongo-vocab-collector/1.0 (vocabulary table builder)",
};

const logger = createScopedLogger("providers");

const OPENAI_CHAT_COMPLETIONS = "https://api.openai.com/v1/chat/completions";
const JISHO_WORD_SEARCH = "https://jisho.org/api/v1/search/words";
const TATOEBA_API = "https://tatoeba.org/en/api_v0/search";

export interface ChatRequest {
  system: string;
  user: string;
  jsonMode?: boolean;
  maxTokens?: number;
}

/** Anything that turns a prompt into free text; the OpenAI client is one. */
export interface ChatCompletionClient {
  readonly model: string;
  complete(request: ChatRequest): Promise<string>;
}

/** Best-effort dictionary enrichment; `null` when the term has no entry. */
export interface DictionaryLookup {
  lookup(term: string, readingHint?: string): Promise<VocabularyRow | null>;
}

export interface OpenAiClientOptions {
  apiKey: string | undefined;
  model: string;
  temperature?: number;
  endpoint?: string;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export function createOpenAiChatClient(options: OpenAiClientOptions): ChatCompletionClient {
  const { apiKey, model, temperature = 0.4, endpoint = OPENAI_CHAT_COMPLETIONS } = options;
  if (!apiKey) {
    throw new MissingApiKeyError("OPENAI_API_KEY");
  }

  return {
    model,
    async complete(request: ChatRequest): Promise<string> {
      const body = {
        model,
        temperature,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        ...(request.jsonMode ? { response_format: { type: "json_object" } } : {}),
        ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
      };

      const response = await fetch(endpoint, {
        method: "POST",
        headers: {
          ...REQUEST_HEADERS,
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        throw new ProviderRequestError("openai", response.status, await response.text());
      }

      const payload = (await response.json()) as ChatCompletionResponse;
      return payload.choices?.[0]?.message?.content ?? "";
    },
  };
}

interface JishoJapanese {
  word?: string;
  reading?: string;
}

interface JishoSense {
  english_definitions?: string[];
  parts_of_speech?: string[];
}

interface JishoEntry {
  slug?: string;
  japanese?: JishoJapanese[];
  senses?: JishoSense[];
  jlpt?: string[];
}

interface JishoResponse {
  data?: JishoEntry[];
}

interface TatoebaResponse {
  results?: Array<{
    text?: string;
  }>;
}

function toArray<T>(value: T[] | undefined | null): T[] {
  return Array.isArray(value) ? value : [];
}

async function getJson<T>(provider: string, url: string): Promise<T> {
  const response = await fetch(url, { headers: REQUEST_HEADERS });
  if (!response.ok) {
    throw new ProviderRequestError(provider, response.status, await response.text());
  }
  return (await response.json()) as T;
}

export async function searchJisho(keyword: string): Promise<JishoEntry[]> {
  const params = new URLSearchParams({ keyword });
  const data = await getJson<JishoResponse>("jisho", `${JISHO_WORD_SEARCH}?${params.toString()}`);
  return toArray(data.data);
}

/** Up to two senses, skipping Wikipedia stubs; definitions joined by ", ", senses by "; ". */
export function summariseMeanings(senses: readonly JishoSense[], limit = 2): string {
  const picked: string[] = [];
  for (const sense of senses) {
    if (toArray(sense.parts_of_speech).includes("Wikipedia definition")) continue;
    const definitions = toArray(sense.english_definitions).filter(Boolean);
    if (definitions.length) {
      picked.push(definitions.join(", "));
    }
    if (picked.length >= limit) break;
  }
  return picked.join("; ");
}

export async function lookupExampleSentence(term: string): Promise<string> {
  const params = new URLSearchParams({
    query: term,
    from: "jpn",
    to: "eng",
    sort: "relevance",
    limit: "1",
  });
  const data = await getJson<TatoebaResponse>("tatoeba", `${TATOEBA_API}?${params.toString()}`);
  const sentence = data.results?.[0]?.text?.trim();
  return sentence ? removeFurigana(sentence) : "";
}

async function lookupExampleOrBlank(term: string): Promise<string> {
  try {
    return await lookupExampleSentence(term);
  } catch (error) {
    logger.warn("example_lookup_failed", { term }, error);
    return "";
  }
}

export interface JishoDictionaryOptions {
  withExamples?: boolean;
}

export function createJishoDictionary(options: JishoDictionaryOptions = {}): DictionaryLookup {
  const withExamples = options.withExamples ?? true;

  return {
    async lookup(term: string, readingHint?: string): Promise<VocabularyRow | null> {
      let entries = await searchJisho(term);
      if (!entries.length && readingHint) {
        entries = await searchJisho(readingHint);
      }
      const entry = entries[0];
      if (!entry) {
        return null;
      }

      const headword = toArray(entry.japanese)[0] ?? {};
      const example = withExamples ? await lookupExampleOrBlank(term) : "";
      return canonicalizeRow({
        term: headword.word || headword.reading || term,
        reading: headword.reading || readingHint || "",
        meaning: summariseMeanings(toArray(entry.senses)),
        example,
        jlpt: toArray(entry.jlpt)[0] ?? "",
      });
    },
  };
}
