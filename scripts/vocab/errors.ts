import { truncateSnippet } from "@shared/text-normalizer";

/** The repair parser ran out of strategies. */
export class ParseError extends Error {
  readonly snippet: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = "ParseError";
    this.snippet = truncateSnippet(raw);
  }
}

/** A batch parsed, but nothing in it survived canonicalization. */
export class EmptyYieldError extends Error {
  readonly snippet: string;

  constructor(raw: string) {
    super("Parsed zero usable items from batch");
    this.name = "EmptyYieldError";
    this.snippet = truncateSnippet(raw);
  }
}

export class TranslationError extends Error {
  readonly snippet: string;

  constructor(
    readonly seeds: readonly string[],
    raw: string,
  ) {
    const snippet = truncateSnippet(raw) || "<empty reply>";
    super(`Batch translation parsed zero items. Reply snippet: ${snippet}`);
    this.name = "TranslationError";
    this.snippet = snippet;
  }
}

export class StallError extends Error {
  constructor(
    readonly topic: string,
    readonly rounds: number,
    readonly collected: number,
    readonly target: number,
  ) {
    super(
      `Generation for "${topic}" stalled after ${rounds} rounds with ${collected}/${target} unique items`,
    );
    this.name = "StallError";
  }
}

export class CapExceededError extends Error {
  readonly shortfall: number;

  constructor(
    readonly topic: string,
    readonly target: number,
    readonly collected: number,
    readonly rounds: number,
  ) {
    super(
      `Generation for "${topic}" is ${target - collected} items short of ${target} after ${rounds} rounds`,
    );
    this.name = "CapExceededError";
    this.shortfall = target - collected;
  }
}

export class GenerationCancelledError extends Error {
  constructor(
    readonly topic: string,
    readonly rounds: number,
  ) {
    super(`Generation for "${topic}" was cancelled after ${rounds} rounds`);
    this.name = "GenerationCancelledError";
  }
}

export class ProviderRequestError extends Error {
  readonly body: string;

  constructor(
    readonly provider: string,
    readonly status: number,
    body: string,
  ) {
    super(`${provider} request failed with status ${status}: ${truncateSnippet(body, 200)}`);
    this.name = "ProviderRequestError";
    this.body = truncateSnippet(body);
  }
}

export class MissingApiKeyError extends Error {
  constructor(readonly variable: string) {
    super(`${variable} is not configured`);
    this.name = "MissingApiKeyError";
  }
}

/** Bad command-line input; the CLI prints the message with its usage line. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
