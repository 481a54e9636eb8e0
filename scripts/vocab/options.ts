import { parseMergePolicy } from "./config";
import { UsageError } from "./errors";
import type { MergePolicyName } from "./merge";

export interface ParsedArgs {
  values: Map<string, string>;
  switches: Map<string, boolean>;
  positionals: string[];
}

export function parseBooleanOption(value: string | undefined): boolean {
  if (!value) {
    return true;
  }
  const normalised = value.trim().toLowerCase();
  if (!normalised || normalised === "true" || normalised === "1" || normalised === "yes") {
    return true;
  }
  if (normalised === "false" || normalised === "0" || normalised === "no") {
    return false;
  }
  return true;
}

/**
 * Accepts `--flag value`, `--flag=value`, bare `--switch` and `--no-switch`.
 * Anything after `--` is positional.
 */
export function parseArgv(argv: readonly string[], switchNames: readonly string[] = []): ParsedArgs {
  const switchSet = new Set(switchNames);
  const values = new Map<string, string>();
  const switches = new Map<string, boolean>();
  const positionals: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (raw === "--") {
      positionals.push(...argv.slice(index + 1));
      break;
    }
    if (!raw.startsWith("--")) {
      positionals.push(raw);
      continue;
    }

    const body = raw.slice(2);
    const equals = body.indexOf("=");
    const name = equals === -1 ? body : body.slice(0, equals);
    const inline = equals === -1 ? undefined : body.slice(equals + 1);

    if (switchSet.has(name)) {
      switches.set(name, parseBooleanOption(inline));
      continue;
    }
    if (inline === undefined && name.startsWith("no-") && switchSet.has(name.slice(3))) {
      switches.set(name.slice(3), false);
      continue;
    }
    if (inline !== undefined) {
      values.set(name, inline);
      continue;
    }

    const next = argv[index + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new UsageError(`Missing value for --${name}`);
    }
    values.set(name, next);
    index += 1;
  }

  return { values, switches, positionals };
}

function optionalInt(args: ParsedArgs, name: string): number | undefined {
  const raw = args.values.get(name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

function requiredValue(args: ParsedArgs, name: string, position?: number): string {
  const value = args.values.get(name) ?? (position === undefined ? undefined : args.positionals[position]);
  if (!value?.trim()) {
    throw new UsageError(`--${name} is required`);
  }
  return value.trim();
}

function optionalPolicy(args: ParsedArgs): MergePolicyName | undefined {
  const raw = args.values.get("policy");
  if (raw === undefined) {
    return undefined;
  }
  const policy = parseMergePolicy(raw);
  if (!policy) {
    throw new UsageError(
      `--policy must be one of fill-blank, prefer-incoming, conflict-aware; got "${raw}"`,
    );
  }
  return policy;
}

export interface ExtractCliOptions {
  input: string;
  table: string;
  paste: boolean;
  topK?: number;
  minFreq?: number;
  maxNgramLen?: number;
  allowPhrases: boolean;
  policy?: MergePolicyName;
}

export function parseExtractOptions(argv: readonly string[]): ExtractCliOptions {
  const args = parseArgv(argv, ["phrases", "paste"]);
  return {
    input: requiredValue(args, "input", 0),
    table: requiredValue(args, "table", 1),
    paste: args.switches.get("paste") ?? false,
    topK: optionalInt(args, "top-k"),
    minFreq: optionalInt(args, "min-freq"),
    maxNgramLen: optionalInt(args, "max-ngram"),
    allowPhrases: args.switches.get("phrases") ?? true,
    policy: optionalPolicy(args),
  } satisfies ExtractCliOptions;
}

export interface GenerateCliOptions {
  topic: string;
  count: number;
  table: string;
  gptOnly?: boolean;
  policy?: MergePolicyName;
}

export function parseGenerateOptions(argv: readonly string[]): GenerateCliOptions {
  const args = parseArgv(argv, ["gpt-only"]);
  const count = optionalInt(args, "count");
  if (count === undefined) {
    throw new UsageError("--count is required");
  }
  return {
    topic: requiredValue(args, "topic"),
    count,
    table: requiredValue(args, "table"),
    gptOnly: args.switches.get("gpt-only"),
    policy: optionalPolicy(args),
  } satisfies GenerateCliOptions;
}

export interface MergeCliOptions {
  target: string;
  source: string;
  output?: string;
  policy?: MergePolicyName;
}

export function parseMergeOptions(argv: readonly string[]): MergeCliOptions {
  const args = parseArgv(argv);
  return {
    target: requiredValue(args, "into", 0),
    source: requiredValue(args, "from", 1),
    output: args.values.get("output")?.trim() || undefined,
    policy: optionalPolicy(args),
  } satisfies MergeCliOptions;
}

export interface EnrichCliOptions {
  table: string;
  output?: string;
  dictionary: boolean;
  examples: boolean;
  overwriteExamples: boolean;
}

export function parseEnrichOptions(argv: readonly string[]): EnrichCliOptions {
  const args = parseArgv(argv, ["dictionary", "examples", "overwrite-examples"]);
  return {
    table: requiredValue(args, "table", 0),
    output: args.values.get("output")?.trim() || undefined,
    dictionary: args.switches.get("dictionary") ?? true,
    examples: args.switches.get("examples") ?? true,
    overwriteExamples: args.switches.get("overwrite-examples") ?? false,
  } satisfies EnrichCliOptions;
}

export interface TranslateCliOptions {
  input: string;
  table: string;
  policy?: MergePolicyName;
}

export function parseTranslateOptions(argv: readonly string[]): TranslateCliOptions {
  const args = parseArgv(argv);
  return {
    input: requiredValue(args, "input", 0),
    table: requiredValue(args, "table", 1),
    policy: optionalPolicy(args),
  } satisfies TranslateCliOptions;
}
