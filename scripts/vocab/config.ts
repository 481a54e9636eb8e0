import type { MergePolicyName } from "./merge";
import { DEFAULT_ROUND_CAP, DEFAULT_STALL_ROUNDS } from "./generator";

export interface CollectorConfig {
  openAiApiKey?: string;
  openAiModel: string;
  temperature: number;
  roundCap: number;
  stallRounds: number;
  retryBaseDelayMs: number;
  retryStepDelayMs: number;
  exampleBatchSize: number;
  gptOnly: boolean;
  mergePolicy: MergePolicyName;
}

const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.4;
const DEFAULT_RETRY_BASE_DELAY_MS = 0;
const DEFAULT_RETRY_STEP_DELAY_MS = 200;
const DEFAULT_EXAMPLE_BATCH_SIZE = 20;

export function resolveConfigFromEnv(
  overrides: Partial<CollectorConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): CollectorConfig {
  const envApiKey = env.OPENAI_API_KEY?.trim();

  return {
    openAiApiKey: overrides.openAiApiKey ?? (envApiKey ? envApiKey : undefined),
    openAiModel: overrides.openAiModel ?? (env.OPENAI_MODEL?.trim() || DEFAULT_OPENAI_MODEL),
    temperature: overrides.temperature ?? parseTemperature(env.OPENAI_TEMPERATURE, DEFAULT_TEMPERATURE),
    roundCap: overrides.roundCap ?? parsePositiveInt(env.TOPIC_ROUND_CAP, DEFAULT_ROUND_CAP),
    stallRounds: overrides.stallRounds ?? parsePositiveInt(env.TOPIC_STALL_ROUNDS, DEFAULT_STALL_ROUNDS),
    retryBaseDelayMs:
      overrides.retryBaseDelayMs ?? parseNonNegativeInt(env.RETRY_BASE_DELAY_MS, DEFAULT_RETRY_BASE_DELAY_MS),
    retryStepDelayMs:
      overrides.retryStepDelayMs ?? parseNonNegativeInt(env.RETRY_STEP_DELAY_MS, DEFAULT_RETRY_STEP_DELAY_MS),
    exampleBatchSize:
      overrides.exampleBatchSize ?? parsePositiveInt(env.EXAMPLE_BATCH_SIZE, DEFAULT_EXAMPLE_BATCH_SIZE),
    gptOnly: overrides.gptOnly ?? parseBoolean(env.GPT_ONLY, false),
    mergePolicy: overrides.mergePolicy ?? parseMergePolicy(env.MERGE_POLICY) ?? "fill-blank",
  };
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function parseTemperature(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 2 ? parsed : fallback;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalised = value.trim().toLowerCase();
  if (["1", "true", "yes", "y"].includes(normalised)) return true;
  if (["0", "false", "no", "n"].includes(normalised)) return false;
  return fallback;
}

export function parseMergePolicy(value: string | undefined): MergePolicyName | undefined {
  switch (value?.trim().toLowerCase().replace(/_/g, "-")) {
    case "fill-blank":
    case "fill":
      return "fill-blank";
    case "prefer-incoming":
    case "overwrite":
      return "prefer-incoming";
    case "conflict-aware":
    case "conflict":
      return "conflict-aware";
    default:
      return undefined;
  }
}
