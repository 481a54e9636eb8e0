import { logError } from "@shared/logger";

import type { CollectorConfig } from "./config";
import { UsageError } from "./errors";
import type { PipelineDependencies, TableUpdate } from "./pipeline";
import { createJishoDictionary, createOpenAiChatClient } from "./providers";
import { createKuromojiTokenizer } from "./tokenizer";

export function createDefaultDependencies(config: CollectorConfig): PipelineDependencies {
  return {
    client: () =>
      createOpenAiChatClient({
        apiKey: config.openAiApiKey,
        model: config.openAiModel,
        temperature: config.temperature,
      }),
    dictionary: () => createJishoDictionary(),
    tokenizer: () => createKuromojiTokenizer(),
  };
}

export function printTableUpdate(update: TableUpdate): void {
  const { merge } = update;
  console.log(`Wrote ${merge.rows.length} rows to ${update.path}.`);
  console.log(`Added ${merge.added} new rows, updated ${merge.updated} existing rows.`);
  if (merge.addedKeys.length) {
    const preview = merge.addedKeys
      .slice(0, 10)
      .map((key) => (key.reading ? `${key.term} (${key.reading})` : key.term))
      .join(", ");
    const more = merge.addedKeys.length > 10 ? `, … ${merge.addedKeys.length - 10} more` : "";
    console.log(`New: ${preview}${more}`);
  }
}

export function reportFailure(label: string, usage: string): (error: unknown) => void {
  return (error) => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\nUsage: ${usage}`);
    } else {
      console.error(`${label} failed:`, error instanceof Error ? error.message : error);
      logError(error, "cli");
    }
    process.exitCode = 1;
  };
}
