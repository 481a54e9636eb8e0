import { log } from "@shared/logger";

import { createDefaultDependencies, printTableUpdate, reportFailure } from "./vocab/cli";
import { resolveConfigFromEnv } from "./vocab/config";
import { parseGenerateOptions } from "./vocab/options";
import { runGenerate } from "./vocab/pipeline";

const USAGE =
  'npm run vocab:generate -- --topic "Economics" --count 30 --table vocab.csv [--gpt-only] ' +
  "[--policy fill-blank]";

async function main() {
  const options = parseGenerateOptions(process.argv.slice(2));
  const config = resolveConfigFromEnv();
  log(
    `Generating ${options.count} items for "${options.topic}" with ${config.openAiModel} ` +
      `(round cap ${config.roundCap}, stall after ${config.stallRounds})`,
    "generate",
  );

  const controller = new AbortController();
  process.once("SIGINT", () => {
    log("Cancelling after the current round…", "generate");
    controller.abort();
  });

  const update = await runGenerate(
    options,
    config,
    createDefaultDependencies(config),
    controller.signal,
  );
  printTableUpdate(update);
}

main().catch(reportFailure("Topic generation", USAGE));
