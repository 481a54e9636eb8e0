import { createDefaultDependencies, printTableUpdate, reportFailure } from "./vocab/cli";
import { resolveConfigFromEnv } from "./vocab/config";
import { parseTranslateOptions } from "./vocab/options";
import { runTranslate } from "./vocab/pipeline";

const USAGE =
  "npm run vocab:translate -- --input seeds.txt --table vocab.csv " +
  "[--policy fill-blank|prefer-incoming|conflict-aware]";

async function main() {
  const options = parseTranslateOptions(process.argv.slice(2));
  const config = resolveConfigFromEnv();
  console.log(`Translating English seeds from ${options.input} with ${config.openAiModel}`);

  const update = await runTranslate(options, config, createDefaultDependencies(config));
  printTableUpdate(update);
}

main().catch(reportFailure("Translation", USAGE));
