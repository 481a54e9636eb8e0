import { createDefaultDependencies, reportFailure } from "./vocab/cli";
import { resolveConfigFromEnv } from "./vocab/config";
import { parseEnrichOptions } from "./vocab/options";
import { runEnrich } from "./vocab/pipeline";

const USAGE =
  "npm run vocab:enrich -- --table vocab.csv [--output enriched.csv] [--no-dictionary] " +
  "[--no-examples] [--overwrite-examples]";

async function main() {
  const options = parseEnrichOptions(process.argv.slice(2));
  const config = resolveConfigFromEnv();
  console.log("Starting table enrichment with config:", {
    table: options.table,
    dictionary: options.dictionary && !config.gptOnly,
    examples: options.examples,
    overwriteExamples: options.overwriteExamples,
    model: config.openAiModel,
  });

  const summary = await runEnrich(options, config, createDefaultDependencies(config));

  console.log(`Dictionary filled ${summary.enriched} rows.`);
  console.log(`Generated examples for ${summary.examplesAdded} rows.`);
  console.log(`Table written to ${summary.path}`);
}

main().catch(reportFailure("Enrichment", USAGE));
