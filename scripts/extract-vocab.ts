import { log } from "@shared/logger";

import { createDefaultDependencies, printTableUpdate, reportFailure } from "./vocab/cli";
import { resolveConfigFromEnv } from "./vocab/config";
import { parseExtractOptions } from "./vocab/options";
import { runExtract } from "./vocab/pipeline";

const USAGE =
  "npm run vocab:extract -- --input notes.txt --table vocab.csv [--top-k 80] [--min-freq 2] " +
  "[--max-ngram 3] [--no-phrases] [--paste] [--policy fill-blank]";

async function main() {
  const options = parseExtractOptions(process.argv.slice(2));
  const config = resolveConfigFromEnv();
  log(`Extracting candidates from ${options.input}${options.paste ? " (pasted list)" : ""}`, "extract");

  const update = await runExtract(options, config, createDefaultDependencies(config));
  printTableUpdate(update);
}

main().catch(reportFailure("Candidate extraction", USAGE));
