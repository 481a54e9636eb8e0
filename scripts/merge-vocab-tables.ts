import { printTableUpdate, reportFailure } from "./vocab/cli";
import { resolveConfigFromEnv } from "./vocab/config";
import { parseMergeOptions } from "./vocab/options";
import { runMerge } from "./vocab/pipeline";

const USAGE =
  "npm run vocab:merge -- --into vocab.csv --from incoming.csv [--output merged.csv] " +
  "[--policy fill-blank|prefer-incoming|conflict-aware]";

async function main() {
  const options = parseMergeOptions(process.argv.slice(2));
  const config = resolveConfigFromEnv();
  console.log(`Merging ${options.source} into ${options.target} (${options.policy ?? config.mergePolicy})`);

  const update = await runMerge(options, config);
  printTableUpdate(update);
}

main().catch(reportFailure("Table merge", USAGE));
