/**
 * Normalizes the combined matrix with z-scores from the training years only.
 * Usage: npx tsx scripts/normalize.ts [--input FILE] [--output DIR] [--train-start 2020] [--train-end 2022] [--params FILE]
 */

import "./_loadEnv";
import path from "path";
import { loadPipelineConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";
import { createStageLogger } from "@/lib/logging";
import { OUT_DIR } from "@/lib/paths";
import { runNormalize } from "@/lib/pipeline/normalize";
import { findCombinedMatrixFile } from "@/lib/storage/matrixCsv";
import { hasFlag, readFlag, readIntFlag } from "./_utils/cli";

const USAGE =
  "Usage: npx tsx scripts/normalize.ts [--input FILE] [--output DIR] [--train-start Y] [--train-end Y] [--params FILE]";

async function main() {
  const argv = process.argv.slice(2);
  if (hasFlag(argv, "help")) {
    console.log(USAGE);
    return;
  }

  const config = loadPipelineConfig(process.env, {
    trainingWindow: {
      startYear: readIntFlag(argv, "train-start"),
      endYear: readIntFlag(argv, "train-end"),
    },
  });
  const outputDir = readFlag(argv, "output") || OUT_DIR;
  const inputFile = readFlag(argv, "input") || (await findCombinedMatrixFile(OUT_DIR));
  if (!inputFile) {
    throw new ConfigError(`No combined matrix in ${OUT_DIR}; run transform first or pass --input`);
  }
  const storedParams = readFlag(argv, "params");

  await runNormalize(
    config,
    {
      inputFile: path.resolve(inputFile),
      outputDir,
      paramsFile: storedParams ? path.resolve(storedParams) : undefined,
    },
    createStageLogger("normalize")
  );
}

main().catch((err) => {
  console.error(`[normalize] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
