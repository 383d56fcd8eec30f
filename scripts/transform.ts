/**
 * Builds per-year hourly matrices and the combined multi-year matrix from the
 * yearly extracts.
 * Usage: npx tsx scripts/transform.ts [--input DIR] [--output DIR] [--years 2020,2021]
 */

import "./_loadEnv";
import { loadPipelineConfig, parseYearList } from "@/lib/config";
import { createStageLogger } from "@/lib/logging";
import { OUT_DIR, RAW_DIR } from "@/lib/paths";
import { runTransform } from "@/lib/pipeline/transform";
import { hasFlag, readFlag, readIntFlag } from "./_utils/cli";

const USAGE = "Usage: npx tsx scripts/transform.ts [--input DIR] [--output DIR] [--years 2020,2021] [--gap-fill-hours N]";

async function main() {
  const argv = process.argv.slice(2);
  if (hasFlag(argv, "help")) {
    console.log(USAGE);
    return;
  }

  const years = readFlag(argv, "years");
  const config = loadPipelineConfig(process.env, {
    years: years ? parseYearList(years) : undefined,
    gapFillMaxHours: readIntFlag(argv, "gap-fill-hours"),
  });
  const logger = createStageLogger("transform");

  const result = await runTransform(
    config,
    {
      inputDir: readFlag(argv, "input") || RAW_DIR,
      outputDir: readFlag(argv, "output") || OUT_DIR,
    },
    logger
  );

  for (const skipped of result.skippedFiles) {
    logger.warn(`skipped ${skipped.file}: ${skipped.reason}`);
  }
}

main().catch((err) => {
  console.error(`[transform] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
