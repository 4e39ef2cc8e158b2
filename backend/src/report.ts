import "reflect-metadata";
import { AppDataSource, configWarnings, settings } from "./config";
import { createPipeline, createSnapshotStore } from "./app";
import { PipelineRun } from "./services/pipeline";
import { METRICS } from "./types/passing";
import { logger } from "./utils/logger";

export const formatReport = (run: PipelineRun): string[] => {
  const lines = [`Season ${run.season}: ${run.table.length} player rows`];
  for (const metric of METRICS) {
    const result = run.imbalance[metric];
    lines.push(
      result
        ? `${metric}: ${result.team} is the most unequal (spread ${result.spread.toFixed(3)}), led by ${result.player}`
        : `${metric}: no data`
    );
  }
  if (run.exportedTo) lines.push(`Exported to ${run.exportedTo}`);
  return lines;
};

async function main() {
  configWarnings.forEach((warning) => logger.warn(`[Config] ${warning}`));
  const season = process.argv[2] ?? settings.season;
  const store = await createSnapshotStore();
  try {
    const run = await createPipeline(store, settings.exportPath).run(season);
    formatReport(run).forEach((line) => console.log(line));
  } finally {
    if (AppDataSource.isInitialized) await AppDataSource.destroy();
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error("Report failed:", err);
    process.exitCode = 1;
  });
}
