import { PassingAggregator } from "./passing-aggregator";
import { CentralityEngine } from "./centrality";
import { LeagueCentralityAggregator } from "./league-centrality";
import { findMostImbalancedTeam } from "./imbalance";
import { exportCentralityCsv } from "./export";
import { PassingDataSource } from "./nba-stats";
import { TeamDirectory } from "./team-directory";
import { SnapshotStore } from "./snapshot-store";
import {
  CombinedCentralityTable,
  ImbalanceResult,
  Metric,
  TeamInfo,
} from "../types/passing";
import { createRunLogger, Logger, logger as defaultLogger } from "../utils/logger";

export interface PipelineOptions {
  source: PassingDataSource;
  directory?: TeamDirectory;
  store?: SnapshotStore;
  teamConcurrency?: number;
  exportPath?: string;
  logger?: Logger;
}

export interface PipelineRun {
  runId: string;
  season: string;
  table: CombinedCentralityTable;
  imbalance: Record<Metric, ImbalanceResult | null>;
  exportedTo?: string;
}

/**
 * fetch → graph → centrality → imbalance for one season. Every run starts
 * from scratch; only the optional snapshot store outlives it.
 */
export class CentralityPipeline {
  readonly directory: TeamDirectory;

  constructor(private options: PipelineOptions) {
    this.directory = options.directory ?? new TeamDirectory();
  }

  async run(season: string, teams?: TeamInfo[]): Promise<PipelineRun> {
    const { runId, log } = createRunLogger(undefined, this.options.logger ?? defaultLogger);
    const started = Date.now();
    log.info(`[Pipeline] Starting run for season ${season}`);

    const passing = new PassingAggregator(
      this.options.source,
      this.directory,
      log,
      this.options.teamConcurrency
    );
    const league = new LeagueCentralityAggregator(
      new CentralityEngine(log),
      log,
      this.options.store
    );

    const passingByTeam = await passing.aggregateLeague(season, teams);
    const table = await league.aggregate(season, passingByTeam);

    const imbalance: Record<Metric, ImbalanceResult | null> = {
      degree: findMostImbalancedTeam(table, "degree"),
      betweenness: findMostImbalancedTeam(table, "betweenness"),
      closeness: findMostImbalancedTeam(table, "closeness"),
    };

    let exportedTo: string | undefined;
    if (this.options.exportPath) {
      exportedTo = await exportCentralityCsv(table, this.options.exportPath);
      log.info(`[Pipeline] Exported ${table.length} rows to ${exportedTo}`);
    }

    log.info(`[Pipeline] Finished season ${season} in ${Date.now() - started}ms`);
    return { runId, season, table, imbalance, exportedTo };
  }
}
