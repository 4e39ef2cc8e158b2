import { CentralityEngine } from "./centrality";
import { SnapshotStore, snapshotKey } from "./snapshot-store";
import { CentralityRow, CombinedCentralityTable, PassingRecord } from "../types/passing";
import { describeError } from "../utils/result";
import { Logger } from "../utils/logger";

export class LeagueCentralityAggregator {
  constructor(
    private engine: CentralityEngine,
    private log: Logger,
    private store?: SnapshotStore
  ) {}

  /**
   * Runs the engine over every team, in map order, and concatenates the rows.
   * A team whose computation fails is logged and contributes nothing.
   */
  async aggregate(
    season: string,
    passingByTeam: ReadonlyMap<string, readonly PassingRecord[]>
  ): Promise<CombinedCentralityTable> {
    const table: CombinedCentralityTable = [];
    let failed = 0;

    for (const [team, records] of passingByTeam) {
      const rows = await this.teamRows(season, team, records);
      if (rows === null) {
        failed++;
        continue;
      }
      table.push(...rows);
    }

    this.log.info(
      `[Centrality] ${season}: ${table.length} rows from ${passingByTeam.size - failed}/${passingByTeam.size} teams`
    );
    return table;
  }

  private async teamRows(
    season: string,
    team: string,
    records: readonly PassingRecord[]
  ): Promise<CentralityRow[] | null> {
    const key = this.store ? snapshotKey(season, team, records) : undefined;
    if (this.store && key) {
      try {
        const cached = await this.store.find(key);
        if (cached) {
          this.log.debug(`[Centrality] ${team}: snapshot hit`);
          return cached;
        }
      } catch (err) {
        this.log.warn(`[Centrality] ${team}: snapshot lookup failed, recomputing: ${describeError(err)}`);
      }
    }

    const result = this.engine.computeTeam(team, records);
    if (!result.ok) {
      this.log.warn(`[Centrality] ${team} skipped (${result.failure.kind}): ${result.failure.message}`);
      return null;
    }

    if (this.store && key) {
      try {
        await this.store.save(key, season, team, result.value);
      } catch (err) {
        this.log.warn(`[Centrality] ${team}: snapshot save failed: ${describeError(err)}`);
      }
    }
    return result.value;
  }
}

/** Splits a combined table back into per-team tables, in first-seen team order. */
export function groupByTeam(table: readonly CentralityRow[]): Map<string, CentralityRow[]> {
  const groups = new Map<string, CentralityRow[]>();
  for (const row of table) {
    const group = groups.get(row.team);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.team, [row]);
    }
  }
  return groups;
}
