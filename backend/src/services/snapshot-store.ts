import { createHash } from "crypto";
import { Repository } from "typeorm";
import { CentralitySnapshot } from "../entity/CentralitySnapshot";
import { CentralityRow, PassingRecord } from "../types/passing";

export interface SnapshotStore {
  find(key: string): Promise<CentralityRow[] | null>;
  save(key: string, season: string, team: string, rows: CentralityRow[]): Promise<void>;
}

/**
 * Content address for one team's centrality: the same season, team and
 * passing records (in the same order) always hash to the same key.
 */
export const snapshotKey = (
  season: string,
  team: string,
  records: readonly PassingRecord[]
): string => {
  const canonical = JSON.stringify({
    season,
    team,
    records: records.map((r) => [r.passer_name, r.receiver_name, r.pass_count, r.team]),
  });
  return createHash("sha256").update(canonical).digest("hex");
};

export class TypeOrmSnapshotStore implements SnapshotStore {
  constructor(private repo: Repository<CentralitySnapshot>) {}

  async find(key: string): Promise<CentralityRow[] | null> {
    const snapshot = await this.repo.findOneBy({ key });
    return snapshot ? snapshot.rows : null;
  }

  async save(key: string, season: string, team: string, rows: CentralityRow[]): Promise<void> {
    await this.repo.upsert({ key, season, team, rows }, ["key"]);
  }
}
