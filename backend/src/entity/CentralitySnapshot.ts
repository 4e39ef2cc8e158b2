import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from "typeorm";
import { CentralityRow } from "../types/passing";

@Entity({ name: "centrality_snapshots" })
@Index("IDX_centrality_snapshots_season_team", ["season", "team"])
export class CentralitySnapshot {
  // sha256 over season, team and the team's passing records
  @PrimaryColumn({ type: "varchar", length: 64 })
  key!: string;

  @Column({ type: "varchar" })
  season!: string;

  @Column({ type: "varchar" })
  team!: string;

  @Column({ type: "jsonb" })
  rows!: CentralityRow[];

  @CreateDateColumn()
  createdAt!: Date;
}
