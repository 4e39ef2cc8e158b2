import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateCentralitySnapshots1729250000000 implements MigrationInterface {
  name = "CreateCentralitySnapshots1729250000000";

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "centrality_snapshots" (
        "key" varchar(64) PRIMARY KEY,
        "season" varchar NOT NULL,
        "team" varchar NOT NULL,
        "rows" jsonb NOT NULL,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "IDX_centrality_snapshots_season_team" ON "centrality_snapshots" ("season", "team")`
    );
  }

  async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "centrality_snapshots"`);
  }
}
