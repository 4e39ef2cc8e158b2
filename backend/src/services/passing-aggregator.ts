import { PassingDataSource } from "./nba-stats";
import { TeamDirectory } from "./team-directory";
import { PassingRecord, RosterEntry, TeamInfo } from "../types/passing";
import { Result, ok, fail, describeError } from "../utils/result";
import { Logger } from "../utils/logger";
import { mapWithConcurrency } from "../utils/pool";

export class PassingAggregator {
  constructor(
    private source: PassingDataSource,
    private directory: TeamDirectory,
    private log: Logger,
    private teamConcurrency = 1
  ) {}

  /**
   * Collects every rostered player's passes-made rows into one table for the
   * team. A player whose lookup fails is logged and left out; only a missing
   * team or roster fails the whole team.
   */
  async aggregateTeam(
    abbreviation: string,
    season: string
  ): Promise<Result<PassingRecord[]>> {
    const team = this.directory.resolve(abbreviation);
    if (!team) {
      this.log.warn(`[Passing] Unknown team abbreviation: ${abbreviation}`);
      return fail("lookup", `Unknown team abbreviation: ${abbreviation}`);
    }

    let roster: RosterEntry[];
    try {
      roster = await this.source.getRoster(team.id, season);
    } catch (err) {
      this.log.error(
        `[Passing] Roster lookup failed for ${team.abbreviation} ${season}: ${describeError(err)}`
      );
      return fail("lookup", `Roster lookup failed for ${team.abbreviation}`, err);
    }

    const records: PassingRecord[] = [];
    for (const player of roster) {
      try {
        const rows = await this.source.getPassesMade(
          player.player_id,
          team.id,
          season
        );
        for (const row of rows) {
          records.push({ ...row, team: team.abbreviation });
        }
      } catch (err) {
        this.log.warn(
          `[Passing] Skipping ${player.player_name} (${player.player_id}) on ${team.abbreviation}: ${describeError(err)}`
        );
      }
    }

    this.log.info(
      `[Passing] ${team.abbreviation} ${season}: ${records.length} rows from ${roster.length} players`
    );
    return ok(records);
  }

  /**
   * Passing tables for every team, keyed by abbreviation in directory order.
   * A team that fails maps to an empty table.
   */
  async aggregateLeague(
    season: string,
    teams: TeamInfo[] = this.directory.list()
  ): Promise<Map<string, PassingRecord[]>> {
    const results = await mapWithConcurrency(
      teams,
      this.teamConcurrency,
      (team) => this.aggregateTeam(team.abbreviation, season)
    );

    const byTeam = new Map<string, PassingRecord[]>();
    teams.forEach((team, i) => {
      const result = results[i];
      if (!result.ok) {
        this.log.warn(
          `[Passing] ${team.abbreviation} contributes no rows: ${result.failure.message}`
        );
      }
      byTeam.set(team.abbreviation, result.ok ? result.value : []);
    });
    return byTeam;
  }
}
