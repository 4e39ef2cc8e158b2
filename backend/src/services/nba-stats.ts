import { StatsApiClient, StatsRow } from "./stats-client";
import { PassingRecord, RosterEntry } from "../types/passing";
import { StatsApiError } from "../utils/result";

/**
 * Where rosters and per-player pass aggregates come from. The HTTP version
 * talks to stats.nba.com; tests hand the aggregators an in-memory one.
 */
export interface PassingDataSource {
  getRoster(teamId: number, season: string): Promise<RosterEntry[]>;
  getPassesMade(
    playerId: number,
    teamId: number,
    season: string
  ): Promise<Omit<PassingRecord, "team">[]>;
}

const readString = (row: StatsRow, column: string, endpoint: string): string => {
  const value = row[column];
  if (typeof value !== "string" || value.trim() === "") {
    throw new StatsApiError(`Column ${column} missing or empty`, endpoint);
  }
  return value;
};

const readNumber = (row: StatsRow, column: string, endpoint: string): number => {
  const value = row[column];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new StatsApiError(`Column ${column} is not numeric`, endpoint);
  }
  return value;
};

export const parseRosterRows = (rows: StatsRow[]): RosterEntry[] =>
  rows.map((row) => ({
    player_id: readNumber(row, "PLAYER_ID", "commonteamroster"),
    player_name: readString(row, "PLAYER", "commonteamroster"),
  }));

export const parsePassesMadeRows = (
  rows: StatsRow[]
): Omit<PassingRecord, "team">[] =>
  rows.map((row) => ({
    passer_name: readString(row, "PLAYER_NAME_LAST_FIRST", "playerdashptpass"),
    receiver_name: readString(row, "PASS_TO", "playerdashptpass"),
    pass_count: readNumber(row, "PASS", "playerdashptpass"),
  }));

export class NbaStatsSource implements PassingDataSource {
  constructor(private client: StatsApiClient) {}

  async getRoster(teamId: number, season: string): Promise<RosterEntry[]> {
    const rows = await this.client.getResultSet(
      "commonteamroster",
      { LeagueID: "00", Season: season, TeamID: String(teamId) },
      "CommonTeamRoster"
    );
    return parseRosterRows(rows);
  }

  async getPassesMade(
    playerId: number,
    teamId: number,
    season: string
  ): Promise<Omit<PassingRecord, "team">[]> {
    // the endpoint 400s unless every filter is present, even when empty
    const rows = await this.client.getResultSet(
      "playerdashptpass",
      {
        DateFrom: "",
        DateTo: "",
        GameSegment: "",
        LastNGames: "0",
        LeagueID: "00",
        Location: "",
        Month: "0",
        OpponentTeamID: "0",
        Outcome: "",
        PORound: "0",
        PerMode: "Totals",
        Period: "0",
        PlayerID: String(playerId),
        Season: season,
        SeasonSegment: "",
        SeasonType: "Regular Season",
        TeamID: String(teamId),
        VsConference: "",
        VsDivision: "",
      },
      "PassesMade"
    );
    return parsePassesMadeRows(rows);
  }
}
