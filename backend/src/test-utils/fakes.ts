import { PassingDataSource } from "../services/nba-stats";
import { SnapshotStore } from "../services/snapshot-store";
import { TeamDirectory } from "../services/team-directory";
import { CentralityRow, PassingRecord, RosterEntry } from "../types/passing";
import { StatsApiError } from "../utils/result";

export type PassRow = Omit<PassingRecord, "team">;

/**
 * Roster and passes-made lookups served from maps. A team without a roster
 * or a player without passes fails the way the stats API does.
 */
export class FakePassingSource implements PassingDataSource {
  calls: string[] = [];

  constructor(
    private rosters: Map<number, RosterEntry[]>,
    private passes: Map<number, PassRow[]>,
    private delays: Map<number, number> = new Map()
  ) {}

  async getRoster(teamId: number, season: string): Promise<RosterEntry[]> {
    this.calls.push(`roster:${teamId}:${season}`);
    const delay = this.delays.get(teamId);
    if (delay) await new Promise((resolve) => setTimeout(resolve, delay));
    const roster = this.rosters.get(teamId);
    if (!roster) throw new StatsApiError("NBA API 500: Server Error", "commonteamroster", 500);
    return roster;
  }

  async getPassesMade(playerId: number, teamId: number, season: string): Promise<PassRow[]> {
    this.calls.push(`passes:${playerId}:${teamId}:${season}`);
    const rows = this.passes.get(playerId);
    if (!rows) throw new StatsApiError("Column PASS is not numeric", "playerdashptpass");
    return rows;
  }
}

export class InMemorySnapshotStore implements SnapshotStore {
  private snapshots = new Map<string, CentralityRow[]>();

  async find(key: string): Promise<CentralityRow[] | null> {
    const rows = this.snapshots.get(key);
    return rows ? rows.map((row) => ({ ...row })) : null;
  }

  async save(key: string, _season: string, _team: string, rows: CentralityRow[]): Promise<void> {
    this.snapshots.set(key, rows.map((row) => ({ ...row })));
  }

  get size(): number {
    return this.snapshots.size;
  }
}

/**
 * Two small teams: HUB runs everything through one player, TRI passes in a
 * triangle. NIL has no roster.
 */
export const sampleDirectory = new TeamDirectory([
  { abbreviation: "HUB", id: 1, name: "Hub City" },
  { abbreviation: "TRI", id: 2, name: "Triangle" },
  { abbreviation: "NIL", id: 3, name: "Nobody" },
]);

export const sampleLeagueSource = (): FakePassingSource =>
  new FakePassingSource(
    new Map([
      [
        1,
        [
          { player_id: 11, player_name: "Hub Player" },
          { player_id: 12, player_name: "Left Wing" },
          { player_id: 13, player_name: "Right Wing" },
        ],
      ],
      [
        2,
        [
          { player_id: 21, player_name: "Tri One" },
          { player_id: 22, player_name: "Tri Two" },
          { player_id: 23, player_name: "Tri Three" },
        ],
      ],
    ]),
    new Map([
      [
        11,
        [
          { passer_name: "Player, Hub", receiver_name: "Wing, Left", pass_count: 200 },
          { passer_name: "Player, Hub", receiver_name: "Wing, Right", pass_count: 180 },
        ],
      ],
      [12, [{ passer_name: "Wing, Left", receiver_name: "Player, Hub", pass_count: 150 }]],
      [13, [{ passer_name: "Wing, Right", receiver_name: "Player, Hub", pass_count: 140 }]],
      [21, [{ passer_name: "One, Tri", receiver_name: "Two, Tri", pass_count: 90 }]],
      [22, [{ passer_name: "Two, Tri", receiver_name: "Three, Tri", pass_count: 80 }]],
      [23, [{ passer_name: "Three, Tri", receiver_name: "One, Tri", pass_count: 70 }]],
    ])
  );
