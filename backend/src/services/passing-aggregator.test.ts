import { PassingAggregator } from "./passing-aggregator";
import { TeamDirectory } from "./team-directory";
import { RosterEntry } from "../types/passing";
import { StatsApiError } from "../utils/result";
import { createSilentLogger } from "../utils/logger";
import { FakePassingSource, PassRow } from "../test-utils/fakes";

const directory = new TeamDirectory([
  { abbreviation: "AAA", id: 1, name: "Alpha" },
  { abbreviation: "BBB", id: 2, name: "Bravo" },
  { abbreviation: "CCC", id: 3, name: "Charlie" },
]);

const rosters = new Map<number, RosterEntry[]>([
  [
    1,
    [
      { player_id: 11, player_name: "Ace One" },
      { player_id: 12, player_name: "Ace Two" },
      { player_id: 13, player_name: "Ace Three" },
    ],
  ],
  [2, [{ player_id: 21, player_name: "Bee One" }]],
]);

const passes = new Map<number, PassRow[]>([
  [
    11,
    [
      { passer_name: "One, Ace", receiver_name: "Two, Ace", pass_count: 120 },
      { passer_name: "One, Ace", receiver_name: "Three, Ace", pass_count: 40 },
    ],
  ],
  [12, [{ passer_name: "Two, Ace", receiver_name: "One, Ace", pass_count: 95 }]],
  [21, [{ passer_name: "One, Bee", receiver_name: "Two, Bee", pass_count: 7 }]],
]);

describe("PassingAggregator", () => {
  const log = createSilentLogger();

  test("merges every player's rows and tags them with the team", async () => {
    const source = new FakePassingSource(rosters, passes);
    const result = await new PassingAggregator(source, directory, log).aggregateTeam("aaa", "2022-23");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual([
      { passer_name: "One, Ace", receiver_name: "Two, Ace", pass_count: 120, team: "AAA" },
      { passer_name: "One, Ace", receiver_name: "Three, Ace", pass_count: 40, team: "AAA" },
      { passer_name: "Two, Ace", receiver_name: "One, Ace", pass_count: 95, team: "AAA" },
    ]);
    // player 13's lookup fails and is skipped, in roster order
    expect(source.calls).toEqual([
      "roster:1:2022-23",
      "passes:11:1:2022-23",
      "passes:12:1:2022-23",
      "passes:13:1:2022-23",
    ]);
  });

  test("fails an unknown team without calling the source", async () => {
    const source = new FakePassingSource(rosters, passes);
    const result = await new PassingAggregator(source, directory, log).aggregateTeam("ZZZ", "2022-23");

    expect(result).toEqual({
      ok: false,
      failure: { kind: "lookup", message: "Unknown team abbreviation: ZZZ", cause: undefined },
    });
    expect(source.calls).toEqual([]);
  });

  test("fails the team when its roster can't be fetched", async () => {
    const result = await new PassingAggregator(
      new FakePassingSource(rosters, passes),
      directory,
      log
    ).aggregateTeam("CCC", "2022-23");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe("lookup");
    expect(result.failure.cause).toBeInstanceOf(StatsApiError);
  });

  test("maps every team in directory order, failed teams to empty tables", async () => {
    const source = new FakePassingSource(rosters, passes, new Map([[1, 30]]));
    const league = await new PassingAggregator(source, directory, log, 3).aggregateLeague("2022-23");

    expect([...league.keys()]).toEqual(["AAA", "BBB", "CCC"]);
    expect(league.get("AAA")).toHaveLength(3);
    expect(league.get("BBB")).toEqual([
      { passer_name: "One, Bee", receiver_name: "Two, Bee", pass_count: 7, team: "BBB" },
    ]);
    expect(league.get("CCC")).toEqual([]);
  });

  test("fetches one team at a time by default", async () => {
    const source = new FakePassingSource(rosters, passes);
    await new PassingAggregator(source, directory, log).aggregateLeague("2022-23", directory.list().slice(0, 2));

    expect(source.calls).toEqual([
      "roster:1:2022-23",
      "passes:11:1:2022-23",
      "passes:12:1:2022-23",
      "passes:13:1:2022-23",
      "roster:2:2022-23",
      "passes:21:2:2022-23",
    ]);
  });
});
