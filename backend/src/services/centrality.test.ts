import { CentralityEngine, buildPassingGraph, computeCentrality } from "./centrality";
import { CentralityRow, PassingRecord } from "../types/passing";
import { createSilentLogger } from "../utils/logger";

const pass = (passer: string, receiver: string, count = 1, team = "TST"): PassingRecord => ({
  passer_name: passer,
  receiver_name: receiver,
  pass_count: count,
  team,
});

const byPlayer = (rows: CentralityRow[]) => new Map(rows.map((row) => [row.player, row]));

describe("buildPassingGraph", () => {
  test("seeds passers first and lets receivers in through edges", () => {
    const graph = buildPassingGraph([pass("Xavier", "Yusuf"), pass("Zane", "Xavier")]);
    expect(graph.nodes()).toEqual(["Xavier", "Zane", "Yusuf"]);
  });

  test("collapses repeated and reversed pairs into one edge", () => {
    const graph = buildPassingGraph([pass("A", "B", 5), pass("B", "A", 3), pass("A", "B", 2)]);
    expect(graph.order).toBe(2);
    expect(graph.size).toBe(1);
  });

  test("keeps self-passes as self-loops", () => {
    const graph = buildPassingGraph([pass("A", "A"), pass("A", "B")]);
    expect(graph.hasEdge("A", "A")).toBe(true);
    expect(graph.order).toBe(2);
  });
});

describe("computeCentrality", () => {
  test("a single passing pair gives both players full degree", () => {
    const rows = computeCentrality(buildPassingGraph([pass("A", "B", 5)]), "TST");
    expect(rows).toHaveLength(2);
    rows.forEach((row) => {
      expect(row.degree).toBe(1);
      expect(row.betweenness).toBe(0);
      expect(row.closeness).toBeCloseTo(1);
    });
  });

  test("a star puts the hub on every shortest path", () => {
    const rows = byPlayer(
      computeCentrality(
        buildPassingGraph([pass("Hub", "S1"), pass("Hub", "S2"), pass("Hub", "S3")]),
        "TST"
      )
    );

    expect(rows.get("Hub")?.degree).toBe(1);
    expect(rows.get("Hub")?.betweenness).toBeCloseTo(1);
    expect(rows.get("Hub")?.closeness).toBeCloseTo(1);
    for (const spoke of ["S1", "S2", "S3"]) {
      expect(rows.get(spoke)?.degree).toBeCloseTo(1 / 3);
      expect(rows.get(spoke)?.betweenness).toBe(0);
      // distances 1 + 2 + 2
      expect(rows.get(spoke)?.closeness).toBeCloseTo(3 / 5);
    }
  });

  test("everyone in a fully connected team has closeness 1", () => {
    const players = ["A", "B", "C", "D"];
    const records = players.flatMap((p, i) => players.slice(i + 1).map((q) => pass(p, q)));
    const rows = computeCentrality(buildPassingGraph(records), "TST");

    expect(rows).toHaveLength(4);
    rows.forEach((row) => {
      expect(row.closeness).toBeCloseTo(1);
      expect(row.degree).toBe(1);
      expect(row.betweenness).toBe(0);
    });
  });

  test("disconnected groups get scaled closeness instead of an error", () => {
    const rows = computeCentrality(buildPassingGraph([pass("A", "B"), pass("C", "D")]), "TST");

    expect(rows.map((row) => row.player)).toEqual(["A", "C", "B", "D"]);
    rows.forEach((row) => {
      expect(row.closeness).toBeGreaterThanOrEqual(0);
      expect(row.closeness).toBeLessThanOrEqual(1);
      // one reachable player out of three others
      expect(row.closeness).toBeCloseTo(1 / 3);
      expect(row.degree).toBeCloseTo(1 / 3);
    });
  });

  test("a lone player gets degree 0", () => {
    const rows = computeCentrality(buildPassingGraph([pass("Solo", "Solo")]), "TST");
    expect(rows).toHaveLength(1);
    expect(rows[0].player).toBe("Solo");
    expect(rows[0].degree).toBe(0);
  });

  test("a self-pass raises degree but leaves paths alone", () => {
    const plain = byPlayer(computeCentrality(buildPassingGraph([pass("A", "B"), pass("B", "C")]), "TST"));
    const looped = byPlayer(
      computeCentrality(buildPassingGraph([pass("A", "B"), pass("B", "C"), pass("A", "A")]), "TST")
    );

    expect(plain.get("B")?.betweenness).toBeCloseTo(1);
    expect(plain.get("C")?.closeness).toBeCloseTo(2 / 3);
    for (const player of ["A", "B", "C"]) {
      expect(looped.get(player)?.betweenness).toBe(plain.get(player)?.betweenness);
      expect(looped.get(player)?.closeness).toBe(plain.get(player)?.closeness);
    }
    expect(looped.get("A")?.degree).toBeGreaterThan(plain.get("A")?.degree ?? 0);
    expect(looped.get("B")?.degree).toBe(1);
  });

  test("emits exactly one row per node, all labelled with the team", () => {
    const graph = buildPassingGraph([pass("A", "B"), pass("B", "C"), pass("A", "C"), pass("C", "D")]);
    const rows = computeCentrality(graph, "BOS");

    expect(rows.map((row) => row.player).sort()).toEqual([...graph.nodes()].sort());
    expect(new Set(rows.map((row) => row.team))).toEqual(new Set(["BOS"]));
  });
});

describe("CentralityEngine", () => {
  const engine = new CentralityEngine(createSilentLogger());

  test("returns the team's rows", () => {
    const result = engine.computeTeam("TST", [pass("A", "B"), pass("B", "C")]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((row) => [row.player, row.degree])).toEqual([
      ["A", 0.5],
      ["B", 1],
      ["C", 0.5],
    ]);
  });

  test("gives identical rows when run twice on the same records", () => {
    const records = [pass("A", "B"), pass("B", "C"), pass("C", "D"), pass("D", "A"), pass("A", "C")];
    expect(engine.computeTeam("TST", records)).toEqual(engine.computeTeam("TST", records));
  });

  test("fails on empty input", () => {
    const result = engine.computeTeam("TST", []);
    expect(result).toEqual({
      ok: false,
      failure: { kind: "computation", message: "No passing records for TST", cause: undefined },
    });
  });

  test("fails on a null row from an untyped caller", () => {
    const records: PassingRecord[] = JSON.parse(
      '[{"passer_name":"A","receiver_name":"B","pass_count":3,"team":"TST"},null]'
    );
    const result = engine.computeTeam("TST", records);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.message).toBe("Malformed passing record at index 1 for TST");
  });

  test("fails on a malformed record without throwing", () => {
    const result = engine.computeTeam("TST", [pass("A", "B"), pass("B", "C", Number.NaN)]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe("computation");
    expect(result.failure.message).toBe("Malformed passing record at index 1 for TST");
  });
});
