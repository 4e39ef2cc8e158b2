import { UndirectedGraph } from "graphology";
import betweennessCentrality from "graphology-metrics/centrality/betweenness";
import closenessCentrality from "graphology-metrics/centrality/closeness";
import { CentralityRow, PassingRecord } from "../types/passing";
import { Result, ok, fail, describeError } from "../utils/result";
import { Logger, logger as defaultLogger } from "../utils/logger";

export type PassingGraph = UndirectedGraph;

const isWellFormed = (record: PassingRecord | null | undefined): boolean =>
  record != null &&
  typeof record.passer_name === "string" &&
  record.passer_name !== "" &&
  typeof record.receiver_name === "string" &&
  record.receiver_name !== "" &&
  typeof record.pass_count === "number" &&
  Number.isFinite(record.pass_count);

/**
 * Builds the team's undirected passing graph.
 *
 * Nodes are seeded from passers only; a player who never shows up in the
 * passer column enters the graph through edge insertion as a receiver.
 * Repeated passer/receiver pairs collapse into one edge and self-passes are
 * kept as self-loops.
 */
export function buildPassingGraph(records: readonly PassingRecord[]): PassingGraph {
  const graph = new UndirectedGraph();
  for (const record of records) {
    graph.mergeNode(record.passer_name);
  }
  for (const record of records) {
    graph.mergeEdge(record.passer_name, record.receiver_name);
  }
  return graph;
}

/** Same nodes, every edge except self-loops. */
export function withoutSelfLoops(graph: PassingGraph): PassingGraph {
  const simple = new UndirectedGraph();
  graph.forEachNode((node) => simple.addNode(node));
  graph.forEachEdge((_edge, _attributes, source, target) => {
    if (source !== target) simple.mergeEdge(source, target);
  });
  return simple;
}

/**
 * Degree, normalized betweenness and Wasserman-Faust closeness for every
 * node, in node insertion order. A single-node graph gets degree 0.
 * Self-loops count towards degree only; path-based measures ignore them.
 */
export function computeCentrality(graph: PassingGraph, team: string): CentralityRow[] {
  const n = graph.order;
  const paths = withoutSelfLoops(graph);
  const betweenness = betweennessCentrality(paths, { normalized: true });
  const closeness = closenessCentrality(paths, { wassermanFaust: true });

  return graph.mapNodes((player) => ({
    player,
    degree: n > 1 ? graph.degree(player) / (n - 1) : 0,
    betweenness: betweenness[player] ?? 0,
    closeness: closeness[player] ?? 0,
    team,
  }));
}

export class CentralityEngine {
  constructor(private log: Logger = defaultLogger) {}

  computeTeam(team: string, records: readonly PassingRecord[]): Result<CentralityRow[]> {
    if (records.length === 0) {
      this.log.warn(`[Centrality] ${team}: no passing records`);
      return fail("computation", `No passing records for ${team}`);
    }
    const malformed = records.findIndex((record) => !isWellFormed(record));
    if (malformed !== -1) {
      this.log.error(`[Centrality] ${team}: malformed record at index ${malformed}`);
      return fail("computation", `Malformed passing record at index ${malformed} for ${team}`);
    }

    try {
      const graph = buildPassingGraph(records);
      const rows = computeCentrality(graph, team);
      this.log.debug(
        `[Centrality] ${team}: ${graph.order} players, ${graph.size} passing links`
      );
      return ok(rows);
    } catch (err) {
      this.log.error(`[Centrality] ${team}: computation failed: ${describeError(err)}`);
      return fail("computation", `Centrality computation failed for ${team}`, err);
    }
  }
}
