import { groupByTeam } from "./league-centrality";
import {
  CentralityRow,
  ImbalanceResult,
  METRICS,
  Metric,
  TeamSpread,
} from "../types/passing";
import { InvalidArgumentError } from "../utils/result";

const isMetric = (value: string): value is Metric =>
  METRICS.some((metric) => metric === value);

export function parseMetric(selector: string): Metric {
  const normalized = selector.trim().toLowerCase();
  if (!isMetric(normalized)) {
    throw new InvalidArgumentError(
      `Unknown centrality metric "${selector}", expected one of ${METRICS.join(", ")}`
    );
  }
  return normalized;
}

/**
 * Spread (max - min) of the metric for every team, widest first. Teams with
 * equal spread keep their table order.
 */
export function rankTeamsBySpread(
  table: readonly CentralityRow[],
  selector: string
): TeamSpread[] {
  const metric = parseMetric(selector);
  const spreads: TeamSpread[] = [];
  for (const [team, rows] of groupByTeam(table)) {
    const values = rows.map((row) => row[metric]);
    const max = Math.max(...values);
    const min = Math.min(...values);
    spreads.push({ team, spread: max - min, max, min });
  }
  return spreads.sort((a, b) => b.spread - a.spread);
}

/**
 * The team whose players differ most on `selector`, and that team's top
 * player. Ties go to whichever team, and then player, comes first.
 * Returns null for an empty table.
 */
export function findMostImbalancedTeam(
  table: readonly CentralityRow[],
  selector: string
): ImbalanceResult | null {
  const metric = parseMetric(selector);
  const [widest] = rankTeamsBySpread(table, metric);
  if (!widest) return null;

  const players = table
    .filter((row) => row.team === widest.team)
    .sort((a, b) => b[metric] - a[metric]);

  return {
    team: widest.team,
    player: players[0].player,
    metric,
    spread: widest.spread,
    max: widest.max,
    min: widest.min,
  };
}
