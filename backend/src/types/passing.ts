export interface TeamInfo {
  abbreviation: string;
  id: number;
  name: string;
}

export interface RosterEntry {
  player_id: number;
  player_name: string;
}

export interface PassingRecord {
  passer_name: string;
  receiver_name: string;
  pass_count: number;
  team: string;
}

export interface CentralityRow {
  player: string;
  degree: number;
  betweenness: number;
  closeness: number;
  team: string;
}

export type CombinedCentralityTable = CentralityRow[];

export const METRICS = ["degree", "betweenness", "closeness"] as const;
export type Metric = (typeof METRICS)[number];

export interface ImbalanceResult {
  team: string;
  player: string;
  metric: Metric;
  spread: number;
  max: number;
  min: number;
}

export interface TeamSpread {
  team: string;
  spread: number;
  max: number;
  min: number;
}
