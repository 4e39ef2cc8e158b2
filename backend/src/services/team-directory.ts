import teams from "../../data/teams.json";
import { TeamInfo } from "../types/passing";

const defaultTeams: readonly TeamInfo[] = teams;

export class TeamDirectory {
  private byAbbreviation: Map<string, TeamInfo>;

  constructor(private teams: readonly TeamInfo[] = defaultTeams) {
    this.byAbbreviation = new Map(
      teams.map((team) => [team.abbreviation.toUpperCase(), team])
    );
  }

  resolve(abbreviation: string): TeamInfo | undefined {
    return this.byAbbreviation.get(abbreviation.trim().toUpperCase());
  }

  list(): TeamInfo[] {
    return [...this.teams];
  }
}
