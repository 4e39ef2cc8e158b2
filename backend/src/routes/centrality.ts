import { Router, Request, Response, NextFunction } from "express";
import { CentralityPipeline, PipelineRun } from "../services/pipeline";
import { findMostImbalancedTeam, parseMetric, rankTeamsBySpread } from "../services/imbalance";
import { InvalidArgumentError } from "../utils/result";

const readSeason = (req: Request, fallback: string): string =>
  typeof req.query.season === "string" && req.query.season !== ""
    ? req.query.season
    : fallback;

export interface CentralityRouteOptions {
  maxCachedRuns?: number;
}

export const DEFAULT_MAX_CACHED_RUNS = 4;

export function centralityRoutes(
  pipeline: CentralityPipeline,
  defaultSeason: string,
  { maxCachedRuns = DEFAULT_MAX_CACHED_RUNS }: CentralityRouteOptions = {}
): Router {
  const router = Router();
  // Runs by season, oldest first. Empty or failed runs are
  // dropped once they settle so the next request fetches again.
  const runs = new Map<string, Promise<PipelineRun>>();

  const forget = (season: string, run: Promise<PipelineRun>) => {
    if (runs.get(season) === run) runs.delete(season);
  };

  const runFor = (season: string): Promise<PipelineRun> => {
    const cached = runs.get(season);
    if (cached) return cached;

    const run: Promise<PipelineRun> = pipeline.run(season).then((result) => {
      if (result.table.length === 0) forget(season, run);
      return result;
    });
    runs.set(season, run);
    void run.catch(() => forget(season, run));

    while (runs.size > maxCachedRuns) {
      const oldest = runs.keys().next().value;
      if (oldest === undefined) break;
      runs.delete(oldest);
    }
    return run;
  };

  // GET /api/centrality?season=2023-24
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const run = await runFor(readSeason(req, defaultSeason));
      res.json({ runId: run.runId, season: run.season, rows: run.table });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/centrality/imbalance?metric=DEGREE&season=2023-24
  router.get("/imbalance", async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (typeof req.query.metric !== "string") {
        throw new InvalidArgumentError("Missing required query param: metric");
      }
      // reject bad selectors before kicking off a run
      const metric = parseMetric(req.query.metric);
      const run = await runFor(readSeason(req, defaultSeason));
      const result = findMostImbalancedTeam(run.table, metric);
      if (!result) {
        res.status(404).json({ error: `No centrality data for ${run.season}` });
        return;
      }
      res.json({ ...result, ranking: rankTeamsBySpread(run.table, metric) });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/centrality/teams/BOS?season=2023-24
  router.get("/teams/:abbreviation", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const team = pipeline.directory.resolve(req.params.abbreviation);
      if (!team) {
        res.status(404).json({ error: "Team not found" });
        return;
      }
      const run = await runFor(readSeason(req, defaultSeason));
      res.json({
        team: team.abbreviation,
        season: run.season,
        rows: run.table.filter((row) => row.team === team.abbreviation),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
