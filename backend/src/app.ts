import "reflect-metadata";
import express from "express";
import { AppDataSource, configWarnings, settings } from "./config";
import { CentralityRouteOptions, centralityRoutes } from "./routes/centrality";
import { CentralityPipeline } from "./services/pipeline";
import { StatsApiClient } from "./services/stats-client";
import { NbaStatsSource } from "./services/nba-stats";
import { SnapshotStore, TypeOrmSnapshotStore } from "./services/snapshot-store";
import { CentralitySnapshot } from "./entity/CentralitySnapshot";
import { InvalidArgumentError } from "./utils/result";
import { logger } from "./utils/logger";

export function createApp(
  pipeline: CentralityPipeline,
  defaultSeason: string,
  routeOptions: CentralityRouteOptions = {}
) {
  const app = express();
  app.use(express.json());

  // Log all REST requests
  app.use((req, res, next) => {
    logger.info(`[REST] ${req.method} ${req.path} query=${JSON.stringify(req.query)}`);
    const start = Date.now();
    res.on("finish", () => {
      logger.info(
        `[REST] ${req.method} ${req.path} -> ${res.statusCode} (${Date.now() - start}ms)`
      );
    });
    next();
  });

  app.use("/api/centrality", centralityRoutes(pipeline, defaultSeason, routeOptions));

  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (err instanceof InvalidArgumentError) {
        res.status(400).json({ error: err.message });
        return;
      }
      logger.error(
        `[REST ERROR] ${req.method} ${req.path} - ${err instanceof Error ? err.stack : String(err)}`
      );
      res.status(500).json({ error: "Internal server error" });
    }
  );

  return app;
}

export async function createSnapshotStore(): Promise<SnapshotStore | undefined> {
  if (!settings.databaseUrl) {
    logger.info("DATABASE_URL not set, centrality snapshots are not cached");
    return undefined;
  }
  await AppDataSource.initialize();
  await AppDataSource.runMigrations();
  logger.info("Database connected");
  return new TypeOrmSnapshotStore(AppDataSource.getRepository(CentralitySnapshot));
}

export function createPipeline(store?: SnapshotStore, exportPath?: string): CentralityPipeline {
  const client = new StatsApiClient({
    baseUrl: settings.statsBaseUrl,
    timeoutMs: settings.statsTimeoutMs,
    delayMs: settings.statsDelayMs,
  });
  return new CentralityPipeline({
    source: new NbaStatsSource(client),
    store,
    teamConcurrency: settings.teamConcurrency,
    exportPath,
  });
}

if (require.main === module) {
  configWarnings.forEach((warning) => logger.warn(`[Config] ${warning}`));
  createSnapshotStore()
    .then((store) => {
      const app = createApp(createPipeline(store), settings.season);
      app.listen(settings.port, () => {
        logger.info(`Server listening on port ${settings.port}`);
      });
    })
    .catch((err) => {
      logger.error("Startup error:", err);
      process.exitCode = 1;
    });
}
