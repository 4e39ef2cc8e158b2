import "reflect-metadata";
import { DataSource } from "typeorm";
import { CentralitySnapshot } from "./entity/CentralitySnapshot";
import { CreateCentralitySnapshots1729250000000 } from "./migration/1729250000000-CreateCentralitySnapshots";
import * as dotenv from "dotenv";

dotenv.config();

export interface Settings {
  season: string;
  statsBaseUrl: string;
  statsTimeoutMs: number;
  statsDelayMs: number;
  teamConcurrency: number;
  exportPath?: string;
  databaseUrl?: string;
  port: number;
  logLevel: string;
}

// Invalid numbers are reported back so the caller can log them once a logger exists.
export const configWarnings: string[] = [];

const readInt = (
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min = 0
): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    configWarnings.push(
      `${name}=${raw} is not an integer >= ${min}, using ${fallback}`
    );
    return fallback;
  }
  return value;
};

const readOptional = (
  env: NodeJS.ProcessEnv,
  name: string
): string | undefined => {
  const raw = env[name];
  return raw && raw.trim() !== "" ? raw.trim() : undefined;
};

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => ({
  season: readOptional(env, "SEASON") ?? "2023-24",
  statsBaseUrl:
    readOptional(env, "NBA_STATS_BASE_URL") ?? "https://stats.nba.com/stats",
  statsTimeoutMs: readInt(env, "NBA_STATS_TIMEOUT_MS", 20000, 1),
  statsDelayMs: readInt(env, "NBA_STATS_DELAY_MS", 100),
  teamConcurrency: readInt(env, "TEAM_CONCURRENCY", 1, 1),
  exportPath: readOptional(env, "EXPORT_PATH"),
  databaseUrl: readOptional(env, "DATABASE_URL"),
  port: readInt(env, "PORT", 3001, 1),
  logLevel: readOptional(env, "LOG_LEVEL") ?? "info",
});

export const settings = loadSettings();

export const AppDataSource = new DataSource({
  type: "postgres",
  url: settings.databaseUrl,
  entities: [CentralitySnapshot],
  migrations: [CreateCentralitySnapshots1729250000000],
  synchronize: false, // schema comes from migrations only
  logging: false,
});
