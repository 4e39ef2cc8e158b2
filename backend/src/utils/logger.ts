import { createLogger, format, transports, Logger } from "winston";
import { v4 as uuidv4 } from "uuid";
import { settings } from "../config";

export type { Logger };

export const logger = createLogger({
  level: settings.logLevel,
  format: format.combine(
    format.colorize(),
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length ? JSON.stringify(meta) : "";
      return `[${timestamp}] ${level}: ${message} ${metaString}`;
    })
  ),
  transports: [new transports.Console()],
});

/**
 * Logger scoped to a single pipeline run. Every line it writes carries the
 * run's id, so interleaved runs in the HTTP server stay separable.
 */
export const createRunLogger = (
  runId: string = uuidv4(),
  parent: Logger = logger
): { runId: string; log: Logger } => ({
  runId,
  log: parent.child({ runId }),
});

// Tests pass this in place of the console logger.
export const createSilentLogger = (): Logger =>
  createLogger({ silent: true, transports: [new transports.Console()] });
