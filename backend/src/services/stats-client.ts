import { StatsApiError } from "../utils/result";
import { Logger, logger as defaultLogger } from "../utils/logger";

// stats.nba.com rejects requests that don't look like they came from nba.com
const NBA_HEADERS: Record<string, string> = {
  Accept: "application/json, text/plain, */*",
  "Accept-Language": "en-US,en;q=0.9",
  Origin: "https://www.nba.com",
  Referer: "https://www.nba.com/stats/",
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
  "x-nba-stats-origin": "stats",
  "x-nba-stats-token": "true",
};

export type StatsRow = Record<string, unknown>;

export interface StatsClientOptions {
  baseUrl: string;
  timeoutMs: number;
  delayMs: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

interface ResultSet {
  name: string;
  headers: string[];
  rowSet: unknown[][];
}

const isResultSet = (value: unknown): value is ResultSet => {
  if (
    typeof value !== "object" ||
    value === null ||
    !("name" in value && "headers" in value && "rowSet" in value)
  ) {
    return false;
  }
  const { name, headers, rowSet } = value;
  return (
    typeof name === "string" &&
    Array.isArray(headers) &&
    headers.every((h) => typeof h === "string") &&
    Array.isArray(rowSet) &&
    rowSet.every((row) => Array.isArray(row))
  );
};

/**
 * Pulls one named result set out of a stats API payload and zips each row
 * with the header list.
 */
export function extractResultSet(
  payload: unknown,
  name: string,
  endpoint: string
): StatsRow[] {
  const resultSets =
    typeof payload === "object" && payload !== null && "resultSets" in payload
      ? payload.resultSets
      : undefined;
  if (!Array.isArray(resultSets)) {
    throw new StatsApiError(`Unexpected shape: no resultSets`, endpoint);
  }
  const set = resultSets.find(
    (candidate): candidate is ResultSet =>
      isResultSet(candidate) && candidate.name === name
  );
  if (!set) {
    throw new StatsApiError(
      `Unexpected shape: result set ${name} missing`,
      endpoint
    );
  }
  return set.rowSet.map((row, i) => {
    if (row.length !== set.headers.length) {
      throw new StatsApiError(
        `Unexpected shape: row ${i} of ${name} has ${row.length} values for ${set.headers.length} headers`,
        endpoint
      );
    }
    return Object.fromEntries(set.headers.map((h, j) => [h, row[j]]));
  });
}

export class StatsApiClient {
  private fetchImpl: typeof fetch;
  private log: Logger;

  constructor(private options: StatsClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.logger ?? defaultLogger;
  }

  async getResultSet(
    endpoint: string,
    params: Record<string, string>,
    resultSet: string
  ): Promise<StatsRow[]> {
    const payload = await this.getJson(endpoint, params);
    return extractResultSet(payload, resultSet, endpoint);
  }

  async getJson(
    endpoint: string,
    params: Record<string, string>
  ): Promise<unknown> {
    const url = `${this.options.baseUrl}/${endpoint}?${new URLSearchParams(
      params
    ).toString()}`;

    if (this.options.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
    }

    const ctrl = new AbortController();
    const timer = setTimeout(() => ctrl.abort(), this.options.timeoutMs);
    try {
      this.log.debug(`[NBA API] Fetching: ${url}`);
      const res = await this.fetchImpl(url, {
        headers: NBA_HEADERS,
        signal: ctrl.signal,
      });
      if (!res.ok) {
        throw new StatsApiError(
          `NBA API ${res.status}: ${res.statusText}`,
          endpoint,
          res.status
        );
      }
      return await res.json();
    } catch (err) {
      if (err instanceof StatsApiError) throw err;
      if (err instanceof Error && err.name === "AbortError") {
        throw new StatsApiError(
          `Request timeout after ${this.options.timeoutMs}ms`,
          endpoint
        );
      }
      throw new StatsApiError(
        `Request failed: ${err instanceof Error ? err.message : String(err)}`,
        endpoint
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
