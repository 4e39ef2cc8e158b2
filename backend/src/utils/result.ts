export type FailureKind = "lookup" | "computation";

export interface Failure {
  kind: FailureKind;
  message: string;
  cause?: unknown;
}

export type Result<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(
  kind: FailureKind,
  message: string,
  cause?: unknown
): Result<T> => ({ ok: false, failure: { kind, message, cause } });

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/** Thrown for caller mistakes that must not degrade into empty data. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class StatsApiError extends Error {
  constructor(
    message: string,
    readonly endpoint: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "StatsApiError";
  }
}
