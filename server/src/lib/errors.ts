// server/src/lib/errors.ts
// Brukerfeil (dårlig fil / ugyldig spørring) → HTTP 400. Alt annet er 500.

export type IngestErrorCode =
  | "bad_format"
  | "missing_columns"
  | "no_rows"
  | "no_timestamps"
  | "invalid_mapping";

export type QueryErrorCode = "invalid_period" | "invalid_query";

export class IngestError extends Error {
  readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IngestError";
    this.code = code;
  }
}

export class QueryError extends Error {
  readonly code: QueryErrorCode;

  constructor(code: QueryErrorCode, message: string) {
    super(message);
    this.name = "QueryError";
    this.code = code;
  }
}

export function isUserError(err: unknown): err is IngestError | QueryError {
  return err instanceof IngestError || err instanceof QueryError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
