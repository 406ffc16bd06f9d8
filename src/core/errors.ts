export type NetworkErrorCode = "TIMEOUT" | "HTTP_STATUS" | "CONNECTION";

export class NetworkError extends Error {
  constructor(message: string, public code: NetworkErrorCode, public status?: number) {
    super(message);
    this.name = "NetworkError";
  }
}

export class FetchError extends Error {
  constructor(
    message: string,
    public code: "EXHAUSTED",
    public attempts: number,
    public lastError?: unknown
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export type ParseErrorCode =
  | "MISSING_SUMMARY"
  | "MISSING_SNAPSHOT"
  | "INVALID_SNAPSHOT"
  | "MISSING_USER_NODE";

export class ParseError extends Error {
  constructor(message: string, public code: ParseErrorCode) {
    super(message);
    this.name = "ParseError";
  }
}

export class PersistenceError extends Error {
  constructor(message: string, public code: "DIRECTORY_FAILED" | "WRITE_FAILED", public path: string) {
    super(message);
    this.name = "PersistenceError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): { code: string; message: string } {
  if (
    error instanceof NetworkError ||
    error instanceof FetchError ||
    error instanceof ParseError ||
    error instanceof PersistenceError
  ) {
    return { code: error.code, message: error.message };
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return { code: "UNKNOWN", message };
}
