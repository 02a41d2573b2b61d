export type FetchErrorCode =
  | "FETCH_TIMEOUT"
  | "FETCH_DNS"
  | "FETCH_CONNECTION"
  | "FETCH_TLS"
  | "FETCH_HTTP_4XX"
  | "FETCH_HTTP_5XX"
  | "FETCH_FTP"
  | "FETCH_ABORTED"
  | "FETCH_UNKNOWN";

/**
 * Fatal problems with the registry, settings or baseline file. Raised before
 * any source is checked and mapped to exit status 1 by the CLI.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface FetchErrorOptions {
  code: FetchErrorCode;
  transient: boolean;
  statusCode?: number | null;
  cause?: unknown;
}

export class FetchError extends Error {
  readonly code: FetchErrorCode;
  readonly transient: boolean;
  readonly statusCode: number | null;

  constructor(message: string, options: FetchErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.code = options.code;
    this.transient = options.transient;
    this.statusCode = options.statusCode ?? null;
  }

  get detail(): string {
    return `${this.code}: ${this.message}`;
  }
}

export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
