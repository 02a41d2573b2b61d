import { FetchError, errorMessage } from "../errors";

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_NONAME"]);
const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT"
]);

export interface NetworkErrorContext {
  timedOut: boolean;
  aborted: boolean;
  timeoutMs: number;
}

function errorCode(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

function isTlsCode(code: string): boolean {
  return (
    code.startsWith("ERR_TLS") ||
    code.startsWith("ERR_SSL") ||
    code.startsWith("CERT_") ||
    code.includes("SELF_SIGNED") ||
    code.startsWith("UNABLE_TO_VERIFY")
  );
}

function describe(error: unknown): string {
  const message = errorMessage(error);
  return message || errorCode(error) || "unknown error";
}

/**
 * Collapses whatever a transport threw into a FetchError. The underlying cause
 * text is kept in the message; `transient` decides whether a retry may help.
 */
export function classifyNetworkError(error: unknown, context: NetworkErrorContext): FetchError {
  if (error instanceof FetchError) return error;

  if (context.timedOut) {
    return new FetchError(`timed out after ${context.timeoutMs}ms`, {
      code: "FETCH_TIMEOUT",
      transient: true,
      cause: error
    });
  }
  if (context.aborted) {
    return new FetchError("aborted", { code: "FETCH_ABORTED", transient: false, cause: error });
  }

  const cause = error instanceof Error && error.cause !== undefined ? error.cause : null;
  const code = errorCode(cause) ?? errorCode(error);
  const message = cause ? `${describe(error)}: ${describe(cause)}` : describe(error);

  if (code && DNS_CODES.has(code)) {
    return new FetchError(message, { code: "FETCH_DNS", transient: true, cause: error });
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return new FetchError(message, { code: "FETCH_TIMEOUT", transient: true, cause: error });
  }
  if (code && isTlsCode(code)) {
    return new FetchError(message, { code: "FETCH_TLS", transient: false, cause: error });
  }
  if (code) {
    return new FetchError(message, { code: "FETCH_CONNECTION", transient: true, cause: error });
  }
  return new FetchError(message, { code: "FETCH_UNKNOWN", transient: true, cause: error });
}

export function httpStatusError(statusCode: number, statusText: string): FetchError {
  return new FetchError(`HTTP ${statusCode} ${statusText}`.trim(), {
    code: statusCode >= 500 ? "FETCH_HTTP_5XX" : "FETCH_HTTP_4XX",
    transient: false,
    statusCode
  });
}
