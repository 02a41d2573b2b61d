import { SourceDefinition } from "../config/sourceRegistry";
import { FetchError } from "../errors";
import { RawArtifact, TransportKind } from "../types/rawArtifact";
import { classifyNetworkError } from "./classify";
import { FtpTransport } from "./ftpTransport";
import { HttpTransport } from "./httpTransport";
import { TransportFactory } from "./transport";

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
}

export type ArtifactFetcher = (
  source: Pick<SourceDefinition, "endpoint" | "headers">,
  options: FetchOptions
) => Promise<RawArtifact>;

export function transportKindFor(url: URL): TransportKind {
  if (url.protocol === "ftp:") return "ftp";
  if (url.protocol === "http:" || url.protocol === "https:") return "http";
  throw new FetchError(`Unsupported protocol ${url.protocol}`, {
    code: "FETCH_UNKNOWN",
    transient: false
  });
}

export const createTransport: TransportFactory = (kind, request) =>
  kind === "ftp" ? new FtpTransport(request) : new HttpTransport(request);

/**
 * Fetches the current upstream state of one source. Never retries; every
 * failure surfaces as a FetchError.
 */
export async function fetchArtifact(
  source: Pick<SourceDefinition, "endpoint" | "headers">,
  options: FetchOptions,
  factory: TransportFactory = createTransport
): Promise<RawArtifact> {
  const url = new URL(source.endpoint);
  const transport = factory(transportKindFor(url), {
    url,
    timeoutMs: options.timeoutMs,
    userAgent: options.userAgent,
    headers: source.headers ?? {},
    signal: options.signal
  });

  try {
    await transport.connect();
    return await transport.listOrGet();
  } catch (error) {
    throw classifyNetworkError(error, {
      timedOut: false,
      aborted: options.signal?.aborted ?? false,
      timeoutMs: options.timeoutMs
    });
  } finally {
    await transport.close();
  }
}

export type { Transport, TransportFactory, TransportRequest } from "./transport";
