import { RawArtifact } from "../types/rawArtifact";
import { isoSeconds } from "../utils/time";
import { TimedSignal, timedSignal } from "./abort";
import { classifyNetworkError, httpStatusError } from "./classify";
import { Transport, TransportRequest } from "./transport";

export function lowerCaseHeaders(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key.toLowerCase()] = value;
  });
  return result;
}

/** Registry headers win over the configured User-Agent, whatever their case. */
function requestHeaders(userAgent: string, extra: Record<string, string>): Record<string, string> {
  const headers: Record<string, string> = { "user-agent": userAgent };
  for (const [name, value] of Object.entries(extra)) {
    headers[name.toLowerCase()] = value;
  }
  return headers;
}

export class HttpTransport implements Transport {
  readonly kind = "http" as const;
  private timer: TimedSignal | null = null;

  constructor(private readonly request: TransportRequest) {}

  async connect(): Promise<void> {
    this.timer = timedSignal(this.request.signal, this.request.timeoutMs);
  }

  async listOrGet(): Promise<RawArtifact> {
    const timer = this.timer;
    if (!timer) {
      throw new Error("HttpTransport.listOrGet called before connect");
    }

    const { url, timeoutMs } = this.request;
    try {
      const response = await fetch(url, {
        method: "GET",
        redirect: "follow",
        headers: requestHeaders(this.request.userAgent, this.request.headers),
        signal: timer.signal
      });

      if (!response.ok) {
        await response.body?.cancel().catch(() => undefined);
        throw httpStatusError(response.status, response.statusText);
      }

      const headers = lowerCaseHeaders(response.headers);
      const body = await response.text();
      return {
        transport: "http",
        url: url.toString(),
        finalUrl: response.url || url.toString(),
        statusCode: response.status,
        contentType: headers["content-type"] ?? null,
        headers,
        body,
        listing: null,
        fetchedAt: isoSeconds(Date.now())
      };
    } catch (error) {
      throw classifyNetworkError(error, {
        timedOut: timer.timedOut(),
        aborted: this.request.signal?.aborted ?? false,
        timeoutMs
      });
    }
  }

  async close(): Promise<void> {
    this.timer?.dispose();
    this.timer = null;
  }
}
