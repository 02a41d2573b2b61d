import { AccessOptions, Client, FileInfo, FTPError } from "basic-ftp";
import { FetchError } from "../errors";
import { ListingEntry, RawArtifact } from "../types/rawArtifact";
import { isoSeconds } from "../utils/time";
import { TimedSignal, timedSignal } from "./abort";
import { classifyNetworkError } from "./classify";
import { Transport, TransportRequest } from "./transport";

const DEFAULT_FTP_PORT = 21;

/** The part of the basic-ftp client this transport drives. */
export interface FtpClient {
  access(options: AccessOptions): Promise<unknown>;
  list(path?: string): Promise<FileInfo[]>;
  lastMod(path: string): Promise<Date>;
  size(path: string): Promise<number>;
  close(): void;
}

export type FtpClientFactory = (timeoutMs: number) => FtpClient;

const createClient: FtpClientFactory = (timeoutMs) => new Client(timeoutMs);

export function toListingEntries(files: FileInfo[]): ListingEntry[] {
  return files
    .filter((file) => file.name !== "." && file.name !== "..")
    .map((file): ListingEntry => ({
      name: file.name,
      type: file.isDirectory ? "directory" : file.isFile ? "file" : "unknown",
      modifiedAt: file.modifiedAt ?? null,
      size: file.isFile ? file.size : null
    }));
}

/**
 * Anonymous FTP unless the endpoint carries credentials. A path ending in "/"
 * is listed; anything else is queried with MDTM and SIZE, reported as the
 * `last-modified` and `content-length` headers.
 */
export class FtpTransport implements Transport {
  readonly kind = "ftp" as const;
  private client: FtpClient | null = null;
  private timer: TimedSignal | null = null;

  constructor(
    private readonly request: TransportRequest,
    private readonly clientFactory: FtpClientFactory = createClient
  ) {}

  async connect(): Promise<void> {
    const timer = timedSignal(this.request.signal, this.request.timeoutMs);
    const client = this.clientFactory(this.request.timeoutMs);
    this.timer = timer;
    this.client = client;
    timer.signal.addEventListener("abort", () => client.close(), { once: true });

    const { url } = this.request;
    try {
      await client.access({
        host: url.hostname,
        port: url.port ? Number(url.port) : DEFAULT_FTP_PORT,
        user: url.username ? decodeURIComponent(url.username) : "anonymous",
        password: url.password ? decodeURIComponent(url.password) : "anonymous@",
        secure: false
      });
    } catch (error) {
      throw this.classify(error, timer);
    }
  }

  async listOrGet(): Promise<RawArtifact> {
    const client = this.client;
    const timer = this.timer;
    if (!client || !timer) {
      throw new Error("FtpTransport.listOrGet called before connect");
    }

    const url = this.request.url.toString();
    const remotePath = decodeURIComponent(this.request.url.pathname) || "/";
    try {
      if (remotePath.endsWith("/")) {
        const listing = toListingEntries(await client.list(remotePath));
        return {
          transport: "ftp",
          url,
          finalUrl: url,
          statusCode: null,
          contentType: null,
          headers: {},
          body: listing.map((entry) => entry.name).join("\n"),
          listing,
          fetchedAt: isoSeconds(Date.now())
        };
      }

      const modifiedAt = await client.lastMod(remotePath);
      const size = await client.size(remotePath);
      return {
        transport: "ftp",
        url,
        finalUrl: url,
        statusCode: null,
        contentType: null,
        headers: {
          "last-modified": modifiedAt.toUTCString(),
          "content-length": String(size)
        },
        body: "",
        listing: null,
        fetchedAt: isoSeconds(Date.now())
      };
    } catch (error) {
      throw this.classify(error, timer);
    }
  }

  async close(): Promise<void> {
    this.client?.close();
    this.client = null;
    this.timer?.dispose();
    this.timer = null;
  }

  private classify(error: unknown, timer: TimedSignal): FetchError {
    if (error instanceof FTPError && !timer.timedOut()) {
      return new FetchError(`FTP ${error.code}: ${error.message}`, {
        code: "FETCH_FTP",
        transient: error.code < 500,
        cause: error
      });
    }
    return classifyNetworkError(error, {
      timedOut: timer.timedOut(),
      aborted: this.request.signal?.aborted ?? false,
      timeoutMs: this.request.timeoutMs
    });
  }
}
