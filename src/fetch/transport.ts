import { RawArtifact, TransportKind } from "../types/rawArtifact";

export interface TransportRequest {
  url: URL;
  timeoutMs: number;
  userAgent: string;
  headers: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * One fetch against one endpoint. `close` is always called, also after a
 * failed `connect`.
 */
export interface Transport {
  readonly kind: TransportKind;
  connect(): Promise<void>;
  listOrGet(): Promise<RawArtifact>;
  close(): Promise<void>;
}

export type TransportFactory = (kind: TransportKind, request: TransportRequest) => Transport;
