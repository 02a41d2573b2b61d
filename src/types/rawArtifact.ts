export type TransportKind = "http" | "ftp";

export interface ListingEntry {
  name: string;
  type: "file" | "directory" | "unknown";
  modifiedAt: Date | null;
  size: number | null;
}

/**
 * Upstream state as fetched, before any extraction. Header names are lower
 * case. `listing` is set when the transport returned a directory listing.
 */
export interface RawArtifact {
  transport: TransportKind;
  url: string;
  finalUrl: string;
  statusCode: number | null;
  contentType: string | null;
  headers: Record<string, string>;
  body: string;
  listing: ListingEntry[] | null;
  fetchedAt: string;
}
