/** ISO-8601 UTC at second precision, e.g. "2024-03-05T00:00:00Z". */
export function isoSeconds(epochMs: number): string {
  return new Date(epochMs).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Run ids end up in file names, so the colons go. */
export function runIdAt(epochMs: number): string {
  return isoSeconds(epochMs).replace(/:/g, "-");
}
