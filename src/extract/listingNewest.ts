import { ListingNewestConfig } from "../config/sourceRegistry";
import { ExtractionError } from "../errors";
import { formatVersionDate } from "../normalize/date";
import { RawArtifact } from "../types/rawArtifact";
import { parseListing } from "./listing";
import { Candidate, pickNewest } from "./ordering";
import { compilePattern, finalizeSignature } from "./postprocess";
import { groupVariables } from "./template";
import { ExtractionResult } from "./types";

export function extractListingNewest(artifact: RawArtifact, config: ListingNewestConfig): ExtractionResult {
  const entries = parseListing(artifact);
  if (entries.length === 0) {
    throw new ExtractionError("listing contains no entries");
  }

  const pattern = config.entryPattern ? compilePattern(config.entryPattern) : null;
  const candidates: Candidate[] = [];
  for (const entry of entries) {
    const match = pattern ? entry.name.match(pattern) : null;
    if (pattern && !match) continue;

    const variables: Record<string, string> = match ? groupVariables(match) : { "0": entry.name };
    if (entry.modifiedAt) variables.date = formatVersionDate(entry.modifiedAt);
    candidates.push({
      value: match ? match[1] ?? match[0] : entry.name,
      date: entry.modifiedAt,
      variables
    });
  }

  if (candidates.length === 0) {
    throw new ExtractionError(`no listing entry matches /${config.entryPattern}/`);
  }

  const newest = pickNewest(candidates, config.order);
  return finalizeSignature(newest.value, newest.variables, config);
}
