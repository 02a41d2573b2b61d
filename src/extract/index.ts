import { SourceDefinition } from "../config/sourceRegistry";
import { RawArtifact } from "../types/rawArtifact";
import { extractHeaderDerived } from "./headerDerived";
import { extractListingNewest } from "./listingNewest";
import { extractPatternMatch } from "./patternMatch";
import { extractStructuredLookup } from "./structuredLookup";
import { renderTemplate } from "./template";
import { ExtractionResult } from "./types";

/**
 * Turns a fetched artifact into a version signature with the strategy the
 * source's kind selects. Pure; throws ExtractionError on failure.
 */
export function extractSignature(artifact: RawArtifact, source: SourceDefinition): ExtractionResult {
  switch (source.kind) {
    case "pattern_match":
      return extractPatternMatch(artifact, source.extraction);
    case "structured_lookup":
      return extractStructuredLookup(artifact, source.extraction);
    case "listing_newest":
      return extractListingNewest(artifact, source.extraction);
    case "header_derived":
      return extractHeaderDerived(artifact, source.extraction);
  }
}

/** Download URLs with `{version}` and capture-group placeholders filled in. */
export function resolveFiles(
  files: Record<string, string> | undefined,
  result: ExtractionResult
): Record<string, string> | null {
  if (!files) return null;
  const variables = { ...result.variables, version: result.signature };
  const resolved: Record<string, string> = {};
  for (const [name, template] of Object.entries(files)) {
    resolved[name] = renderTemplate(template, variables);
  }
  return resolved;
}

export type { ExtractionResult } from "./types";
