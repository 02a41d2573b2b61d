import { ExtractionError } from "../errors";
import { normalizeVersionDate } from "../normalize/date";
import { RawArtifact } from "../types/rawArtifact";
import { truncate } from "../utils/text";
import { groupVariables, renderTemplate } from "./template";
import { ExtractionResult, PostProcessOptions } from "./types";

export function requireBody(artifact: RawArtifact): string {
  if (artifact.body.trim().length === 0) {
    throw new ExtractionError("artifact body is empty");
  }
  return artifact.body;
}

export function compilePattern(pattern: string, flags?: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new ExtractionError(`invalid pattern /${pattern}/: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** First capture group when the pattern has one, else the whole match. */
export function matchValue(text: string, pattern: string, flags?: string): { value: string; variables: Record<string, string> } {
  const match = text.match(compilePattern(pattern, flags));
  if (!match) {
    throw new ExtractionError(`pattern /${pattern}/ did not match ${JSON.stringify(truncate(text, 80))}`);
  }
  return { value: match[1] ?? match[0], variables: groupVariables(match) };
}

/**
 * Shared tail of every strategy: optional template, optional date
 * normalization, then the non-empty check.
 */
export function finalizeSignature(
  value: string,
  variables: Record<string, string>,
  options: Pick<PostProcessOptions, "template" | "dateFormat">
): ExtractionResult {
  let signature = options.template ? renderTemplate(options.template, variables) : value;

  if (options.dateFormat) {
    const normalized = normalizeVersionDate(signature);
    if (!normalized) {
      throw new ExtractionError(`${JSON.stringify(signature)} is not a recognizable date`);
    }
    signature = normalized;
  }

  signature = signature.trim();
  if (!signature) {
    throw new ExtractionError("extracted signature is empty");
  }
  return { signature, variables };
}

export function postProcess(value: string, options: PostProcessOptions): ExtractionResult {
  if (!options.pattern) {
    return finalizeSignature(value, { "0": value }, options);
  }
  const matched = matchValue(value, options.pattern);
  return finalizeSignature(matched.value, matched.variables, options);
}
