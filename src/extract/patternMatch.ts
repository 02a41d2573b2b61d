import * as cheerio from "cheerio";
import { PatternMatchConfig } from "../config/sourceRegistry";
import { ExtractionError } from "../errors";
import { RawArtifact } from "../types/rawArtifact";
import { collapseWhitespace } from "../utils/text";
import { finalizeSignature, matchValue, requireBody } from "./postprocess";
import { ExtractionResult } from "./types";

function selectText(html: string, selector: string): string {
  const $ = cheerio.load(html);
  const selected = $(selector);
  if (selected.length === 0) {
    throw new ExtractionError(`selector "${selector}" matched nothing`);
  }
  return selected
    .toArray()
    .map((element) => collapseWhitespace($(element).text()))
    .join("\n");
}

export function extractPatternMatch(artifact: RawArtifact, config: PatternMatchConfig): ExtractionResult {
  const body = requireBody(artifact);
  const text = config.selector ? selectText(body, config.selector) : body;
  const matched = matchValue(text, config.pattern, config.flags);
  return finalizeSignature(matched.value, matched.variables, config);
}
