import { DOMParser } from "@xmldom/xmldom";
import { JSONPath } from "jsonpath-plus";
import * as xpath from "xpath";
import { StructuredLookupConfig } from "../config/sourceRegistry";
import { ExtractionError, errorMessage } from "../errors";
import { parseDateText } from "../normalize/date";
import { RawArtifact } from "../types/rawArtifact";
import { Candidate, pickNewest } from "./ordering";
import { postProcess, requireBody } from "./postprocess";
import { ExtractionResult } from "./types";

function scalarText(item: unknown): string | null {
  if (typeof item === "string") return item;
  if (typeof item === "number" || typeof item === "boolean") return String(item);
  if (typeof item === "object" && item !== null && "textContent" in item) {
    return typeof item.textContent === "string" ? item.textContent : null;
  }
  return null;
}

function collectScalars(found: unknown): string[] {
  const items = Array.isArray(found) ? found : [found];
  return items
    .map(scalarText)
    .filter((value): value is string => value !== null)
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

function lookupJson(body: string, path: string): string[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ExtractionError(`body is not valid JSON: ${errorMessage(error)}`);
  }
  if (json === null || typeof json !== "object") {
    throw new ExtractionError("JSON body is not an object or array");
  }

  let found: unknown;
  try {
    found = JSONPath({ path, json, wrap: true });
  } catch (error) {
    throw new ExtractionError(`invalid JSONPath ${path}: ${errorMessage(error)}`);
  }
  return collectScalars(found);
}

function lookupXml(body: string, expression: string): string[] {
  const problems: string[] = [];
  const record = (message: unknown) => {
    problems.push(String(message));
  };

  let doc: Document;
  try {
    doc = new DOMParser({
      errorHandler: { warning: () => undefined, error: record, fatalError: record }
    }).parseFromString(body, "text/xml");
  } catch (error) {
    throw new ExtractionError(`body is not valid XML: ${errorMessage(error)}`);
  }
  if (problems.length > 0 || !doc.documentElement) {
    throw new ExtractionError(`body is not valid XML: ${problems[0] ?? "no root element"}`);
  }

  let selected: unknown;
  try {
    selected = xpath.select(expression, doc);
  } catch (error) {
    throw new ExtractionError(`invalid XPath ${expression}: ${errorMessage(error)}`);
  }
  return collectScalars(selected);
}

export function extractStructuredLookup(
  artifact: RawArtifact,
  config: StructuredLookupConfig
): ExtractionResult {
  const body = requireBody(artifact);
  const path = config.jsonPath ?? config.xpath ?? "";
  const values = config.jsonPath ? lookupJson(body, config.jsonPath) : lookupXml(body, path);
  if (values.length === 0) {
    throw new ExtractionError(`path ${path} matched nothing`);
  }

  let value = values[0];
  if (config.pick === "newest") {
    const candidates: Candidate[] = values.map((item) => ({
      value: item,
      date: config.order === "date" ? parseDateText(item) : null,
      variables: { "0": item }
    }));
    value = pickNewest(candidates, config.order).value;
  }
  return postProcess(value, config);
}
