import { HeaderDerivedConfig } from "../config/sourceRegistry";
import { ExtractionError } from "../errors";
import { RawArtifact } from "../types/rawArtifact";
import { postProcess } from "./postprocess";
import { ExtractionResult } from "./types";

function unquote(value: string): string {
  const trimmed = value.trim();
  const quoted = trimmed.match(/^(W\/)?"(.*)"$/);
  return quoted ? `${quoted[1] ?? ""}${quoted[2]}` : trimmed;
}

export function extractHeaderDerived(artifact: RawArtifact, config: HeaderDerivedConfig): ExtractionResult {
  const name = config.header.toLowerCase();
  const raw = artifact.headers[name];
  if (raw === undefined || raw.trim() === "") {
    throw new ExtractionError(`header "${name}" is missing`);
  }
  return postProcess(unquote(raw), config);
}
