import { readFileSync } from "fs";
import path from "path";
import { parseRegistry } from "../../src/config/registry";
import { SourceDefinition } from "../../src/config/sourceRegistry";
import { RawArtifact } from "../../src/types/rawArtifact";

export const fixturesDir = path.join(process.cwd(), "fixtures");

export function readFixture(name: string): string {
  return readFileSync(path.join(fixturesDir, name), "utf8");
}

export function httpArtifact(overrides: Partial<RawArtifact> = {}): RawArtifact {
  const url = overrides.url ?? "https://data.example.org/";
  return {
    transport: "http",
    url,
    finalUrl: url,
    statusCode: 200,
    contentType: "text/plain",
    headers: {},
    body: "",
    listing: null,
    fetchedAt: "2024-03-05T00:00:00Z",
    ...overrides
  };
}

/** Registry entries go through the zod schema so defaults are filled in. */
export function defineSources(sources: unknown[]): SourceDefinition[] {
  return parseRegistry({ version: "test", sources }, "test registry").sources;
}

export function defineSource(source: unknown): SourceDefinition {
  return defineSources([source])[0];
}
