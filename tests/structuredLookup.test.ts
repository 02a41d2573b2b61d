import { describe, expect, it } from "vitest";
import { ExtractionError } from "../src/errors";
import { extractSignature } from "../src/extract";
import { defineSource, httpArtifact, readFixture } from "./support/artifacts";

const releasesJson = readFixture("releases.json");
const releaseNotesXml = readFixture("release_notes.xml");

function lookupSource(extraction: Record<string, unknown>) {
  return defineSource({
    id: "releases",
    kind: "structured_lookup",
    endpoint: "https://data.example.org/releases",
    extraction
  });
}

function json(extraction: Record<string, unknown>): string {
  return extractSignature(
    httpArtifact({ body: releasesJson, contentType: "application/json" }),
    lookupSource(extraction)
  ).signature;
}

function xml(extraction: Record<string, unknown>): string {
  return extractSignature(
    httpArtifact({ body: releaseNotesXml, contentType: "application/xml" }),
    lookupSource(extraction)
  ).signature;
}

describe("structured_lookup extraction", () => {
  describe("JSONPath", () => {
    it("takes the first value by default", () => {
      expect(json({ jsonPath: "$[*].version" })).toBe("5.1.9");
    });

    it("picks the newest value in natural order", () => {
      expect(json({ jsonPath: "$[*].version", pick: "newest", order: "natural" })).toBe("5.1.10");
    });

    it("picks the newest value in lexicographic order", () => {
      expect(json({ jsonPath: "$[*].version", pick: "newest" })).toBe("5.1.9");
    });

    it("picks the newest date and formats it", () => {
      expect(json({ jsonPath: "$[*].released_on", pick: "newest", order: "date", dateFormat: true })).toBe(
        "2023.01.04"
      );
    });

    it("post-processes the value with a pattern", () => {
      expect(json({ jsonPath: "$[0].url", pattern: "releases/([0-9-]+)$" })).toBe("5-1-9");
    });

    it("fails when the path matches nothing", () => {
      expect(() => json({ jsonPath: "$[*].checksum" })).toThrow("path $[*].checksum matched nothing");
    });

    it("fails on a body that is not JSON", () => {
      const source = lookupSource({ jsonPath: "$.version" });
      const artifact = httpArtifact({ body: "<html><body>maintenance</body></html>" });
      expect(() => extractSignature(artifact, source)).toThrow(ExtractionError);
      expect(() => extractSignature(artifact, source)).toThrow(/^body is not valid JSON/);
    });
  });

  describe("XPath", () => {
    it("takes the text of the first selected node", () => {
      expect(xml({ xpath: "/catalog/release/version" })).toBe("2023-12");
    });

    it("picks the newest selected value", () => {
      expect(xml({ xpath: "/catalog/release/version", pick: "newest" })).toBe("2024-03");
    });

    it("accepts expressions that evaluate to a string", () => {
      expect(xml({ xpath: "string(/catalog/release[@id='r2']/date)", dateFormat: true })).toBe("2024.03.20");
    });

    it("fails when the expression selects nothing", () => {
      expect(() => xml({ xpath: "/catalog/archive" })).toThrow("path /catalog/archive matched nothing");
    });

    it("fails on a body that is not XML", () => {
      const source = lookupSource({ xpath: "/catalog" });
      const artifact = httpArtifact({ body: "plain text, no markup" });
      expect(() => extractSignature(artifact, source)).toThrow(/^body is not valid XML/);
    });
  });
});
