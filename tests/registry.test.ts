import { describe, expect, it } from "vitest";
import path from "path";
import { getSourceById, loadRegistry, parseRegistry, selectSources } from "../src/config/registry";
import { SourceDefinition, SourceRegistry } from "../src/config/sourceRegistry";
import { ConfigurationError } from "../src/errors";
import { extractSignature, resolveFiles } from "../src/extract";
import { httpArtifact, readFixture } from "./support/artifacts";

function getSource(registry: SourceRegistry, id: string): SourceDefinition {
  const source = getSourceById(registry, id);
  if (!source) throw new Error(`bundled registry has no ${id}`);
  return source;
}

const httpSource = (id: string, extra: Record<string, unknown> = {}) => ({
  id,
  kind: "header_derived",
  endpoint: `https://data.example.org/${id}`,
  extraction: { header: "etag" },
  ...extra
});

describe("source registry", () => {
  it("loads the bundled registry", async () => {
    const registry = await loadRegistry(path.join(process.cwd(), "config", "sources.json"));

    expect(registry.sources).toHaveLength(20);
    expect(selectSources(registry).map((source) => source.id)).not.toContain("UNII");
    expect(selectSources(registry)).toHaveLength(19);
    expect(registry.sources.every((source) => source.files !== undefined)).toBe(true);
  });

  it("reads ontology and listing sources of the bundled registry", async () => {
    const registry = await loadRegistry(path.join(process.cwd(), "config", "sources.json"));
    const obo = httpArtifact({ body: readFixture("ontology_header.obo") });

    expect(extractSignature(obo, getSource(registry, "HPO")).signature).toBe("2024.01.17");
    expect(extractSignature(obo, getSource(registry, "Mondo")).signature).toBe("2024.01.17");

    const itis = httpArtifact({ body: "<p>The files are currently from the <b>15-Jan-2024</b> release.</p>" });
    expect(extractSignature(itis, getSource(registry, "ITIS")).signature).toBe("2024.01.15");

    const ndfrt = getSource(registry, "NDF-RT");
    const listing = httpArtifact({
      body: "NDFRT_Public_All_2017-11-06.zip\nNDFRT_Public_All_2018-02-05.zip\nREADME\n"
    });
    const result = extractSignature(listing, ndfrt);
    expect(result.signature).toBe("2018.02.05");
    expect(resolveFiles(ndfrt.files, result)).toEqual({
      "NDFRT_Public_All.zip": "https://evs.nci.nih.gov/ftp1/NDF-RT/Archive/NDFRT_Public_All_2018-02-05.zip"
    });
  });

  it("fills in defaults", () => {
    const registry = parseRegistry({
      version: "1",
      sources: [{ id: "archive", kind: "listing_newest", endpoint: "ftp://ftp.example.org/pub/" }]
    });
    const [source] = registry.sources;

    expect(source.enabled).toBe(true);
    expect(source.kind === "listing_newest" && source.extraction.order).toBe("lexicographic");
  });

  it("rejects duplicate source ids", () => {
    expect(() => parseRegistry({ version: "1", sources: [httpSource("a"), httpSource("a")] })).toThrow(
      'Invalid registry: sources.1.id: Duplicate source id "a"'
    );
  });

  it("rejects unsupported endpoint schemes", () => {
    expect(() =>
      parseRegistry({ version: "1", sources: [httpSource("a", { endpoint: "s3://bucket/key" })] })
    ).toThrow("sources.0.endpoint: Unsupported protocol s3:");
  });

  it("rejects unknown kinds", () => {
    expect(() => parseRegistry({ version: "1", sources: [httpSource("a", { kind: "checksum" })] })).toThrow(
      ConfigurationError
    );
  });

  it("rejects patterns that do not compile", () => {
    const source = {
      id: "a",
      kind: "pattern_match",
      endpoint: "https://data.example.org/",
      extraction: { pattern: "([0-9]+" }
    };
    expect(() => parseRegistry({ version: "1", sources: [source] })).toThrow(
      "sources.0.extraction.pattern: Invalid regular expression"
    );
  });

  it("requires exactly one lookup expression", () => {
    const source = {
      id: "a",
      kind: "structured_lookup",
      endpoint: "https://data.example.org/",
      extraction: { jsonPath: "$.version", xpath: "/version" }
    };
    expect(() => parseRegistry({ version: "1", sources: [source] })).toThrow(
      "Exactly one of jsonPath or xpath is required"
    );
  });

  it("narrows the run to the requested ids, disabled or not", () => {
    const registry = parseRegistry({
      version: "1",
      sources: [httpSource("a"), httpSource("b", { enabled: false }), httpSource("c")]
    });

    expect(selectSources(registry).map((source) => source.id)).toEqual(["a", "c"]);
    expect(selectSources(registry, ["c", "b"]).map((source) => source.id)).toEqual(["b", "c"]);
    expect(() => selectSources(registry, ["zzz"])).toThrow("Unknown source id(s): zzz");
  });

  it("reports an unreadable registry file as a configuration error", async () => {
    await expect(loadRegistry(path.join(process.cwd(), "fixtures", "missing.json"))).rejects.toThrow(
      /^Cannot read registry/
    );
  });
});
