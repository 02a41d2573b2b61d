import path from "path";
import { loadRegistry } from "../config/registry";
import { SourceKind } from "../config/sourceRegistry";

export interface ValidateOptions {
  registryPath: string;
}

export interface RegistrySummary {
  registryPath: string;
  version: string;
  total: number;
  enabled: number;
  byKind: Record<SourceKind, number>;
}

/** Validates the registry without touching the network. */
export async function runValidate(options: ValidateOptions): Promise<RegistrySummary> {
  const registryPath = path.resolve(options.registryPath);
  const registry = await loadRegistry(registryPath);
  const byKind: Record<SourceKind, number> = {
    pattern_match: 0,
    structured_lookup: 0,
    listing_newest: 0,
    header_derived: 0
  };
  for (const source of registry.sources) {
    byKind[source.kind] += 1;
  }
  return {
    registryPath,
    version: registry.version,
    total: registry.sources.length,
    enabled: registry.sources.filter((source) => source.enabled).length,
    byKind
  };
}
