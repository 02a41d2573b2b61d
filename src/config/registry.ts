import { ZodError } from "zod";
import { SourceRegistrySchema, SourceRegistry, SourceDefinition } from "./sourceRegistry";
import { readJson } from "../utils/fs";
import { ConfigurationError, errorMessage } from "../errors";

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseRegistry(data: unknown, label = "registry"): SourceRegistry {
  const parsed = SourceRegistrySchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${label}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadRegistry(registryPath: string): Promise<SourceRegistry> {
  let data: unknown;
  try {
    data = await readJson(registryPath);
  } catch (error) {
    throw new ConfigurationError(`Cannot read registry ${registryPath}: ${errorMessage(error)}`);
  }
  return parseRegistry(data, `registry ${registryPath}`);
}

export function getSourceById(
  registry: SourceRegistry,
  sourceId: string
): SourceDefinition | undefined {
  return registry.sources.find((source) => source.id === sourceId);
}

/**
 * Enabled sources in registration order, optionally narrowed to `onlyIds`.
 * Unknown ids in `onlyIds` are a configuration error.
 */
export function selectSources(registry: SourceRegistry, onlyIds: string[] = []): SourceDefinition[] {
  if (onlyIds.length === 0) {
    return registry.sources.filter((source) => source.enabled);
  }

  const missing = onlyIds.filter((id) => !getSourceById(registry, id));
  if (missing.length > 0) {
    throw new ConfigurationError(`Unknown source id(s): ${missing.join(", ")}`);
  }
  const wanted = new Set(onlyIds);
  return registry.sources.filter((source) => wanted.has(source.id));
}
