import { promises as fs } from "fs";
import { z } from "zod";
import { formatZodIssues } from "../config/registry";
import { ConfigurationError, errorMessage } from "../errors";
import { pathExists, writeJsonAtomic } from "../utils/fs";
import { isoSeconds } from "../utils/time";

const BaselineEntrySchema = z.object({
  signature: z.string().min(1),
  confirmed_at: z.string(),
  files: z.record(z.string()).nullable().optional()
});

const BaselineFileSchema = z.object({
  schema_version: z.literal("1.0"),
  updated_at: z.string().nullable(),
  sources: z.record(BaselineEntrySchema)
});

export type BaselineEntry = z.infer<typeof BaselineEntrySchema>;
export type BaselineFile = z.infer<typeof BaselineFileSchema>;

/**
 * Last confirmed signature per source. `load` once before checks, `commit`
 * per accepted outcome (memory only), `persist` once after the run. A crash
 * before `persist` leaves the file on disk untouched.
 */
export class BaselineStore {
  private entries = new Map<string, BaselineEntry>();
  private loaded = false;
  private dirty = false;

  constructor(
    private readonly filePath: string,
    private readonly now: () => number = Date.now
  ) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<ReadonlyMap<string, BaselineEntry>> {
    this.entries = new Map();
    this.dirty = false;

    if (await pathExists(this.filePath)) {
      let data: unknown;
      try {
        data = JSON.parse(await fs.readFile(this.filePath, "utf8"));
      } catch (error) {
        throw new ConfigurationError(`Cannot read baseline ${this.filePath}: ${errorMessage(error)}`);
      }
      const parsed = BaselineFileSchema.safeParse(data);
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid baseline ${this.filePath}: ${formatZodIssues(parsed.error)}`);
      }
      for (const [sourceId, entry] of Object.entries(parsed.data.sources)) {
        this.entries.set(sourceId, entry);
      }
    }

    this.loaded = true;
    return this.entries;
  }

  get(sourceId: string): BaselineEntry | undefined {
    return this.entries.get(sourceId);
  }

  /** Idempotent; the last commit for a source wins. */
  commit(sourceId: string, entry: BaselineEntry): void {
    if (!this.loaded) {
      throw new Error("BaselineStore.commit called before load");
    }
    this.entries.set(sourceId, entry);
    this.dirty = true;
  }

  toFile(): BaselineFile {
    const sources: Record<string, BaselineEntry> = {};
    for (const sourceId of [...this.entries.keys()].sort()) {
      const entry = this.entries.get(sourceId);
      if (entry) sources[sourceId] = entry;
    }
    return { schema_version: "1.0", updated_at: isoSeconds(this.now()), sources };
  }

  /** Atomically replaces the baseline file. No-op when nothing was committed. */
  async persist(): Promise<boolean> {
    if (!this.loaded) {
      throw new Error("BaselineStore.persist called before load");
    }
    if (!this.dirty) return false;
    await writeJsonAtomic(this.filePath, this.toFile());
    this.dirty = false;
    return true;
  }
}
