import { CheckOutcome } from "../types/checkOutcome";
import { RunReport } from "../types/runReport";
import { summarize } from "./summary";

export interface ReportMeta {
  runId: string;
  registryPath: string;
  startedAt: string;
}

/**
 * Collects one outcome per registered source and places it at the source's
 * registration index, so the report order does not depend on completion
 * order.
 */
export class ReportBuilder {
  private readonly slots: (CheckOutcome | undefined)[];
  private readonly indexById = new Map<string, number>();

  constructor(
    private readonly sourceIds: readonly string[],
    private readonly meta: ReportMeta
  ) {
    sourceIds.forEach((sourceId, index) => {
      if (this.indexById.has(sourceId)) {
        throw new Error(`Duplicate source id ${sourceId}`);
      }
      this.indexById.set(sourceId, index);
    });
    this.slots = new Array<CheckOutcome | undefined>(sourceIds.length).fill(undefined);
  }

  /** Returns false when the source already has an outcome; the first one wins. */
  collect(outcome: CheckOutcome): boolean {
    const index = this.indexById.get(outcome.source_id);
    if (index === undefined) {
      throw new Error(`Unknown source id ${outcome.source_id}`);
    }
    if (this.slots[index] !== undefined) return false;
    this.slots[index] = outcome;
    return true;
  }

  pendingIds(): string[] {
    return this.sourceIds.filter((_, index) => this.slots[index] === undefined);
  }

  build(finishedAt: string): RunReport {
    const sources: CheckOutcome[] = [];
    this.slots.forEach((outcome, index) => {
      if (!outcome) {
        throw new Error(`No outcome collected for source ${this.sourceIds[index]}`);
      }
      sources.push(outcome);
    });

    return {
      schema_version: "1.0",
      run_id: this.meta.runId,
      timestamp: this.meta.startedAt,
      finished_at: finishedAt,
      registry_path: this.meta.registryPath,
      sources,
      summary: summarize(sources)
    };
  }
}
