import { CheckOutcome, CheckStatus } from "./checkOutcome";

export type RunSummary = Readonly<Record<CheckStatus, number> & { total: number }>;

export interface RunReport {
  readonly schema_version: "1.0";
  readonly run_id: string;
  readonly timestamp: string;
  readonly finished_at: string;
  readonly registry_path: string;
  readonly sources: readonly CheckOutcome[];
  readonly summary: RunSummary;
}
