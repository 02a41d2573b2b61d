export const CHECK_STATUSES = ["unchanged", "changed", "unreachable", "extraction_failed"] as const;

export type CheckStatus = (typeof CHECK_STATUSES)[number];

export interface CheckOutcome {
  readonly source_id: string;
  readonly status: CheckStatus;
  readonly previous_signature: string | null;
  readonly current_signature: string | null;
  readonly error_detail: string | null;
  readonly duration_ms: number;
  readonly attempts: number;
  readonly files: Readonly<Record<string, string>> | null;
}
