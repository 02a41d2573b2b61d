import { BaselineEntry } from "../baseline/baselineStore";

export type Comparison = "unchanged" | "changed";

/**
 * Equality only; direction does not matter. A source seen for the first time
 * establishes its baseline and is never reported as changed.
 */
export function compareSignature(previous: BaselineEntry | undefined, current: string): Comparison {
  if (!previous) return "unchanged";
  return previous.signature === current ? "unchanged" : "changed";
}
