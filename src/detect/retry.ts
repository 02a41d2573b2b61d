import { setTimeout as delay } from "timers/promises";
import { RetryPolicy } from "../config/settings";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Exponential backoff with additive jitter: base * 2^(attempt - 1), capped at
 * maxDelayMs, plus a uniform [0, jitterMs) component. `attempt` is the number
 * of the attempt that just failed, starting at 1.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return exponential + jitter;
}
