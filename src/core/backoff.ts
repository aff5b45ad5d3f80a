import { setTimeout as delay } from "node:timers/promises";

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  /** Growth per attempt. Defaults to 2. */
  factor?: number;
}

/** Delay before retry number `attempt` (0-based): initial · factor^attempt, capped at maxDelayMs. */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  const factor = options.factor ?? 2;
  const raw = options.initialDelayMs * Math.pow(factor, attempt);
  return Math.min(raw, options.maxDelayMs);
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Timed wait that resolves early, without throwing, when the signal aborts. */
export const sleep: Sleeper = async (ms, signal) => {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
};
