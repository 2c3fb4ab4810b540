import { setTimeout as sleep } from "node:timers/promises";

/** Fixed, short retry bound. No backoff: every wait is `intervalMs`. */
export interface RetryPolicy {
  readonly attempts: number;
  readonly intervalMs: number;
}

/**
 * Poll `done` until it reports true or the policy is exhausted.
 * `attempt` runs before each wait whenever `done` is still false.
 * Returns whether the condition was reached.
 */
export async function retryUntil(
  policy: RetryPolicy,
  done: () => Promise<boolean>,
  attempt?: (n: number) => Promise<void>,
): Promise<boolean> {
  for (let n = 1; n <= policy.attempts; n++) {
    if (await done()) return true;
    if (attempt) await attempt(n);
    if (policy.intervalMs > 0) await sleep(policy.intervalMs);
  }
  return done();
}

export { sleep };
