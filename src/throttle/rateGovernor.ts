import { clamp, randomBetween } from "../common/math.js";
import { sleep, type SleepFn } from "../common/time.js";
import type { RetryPolicy } from "../types.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
  maxDelayMs: 30_000,
  jitterRatio: 0.25,
};

export interface RateGovernorOptions {
  minDelayMs: number;
  maxDelayMs: number;
  random?: () => number;
  now?: () => number;
  sleepFn?: SleepFn;
}

/**
 * Paces fetch attempts within one shard process. The first attempt goes
 * through immediately; every later one waits until a jittered interval has
 * passed since the previous admission.
 */
export class RateGovernor {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly sleepFn: SleepFn;
  private lastAdmittedAt?: number;

  constructor(options: RateGovernorOptions) {
    this.minDelayMs = Math.max(0, options.minDelayMs);
    this.maxDelayMs = Math.max(this.minDelayMs, options.maxDelayMs);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  async admit(signal?: AbortSignal): Promise<number> {
    let waitedMs = 0;
    if (typeof this.lastAdmittedAt === "number") {
      const interval = randomBetween(this.minDelayMs, this.maxDelayMs, this.random);
      const elapsed = this.now() - this.lastAdmittedAt;
      waitedMs = Math.max(0, Math.round(interval - elapsed));
      if (waitedMs > 0) {
        await this.sleepFn(waitedMs, signal);
      }
    }
    this.lastAdmittedAt = this.now();
    return waitedMs;
  }
}

/** Exponential in the attempt number, capped, plus up to `jitterRatio` extra. */
export function backoffDelayMs(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const base = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
  const jitter = base * clamp(policy.jitterRatio, 0, 1) * clamp(random(), 0, 1);
  return Math.round(base + jitter);
}
