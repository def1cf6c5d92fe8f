export type AttemptOutcome =
  | { kind: 'rejected_permanent'; reason: string }
  | { kind: 'rejected_transient'; reason: string }
  | { kind: 'timeout'; reason: string }
  | { kind: 'internal_error'; reason: string };

export type RetryDecision = { action: 'retry'; afterMs: number } | { action: 'give_up' };

export type RetryPolicyConfig = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
};

export type JitterSource = () => number;

/**
 * Decides what happens after a failed send attempt. `attemptCount` is the
 * number of attempts already made, including the one that just failed.
 * Rate limiting never reaches this policy.
 */
export class RetryPolicy {
  constructor(
    private readonly config: RetryPolicyConfig,
    private readonly random: JitterSource = Math.random
  ) {}

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  decide(attemptCount: number, outcome: AttemptOutcome): RetryDecision {
    if (outcome.kind === 'rejected_permanent') {
      return { action: 'give_up' };
    }

    if (attemptCount >= this.config.maxAttempts) {
      return { action: 'give_up' };
    }

    return { action: 'retry', afterMs: this.backoff(attemptCount) };
  }

  backoff(attemptCount: number): number {
    const exponent = Math.max(0, attemptCount - 1);
    const delay = Math.min(this.config.maxDelayMs, this.config.baseDelayMs * 2 ** exponent);
    const jitter = Math.floor(this.random() * this.config.jitterRatio * delay);
    return delay + jitter;
  }
}
