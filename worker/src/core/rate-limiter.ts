import { ProviderKind } from '../domain/types';
import { Clock, systemClock } from './clock';
import { DAY_MS, HOUR_MS, RateDecision, SlidingWindowLog, WindowSpec } from './sliding-window';

export type RateBudgetKey = {
  accountId: string;
  provider: ProviderKind;
};

export type SendCeilings = {
  hourly: number;
  daily: number;
};

export type RateLimitConfig = {
  defaults: SendCeilings;
  byAccount: Record<string, SendCeilings>;
};

export interface RateBudgetStore {
  consume(key: RateBudgetKey, windows: readonly WindowSpec[], cost: number, nowMs: number): Promise<RateDecision>;
  close?(): Promise<void>;
}

export class MemoryRateBudgetStore implements RateBudgetStore {
  private readonly logs = new Map<string, SlidingWindowLog>();

  async consume(key: RateBudgetKey, windows: readonly WindowSpec[], cost: number, nowMs: number): Promise<RateDecision> {
    const id = budgetKey(key);
    let log = this.logs.get(id);
    if (!log) {
      log = new SlidingWindowLog(windows);
      this.logs.set(id, log);
    }
    return log.tryConsume(nowMs, cost);
  }
}

export function budgetKey(key: RateBudgetKey): string {
  return `${key.accountId}:${key.provider}`;
}

export class RateLimiter {
  // Same-key calls run one at a time within this process.
  private readonly inProcessLocks = new Map<string, Promise<unknown>>();

  constructor(
    private readonly store: RateBudgetStore,
    private readonly config: RateLimitConfig,
    private readonly clock: Clock = systemClock
  ) {}

  tryConsume(accountId: string, provider: ProviderKind, cost = 1): Promise<RateDecision> {
    const key = { accountId, provider };
    const lockKey = budgetKey(key);
    const prev = this.inProcessLocks.get(lockKey) ?? Promise.resolve();

    const run = prev.then(() =>
      this.store.consume(key, this.windowsFor(accountId), cost, this.clock.now().getTime())
    );

    const tail: Promise<void> = run.then(
      () => undefined,
      () => undefined
    );
    void tail.finally(() => {
      if (this.inProcessLocks.get(lockKey) === tail) {
        this.inProcessLocks.delete(lockKey);
      }
    });
    this.inProcessLocks.set(lockKey, tail);

    return run;
  }

  ceilingsFor(accountId: string): SendCeilings {
    return this.config.byAccount[accountId] ?? this.config.defaults;
  }

  async close(): Promise<void> {
    await this.store.close?.();
  }

  private windowsFor(accountId: string): WindowSpec[] {
    const ceilings = this.ceilingsFor(accountId);
    return [
      { name: 'hour', lengthMs: HOUR_MS, ceiling: ceilings.hourly },
      { name: 'day', lengthMs: DAY_MS, ceiling: ceilings.daily }
    ];
  }
}
