import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { RetryPolicy } from '../core/retry-policy';

const config = { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 5000, jitterRatio: 0.5 };
const transient = { kind: 'rejected_transient', reason: 'http_503' } as const;

describe('RetryPolicy', () => {
  it('gives up immediately on a permanent rejection', () => {
    const policy = new RetryPolicy(config, () => 0);
    assert.deepEqual(policy.decide(1, { kind: 'rejected_permanent', reason: 'http_400' }), { action: 'give_up' });
  });

  it('backs off exponentially up to the cap', () => {
    const policy = new RetryPolicy({ ...config, maxAttempts: 10 }, () => 0);
    assert.deepEqual(
      [1, 2, 3, 4, 5].map((attempt) => policy.backoff(attempt)),
      [1000, 2000, 4000, 5000, 5000]
    );
  });

  it('adds jitter proportional to the delay', () => {
    const policy = new RetryPolicy(config, () => 0.5);
    assert.equal(policy.backoff(2), 2500);
  });

  it('retries timeouts and internal errors until max attempts', () => {
    const policy = new RetryPolicy(config, () => 0);

    assert.deepEqual(policy.decide(1, { kind: 'timeout', reason: 'send_timeout' }), { action: 'retry', afterMs: 1000 });
    assert.deepEqual(policy.decide(3, { kind: 'internal_error', reason: 'internal:boom' }), {
      action: 'retry',
      afterMs: 4000
    });
    assert.deepEqual(policy.decide(4, transient), { action: 'give_up' });
  });

  it('exposes the attempt ceiling', () => {
    assert.equal(new RetryPolicy(config).maxAttempts, 4);
  });
});
