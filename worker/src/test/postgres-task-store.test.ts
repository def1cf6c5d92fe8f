import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { PostgresSendTaskStore } from '../infra/postgres-task-store';

const t0 = new Date('2026-03-02T10:00:00.000Z');

function taskRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'task-1',
    campaign_id: 'camp-1',
    step_id: 'step-0',
    recipient_id: 'ana',
    account_id: 'acct-1',
    provider: 'transactional_api',
    step_index: 0,
    message_jsonb: {
      from: { email: 'news@example.com' },
      to: { email: 'ana@example.com' },
      subject: 'Hi',
      html: '<p>Hi</p>',
      headers: {}
    },
    due_at: t0,
    attempt_count: 1,
    status: 'in_flight',
    last_error: null,
    provider_message_id: null,
    failure_outcome: null,
    completed_at: null,
    claimed_at: t0,
    created_at: t0,
    ...overrides
  };
}

class FakeDb {
  public calls: Array<{ text: string; values: unknown[] }> = [];

  constructor(private readonly cancelled: boolean) {}

  async query(text: string, values: unknown[] = []): Promise<{ rowCount: number; rows: Array<Record<string, unknown>> }> {
    this.calls.push({ text, values });

    if (text.includes('for update') && text.includes('where id = $1')) {
      return { rowCount: 1, rows: [taskRow()] };
    }

    if (text.includes('from send_task_cancellations')) {
      return this.cancelled ? { rowCount: 1, rows: [{ '?column?': 1 }] } : { rowCount: 0, rows: [] };
    }

    if (text.includes("last_error = 'campaign_cancelled'")) {
      return {
        rowCount: 1,
        rows: [
          taskRow({
            status: 'failed',
            attempt_count: values[1],
            failure_outcome: 'cancelled',
            last_error: 'campaign_cancelled',
            completed_at: values[2]
          })
        ]
      };
    }

    if (text.includes('update send_tasks')) {
      return { rowCount: 1, rows: [taskRow()] };
    }

    return { rowCount: 0, rows: [] };
  }

  async transaction<T>(work: (client: FakeDb) => Promise<T>): Promise<T> {
    return work(this);
  }

  indexOf(fragment: string): number {
    return this.calls.findIndex((call) => call.text.includes(fragment));
  }
}

describe('PostgresSendTaskStore', () => {
  it('takes the campaign lock before checking for a cancellation when a task goes back to the queue', async () => {
    const db = new FakeDb(true);
    const store = new PostgresSendTaskStore(db as never);

    const settled = await store.settle(
      'task-1',
      { status: 'deferred', attemptCount: 2, dueAt: new Date(t0.getTime() + 5000), reason: 'http_503' },
      t0
    );

    const lock = db.indexOf('pg_advisory_xact_lock');
    const check = db.indexOf('from send_task_cancellations');
    assert.ok(lock >= 0);
    assert.ok(lock < check);
    assert.deepEqual(db.calls[lock]?.values, ['camp-1']);
    assert.equal(settled.status, 'failed');
    assert.equal(settled.failureOutcome, 'cancelled');
    assert.equal(settled.attemptCount, 2);
  });

  it('settles a sent task without the campaign lock', async () => {
    const db = new FakeDb(true);
    const store = new PostgresSendTaskStore(db as never);

    await store.settle('task-1', { status: 'sent', attemptCount: 1, providerMessageId: 'p-1', at: t0 }, t0);

    assert.equal(db.indexOf('pg_advisory_xact_lock'), -1);
    assert.equal(db.indexOf('from send_task_cancellations'), -1);
  });

  it('passes the claim timeout to pickup', async () => {
    const db = new FakeDb(false);
    const store = new PostgresSendTaskStore(db as never);

    const claimed = await store.pickup(t0, 30_000);
    await store.pickup(t0);

    assert.equal(claimed?.claimedAt?.getTime(), t0.getTime());
    assert.deepEqual(
      db.calls.map((call) => call.values),
      [
        [t0, 30_000],
        [t0, null]
      ]
    );
  });
});
