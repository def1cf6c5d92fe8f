import { PoolClient } from 'pg';
import { randomUUID } from 'node:crypto';
import { InternalDispatchError } from '../domain/errors';
import {
  FailureOutcome,
  NewSendTask,
  ProviderKind,
  RenderedMessage,
  SendTask,
  SendTaskStatus,
  TaskKey,
  isTerminalTaskStatus
} from '../domain/types';
import { InsertResult, SendTaskStore, TaskSettlement } from '../core/task-queue';
import { DbClient } from './db-client';

type SendTaskRow = {
  id: string;
  campaign_id: string;
  step_id: string;
  recipient_id: string;
  account_id: string;
  provider: ProviderKind;
  step_index: number;
  message_jsonb: RenderedMessage;
  due_at: Date;
  attempt_count: number;
  status: SendTaskStatus;
  last_error: string | null;
  provider_message_id: string | null;
  failure_outcome: FailureOutcome | null;
  completed_at: Date | null;
  claimed_at: Date | null;
  created_at: Date;
};

const TASK_COLUMNS = `id, campaign_id, step_id, recipient_id, account_id, provider, step_index, message_jsonb,
  due_at, attempt_count, status, last_error, provider_message_id, failure_outcome, completed_at, claimed_at, created_at`;

export class PostgresSendTaskStore implements SendTaskStore {
  constructor(private readonly db: DbClient) {}

  async insert(input: NewSendTask, now: Date): Promise<InsertResult | null> {
    return this.db.transaction(async (client) => {
      await lockCampaign(client, input.campaignId);
      if (await isCancelled(client, input.campaignId)) {
        return null;
      }

      const inserted = await client.query<SendTaskRow>(
        `insert into send_tasks (
           id, campaign_id, step_id, recipient_id, account_id, provider, step_index,
           message_jsonb, due_at, status, created_at
         ) values ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, 'pending', $10)
         on conflict (campaign_id, step_id, recipient_id) do nothing
         returning ${TASK_COLUMNS}`,
        [
          randomUUID(),
          input.campaignId,
          input.stepId,
          input.recipientId,
          input.accountId,
          input.provider,
          input.stepIndex,
          JSON.stringify(input.message),
          input.dueAt,
          now
        ]
      );
      if (inserted.rows[0]) {
        return { task: toTask(inserted.rows[0]), created: true };
      }

      const existing = await client.query<SendTaskRow>(
        `select ${TASK_COLUMNS} from send_tasks
         where campaign_id = $1 and step_id = $2 and recipient_id = $3`,
        [input.campaignId, input.stepId, input.recipientId]
      );
      if (!existing.rows[0]) {
        throw new InternalDispatchError(`task_insert_conflict_vanished:${input.campaignId}`);
      }
      return { task: toTask(existing.rows[0]), created: false };
    });
  }

  async pickup(now: Date, claimTimeoutMs?: number): Promise<SendTask | null> {
    const result = await this.db.query<SendTaskRow>(
      `update send_tasks
       set status = 'in_flight',
           claimed_at = $1,
           attempt_count = case when status = 'in_flight' then attempt_count + 1 else attempt_count end,
           last_error = case when status = 'in_flight' then 'claim_expired' else last_error end
       where id = (
         select id from send_tasks
         where archived = false
           and (
             (status in ('pending', 'deferred') and due_at <= $1)
             or (
               status = 'in_flight'
               and $2::bigint is not null
               and claimed_at <= $1::timestamptz - $2::bigint * interval '1 millisecond'
             )
           )
         order by due_at, created_at
         limit 1
         for update skip locked
       )
       returning ${TASK_COLUMNS}`,
      [now, claimTimeoutMs ?? null]
    );
    return result.rows[0] ? toTask(result.rows[0]) : null;
  }

  async settle(taskId: string, settlement: TaskSettlement, now: Date): Promise<SendTask> {
    return this.db.transaction(async (client) => {
      const current = await client.query<SendTaskRow>(
        `select ${TASK_COLUMNS} from send_tasks where id = $1 for update`,
        [taskId]
      );
      const row = current.rows[0];
      if (!row || row.status !== 'in_flight') {
        throw new InternalDispatchError(`task_not_in_flight:${taskId}`);
      }

      const requeue = settlement.status === 'deferred' || settlement.status === 'pending';
      if (requeue) {
        await lockCampaign(client, row.campaign_id);
      }
      if (requeue && (await isCancelled(client, row.campaign_id))) {
        const attemptCount = settlement.status === 'deferred' ? settlement.attemptCount : row.attempt_count;
        return toTask(await updateRow(client, CANCEL_SQL, [taskId, attemptCount, now]));
      }

      switch (settlement.status) {
        case 'sent':
          return toTask(
            await updateRow(
              client,
              `update send_tasks
               set status = 'sent', attempt_count = $2, provider_message_id = $3, last_error = null, completed_at = $4
               where id = $1
               returning ${TASK_COLUMNS}`,
              [taskId, settlement.attemptCount, settlement.providerMessageId, settlement.at]
            )
          );
        case 'failed':
          return toTask(
            await updateRow(
              client,
              `update send_tasks
               set status = 'failed', attempt_count = $2, failure_outcome = $3, last_error = $4, completed_at = $5
               where id = $1
               returning ${TASK_COLUMNS}`,
              [taskId, settlement.attemptCount, settlement.outcome, settlement.reason, settlement.at]
            )
          );
        case 'deferred':
          return toTask(
            await updateRow(
              client,
              `update send_tasks
               set status = 'deferred', attempt_count = $2, due_at = $3, last_error = $4
               where id = $1
               returning ${TASK_COLUMNS}`,
              [taskId, settlement.attemptCount, settlement.dueAt, settlement.reason]
            )
          );
        case 'pending':
          return toTask(
            await updateRow(
              client,
              `update send_tasks
               set status = 'pending', due_at = $2, last_error = $3
               where id = $1
               returning ${TASK_COLUMNS}`,
              [taskId, settlement.dueAt, settlement.reason]
            )
          );
      }
    });
  }

  async cancelCampaign(campaignId: string, at: Date): Promise<SendTask[]> {
    return this.db.transaction(async (client) => {
      await lockCampaign(client, campaignId);
      await client.query(
        `insert into send_task_cancellations (campaign_id, cancelled_at)
         values ($1, $2)
         on conflict (campaign_id) do nothing`,
        [campaignId, at]
      );

      const result = await client.query<SendTaskRow>(
        `update send_tasks
         set status = 'failed', failure_outcome = 'cancelled', last_error = 'campaign_cancelled', completed_at = $2
         where campaign_id = $1 and status in ('pending', 'deferred') and archived = false
         returning ${TASK_COLUMNS}`,
        [campaignId, at]
      );
      return result.rows.map(toTask);
    });
  }

  async get(taskId: string): Promise<SendTask | null> {
    const result = await this.db.query<SendTaskRow>(`select ${TASK_COLUMNS} from send_tasks where id = $1`, [taskId]);
    return result.rows[0] ? toTask(result.rows[0]) : null;
  }

  async findByKey(key: TaskKey): Promise<SendTask | null> {
    const result = await this.db.query<SendTaskRow>(
      `select ${TASK_COLUMNS} from send_tasks
       where campaign_id = $1 and step_id = $2 and recipient_id = $3`,
      [key.campaignId, key.stepId, key.recipientId]
    );
    return result.rows[0] ? toTask(result.rows[0]) : null;
  }

  async archive(taskId: string): Promise<void> {
    const result = await this.db.query<{ status: SendTaskStatus }>(
      `update send_tasks set archived = true
       where id = $1 and status in ('sent', 'failed')
       returning status`,
      [taskId]
    );
    if (result.rows.length > 0) {
      return;
    }

    const task = await this.get(taskId);
    if (task && !isTerminalTaskStatus(task.status)) {
      throw new InternalDispatchError(`task_not_terminal:${taskId}`);
    }
  }

  async countByStatus(status: SendTaskStatus): Promise<number> {
    const result = await this.db.query<{ total: string }>(
      'select count(*) as total from send_tasks where status = $1 and archived = false',
      [status]
    );
    return Number(result.rows[0]?.total ?? 0);
  }
}

const CANCEL_SQL = `update send_tasks
  set status = 'failed', attempt_count = $2, failure_outcome = 'cancelled', last_error = 'campaign_cancelled', completed_at = $3
  where id = $1
  returning ${TASK_COLUMNS}`;

async function lockCampaign(client: PoolClient, campaignId: string): Promise<void> {
  await client.query('select pg_advisory_xact_lock(hashtext($1))', [campaignId]);
}

async function isCancelled(client: PoolClient, campaignId: string): Promise<boolean> {
  const result = await client.query('select 1 from send_task_cancellations where campaign_id = $1', [campaignId]);
  return result.rows.length > 0;
}

async function updateRow(client: PoolClient, text: string, values: unknown[]): Promise<SendTaskRow> {
  const result = await client.query<SendTaskRow>(text, values);
  const row = result.rows[0];
  if (!row) {
    throw new InternalDispatchError('task_update_missed');
  }
  return row;
}

function toTask(row: SendTaskRow): SendTask {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    stepId: row.step_id,
    recipientId: row.recipient_id,
    accountId: row.account_id,
    provider: row.provider,
    stepIndex: row.step_index,
    message: row.message_jsonb,
    dueAt: row.due_at,
    attemptCount: row.attempt_count,
    status: row.status,
    lastError: row.last_error,
    providerMessageId: row.provider_message_id,
    failureOutcome: row.failure_outcome,
    completedAt: row.completed_at,
    claimedAt: row.claimed_at,
    createdAt: row.created_at
  };
}
