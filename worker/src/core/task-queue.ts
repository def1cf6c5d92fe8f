import { randomUUID } from 'node:crypto';
import { InternalDispatchError } from '../domain/errors';
import {
  FailureOutcome,
  NewSendTask,
  SendTask,
  SendTaskStatus,
  TaskKey,
  isTerminalTaskStatus,
  taskKeyString
} from '../domain/types';

export type TaskSettlement =
  | { status: 'sent'; attemptCount: number; providerMessageId: string; at: Date }
  | { status: 'failed'; attemptCount: number; outcome: FailureOutcome; reason: string; at: Date }
  | { status: 'deferred'; attemptCount: number; dueAt: Date; reason: string }
  | { status: 'pending'; dueAt: Date; reason: string };

export type InsertResult = { task: SendTask; created: boolean };

/**
 * Pending work owned by the dispatcher. `pickup` is the only way a task
 * enters `in_flight`, and `settle` only accepts tasks that are in flight.
 * `insert` resolves `null` once the campaign has been cancelled.
 *
 * With `claimTimeoutMs`, `pickup` also takes back a task whose claim is older
 * than the timeout, counting the lost claim as an attempt.
 */
export interface SendTaskStore {
  insert(task: NewSendTask, now: Date): Promise<InsertResult | null>;
  pickup(now: Date, claimTimeoutMs?: number): Promise<SendTask | null>;
  settle(taskId: string, settlement: TaskSettlement, now: Date): Promise<SendTask>;
  cancelCampaign(campaignId: string, at: Date): Promise<SendTask[]>;
  get(taskId: string): Promise<SendTask | null>;
  findByKey(key: TaskKey): Promise<SendTask | null>;
  archive(taskId: string): Promise<void>;
  countByStatus(status: SendTaskStatus): Promise<number>;
}

export class MemorySendTaskStore implements SendTaskStore {
  private readonly active = new Map<string, SendTask>();
  private readonly archived = new Map<string, SendTask>();
  private readonly idsByKey = new Map<string, string>();
  private readonly cancelledCampaigns = new Set<string>();

  async insert(input: NewSendTask, now: Date): Promise<InsertResult | null> {
    if (this.cancelledCampaigns.has(input.campaignId)) {
      return null;
    }

    const keyString = taskKeyString(input);
    const existingId = this.idsByKey.get(keyString);
    const existing = existingId ? this.lookup(existingId) : undefined;
    if (existing) {
      return { task: { ...existing }, created: false };
    }

    const task: SendTask = {
      ...input,
      id: randomUUID(),
      attemptCount: 0,
      status: 'pending',
      lastError: null,
      providerMessageId: null,
      failureOutcome: null,
      completedAt: null,
      claimedAt: null,
      createdAt: now
    };
    this.active.set(task.id, task);
    this.idsByKey.set(keyString, task.id);
    return { task: { ...task }, created: true };
  }

  async pickup(now: Date, claimTimeoutMs?: number): Promise<SendTask | null> {
    let candidate: SendTask | null = null;
    for (const task of this.active.values()) {
      if (!this.isClaimable(task, now, claimTimeoutMs)) {
        continue;
      }
      if (!candidate || this.comesBefore(task, candidate)) {
        candidate = task;
      }
    }

    if (!candidate) {
      return null;
    }

    // The status check above and this swap run without an await in between.
    if (candidate.status === 'in_flight') {
      candidate.attemptCount += 1;
      candidate.lastError = 'claim_expired';
    }
    candidate.status = 'in_flight';
    candidate.claimedAt = now;
    return { ...candidate };
  }

  async settle(taskId: string, settlement: TaskSettlement, now: Date): Promise<SendTask> {
    const task = this.active.get(taskId);
    if (!task || task.status !== 'in_flight') {
      throw new InternalDispatchError(`task_not_in_flight:${taskId}`);
    }

    if (this.cancelledCampaigns.has(task.campaignId) && (settlement.status === 'deferred' || settlement.status === 'pending')) {
      this.applyCancel(task, settlement.status === 'deferred' ? settlement.attemptCount : task.attemptCount, now);
      return { ...task };
    }

    switch (settlement.status) {
      case 'sent':
        task.status = 'sent';
        task.attemptCount = settlement.attemptCount;
        task.providerMessageId = settlement.providerMessageId;
        task.lastError = null;
        task.completedAt = settlement.at;
        break;
      case 'failed':
        task.status = 'failed';
        task.attemptCount = settlement.attemptCount;
        task.failureOutcome = settlement.outcome;
        task.lastError = settlement.reason;
        task.completedAt = settlement.at;
        break;
      case 'deferred':
        task.status = 'deferred';
        task.attemptCount = settlement.attemptCount;
        task.dueAt = settlement.dueAt;
        task.lastError = settlement.reason;
        break;
      case 'pending':
        task.status = 'pending';
        task.dueAt = settlement.dueAt;
        task.lastError = settlement.reason;
        break;
    }

    return { ...task };
  }

  async cancelCampaign(campaignId: string, at: Date): Promise<SendTask[]> {
    this.cancelledCampaigns.add(campaignId);

    const cancelled: SendTask[] = [];
    for (const task of this.active.values()) {
      if (task.campaignId !== campaignId || (task.status !== 'pending' && task.status !== 'deferred')) {
        continue;
      }
      this.applyCancel(task, task.attemptCount, at);
      cancelled.push({ ...task });
    }
    return cancelled;
  }

  async get(taskId: string): Promise<SendTask | null> {
    const task = this.lookup(taskId);
    return task ? { ...task } : null;
  }

  async findByKey(key: TaskKey): Promise<SendTask | null> {
    const id = this.idsByKey.get(taskKeyString(key));
    return id ? this.get(id) : null;
  }

  async archive(taskId: string): Promise<void> {
    const task = this.active.get(taskId);
    if (!task) {
      return;
    }
    if (!isTerminalTaskStatus(task.status)) {
      throw new InternalDispatchError(`task_not_terminal:${taskId}`);
    }
    this.active.delete(taskId);
    this.archived.set(taskId, task);
  }

  async countByStatus(status: SendTaskStatus): Promise<number> {
    let count = 0;
    for (const task of this.active.values()) {
      if (task.status === status) {
        count += 1;
      }
    }
    return count;
  }

  size(): number {
    return this.active.size;
  }

  private lookup(taskId: string): SendTask | undefined {
    return this.active.get(taskId) ?? this.archived.get(taskId);
  }

  private isClaimable(task: SendTask, now: Date, claimTimeoutMs?: number): boolean {
    if (task.status === 'in_flight') {
      return (
        claimTimeoutMs !== undefined &&
        task.claimedAt !== null &&
        task.claimedAt.getTime() + claimTimeoutMs <= now.getTime()
      );
    }
    return (task.status === 'pending' || task.status === 'deferred') && task.dueAt.getTime() <= now.getTime();
  }

  private comesBefore(a: SendTask, b: SendTask): boolean {
    const byDue = a.dueAt.getTime() - b.dueAt.getTime();
    if (byDue !== 0) {
      return byDue < 0;
    }
    return a.createdAt.getTime() < b.createdAt.getTime();
  }

  private applyCancel(task: SendTask, attemptCount: number, at: Date): void {
    task.status = 'failed';
    task.attemptCount = attemptCount;
    task.failureOutcome = 'cancelled';
    task.lastError = 'campaign_cancelled';
    task.completedAt = at;
  }
}
