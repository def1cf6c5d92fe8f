import { setTimeout as delay } from 'node:timers/promises';
import { CredentialError, ProviderPermanentError, ProviderTransientError, errorMessage } from '../domain/errors';
import { DeliveryOutcome, FailureOutcome, RenderedMessage, SendTask } from '../domain/types';
import { Logger, silentLogger } from '../infra/logger';
import { WorkerMetrics } from '../infra/metrics';
import { CredentialStore } from '../providers/credentials';
import { ProviderAdapterPool } from '../providers/registry';
import { Credentials, ProviderAdapter, SendResult } from '../providers/types';
import { Clock, systemClock } from './clock';
import { DeliveryEventPublisher, createDeliveryEvent } from './delivery-events';
import { RateLimiter, budgetKey } from './rate-limiter';
import { AttemptOutcome, RetryPolicy } from './retry-policy';
import { SendTaskStore, TaskSettlement } from './task-queue';

export type DispatcherOptions = {
  concurrency: number;
  pollIntervalMs: number;
  sendTimeoutMs: number;
  credentialRecheckMs: number;
  /** A claim older than this is taken back by the next pickup. */
  claimTimeoutMs: number;
};

export type DispatcherDeps = {
  store: SendTaskStore;
  limiter: RateLimiter;
  adapters: ProviderAdapterPool;
  credentials: CredentialStore;
  retryPolicy: RetryPolicy;
  events: DeliveryEventPublisher;
  clock?: Clock;
  logger?: Logger;
  metrics?: WorkerMetrics;
};

export type DispatchDiagnostic = {
  taskId: string;
  outcome: Extract<DeliveryOutcome, 'rate_limited' | 'provider_error'>;
  attemptCount: number;
  dueAt: Date;
  reason: string;
};

type BlockedPair = { until: number; reason: string };

export class Dispatcher {
  private readonly store: SendTaskStore;
  private readonly limiter: RateLimiter;
  private readonly adapters: ProviderAdapterPool;
  private readonly credentials: CredentialStore;
  private readonly retryPolicy: RetryPolicy;
  private readonly events: DeliveryEventPublisher;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics?: WorkerMetrics;

  private readonly blockedPairs = new Map<string, BlockedPair>();
  private loops: Array<Promise<void>> = [];
  private running = false;
  private idleAbort: AbortController | null = null;
  private consecutiveStoreFailures = 0;

  constructor(
    deps: DispatcherDeps,
    private readonly options: DispatcherOptions
  ) {
    this.store = deps.store;
    this.limiter = deps.limiter;
    this.adapters = deps.adapters;
    this.credentials = deps.credentials;
    this.retryPolicy = deps.retryPolicy;
    this.events = deps.events;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
    this.metrics = deps.metrics;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.idleAbort = new AbortController();
    this.loops = Array.from({ length: this.options.concurrency }, (_, workerId) => this.loop(workerId));
    this.logger.log(
      { type: 'dispatcher_started', concurrency: this.options.concurrency, sendTimeoutMs: this.options.sendTimeoutMs },
      'Dispatcher'
    );
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.idleAbort?.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.logger.log({ type: 'dispatcher_stopped' }, 'Dispatcher');
  }

  /** Claims and processes at most one due task. Resolves `false` when nothing was due. */
  async runOnce(): Promise<boolean> {
    await this.events.retryRetained();

    let task: SendTask | null;
    try {
      task = await this.store.pickup(this.clock.now(), this.options.claimTimeoutMs);
      this.consecutiveStoreFailures = 0;
    } catch (error) {
      this.onStoreFailure(error);
      return false;
    }

    if (!task) {
      return false;
    }

    await this.process(task);
    return true;
  }

  private async loop(workerId: number): Promise<void> {
    while (this.running) {
      let processed = false;
      try {
        processed = await this.runOnce();
      } catch (error) {
        this.logger.error(
          { type: 'dispatcher_loop_error', workerId, reason: errorMessage(error, 'unknown') },
          error instanceof Error ? error.stack : undefined,
          'Dispatcher'
        );
      }

      if (!processed && this.running) {
        await this.idle();
      }
    }
  }

  private async idle(): Promise<void> {
    try {
      await delay(this.options.pollIntervalMs, undefined, { signal: this.idleAbort?.signal });
    } catch {
      // aborted by stop()
    }
  }

  private async process(task: SendTask): Promise<void> {
    try {
      if (task.attemptCount >= this.retryPolicy.maxAttempts) {
        await this.fail(task, task.attemptCount, 'provider_error', task.lastError ?? 'max_attempts_reached');
        return;
      }

      const credentials = await this.resolveCredentials(task);
      if (!credentials) {
        return;
      }

      const adapter = this.adapters.get(task.provider);
      if (!adapter) {
        await this.fail(task, task.attemptCount, 'permanent_failure', `provider_unavailable:${task.provider}`);
        return;
      }

      const decision = await this.limiter.tryConsume(task.accountId, task.provider);
      if (!decision.allowed) {
        this.metrics?.incRateLimited(task.provider, decision.window);
        const dueAt = new Date(this.clock.now().getTime() + decision.retryAfterMs);
        const reason = `rate_limited:${decision.window}`;
        const settled = await this.settle(task, { status: 'pending', dueAt, reason });
        this.diagnose({ taskId: task.id, outcome: 'rate_limited', attemptCount: task.attemptCount, dueAt, reason });
        await this.emitIfCancelled(settled);
        return;
      }

      const attemptCount = task.attemptCount + 1;
      const result = await this.sendWithTimeout(adapter, task.message, credentials);
      await this.handleResult(task, attemptCount, result);
    } catch (error) {
      await this.handleInternalError(task, error);
    }
  }

  private async resolveCredentials(task: SendTask): Promise<Credentials | null> {
    const pair = budgetKey(task);
    const now = this.clock.now().getTime();
    const blocked = this.blockedPairs.get(pair);
    if (blocked && blocked.until > now) {
      await this.fail(task, task.attemptCount, 'permanent_failure', blocked.reason);
      return null;
    }

    try {
      const credentials = await this.credentials.resolve(task.accountId, task.provider);
      if (blocked) {
        this.blockedPairs.delete(pair);
        this.logger.log({ type: 'credentials_restored', accountId: task.accountId, provider: task.provider }, 'Dispatcher');
      }
      return credentials;
    } catch (error) {
      if (!(error instanceof CredentialError)) {
        throw error;
      }

      this.blockedPairs.set(pair, { until: now + this.options.credentialRecheckMs, reason: error.message });
      this.metrics?.incCredentialAlert(task.provider);
      this.logger.error(
        {
          type: 'credential_alert',
          accountId: task.accountId,
          provider: task.provider,
          reason: error.reason,
          blockedForMs: this.options.credentialRecheckMs
        },
        undefined,
        'Dispatcher'
      );
      await this.fail(task, task.attemptCount, 'permanent_failure', error.message);
      return null;
    }
  }

  private async sendWithTimeout(
    adapter: ProviderAdapter,
    message: RenderedMessage,
    credentials: Credentials
  ): Promise<SendResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<SendResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ status: 'rejected_transient', reason: 'send_timeout' });
      }, this.options.sendTimeoutMs);
    });

    const sending = adapter.send(message, credentials, controller.signal).catch(classifyThrown);
    // A send that settles after the timeout has already been reported as transient.
    void sending.catch(() => undefined);

    try {
      return await Promise.race([sending, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async handleResult(task: SendTask, attemptCount: number, result: SendResult): Promise<void> {
    if (result.status === 'accepted') {
      const at = this.clock.now();
      const settled = await this.settle(task, {
        status: 'sent',
        attemptCount,
        providerMessageId: result.providerMessageId,
        at
      });
      this.metrics?.incSent(task.provider);
      this.logger.debug(
        { type: 'task_sent', taskId: task.id, attemptCount, providerMessageId: result.providerMessageId },
        'Dispatcher'
      );
      await this.emit(settled, 'accepted', result.providerMessageId, null);
      return;
    }

    if (result.status === 'rejected_permanent') {
      await this.fail(task, attemptCount, 'rejected', result.reason);
      return;
    }

    const outcome: AttemptOutcome =
      result.reason === 'send_timeout'
        ? { kind: 'timeout', reason: result.reason }
        : { kind: 'rejected_transient', reason: result.reason };
    await this.retryOrFail(task, attemptCount, outcome, 'provider_error');
  }

  private async handleInternalError(task: SendTask, error: unknown): Promise<void> {
    const reason = `internal:${errorMessage(error, 'unknown')}`;
    this.logger.error(
      { type: 'internal_dispatch_error', taskId: task.id, reason },
      error instanceof Error ? error.stack : undefined,
      'Dispatcher'
    );

    try {
      await this.retryOrFail(task, task.attemptCount + 1, { kind: 'internal_error', reason }, 'permanent_failure');
    } catch (settleError) {
      this.onStoreFailure(settleError);
    }
  }

  private async retryOrFail(
    task: SendTask,
    attemptCount: number,
    outcome: AttemptOutcome,
    failure: FailureOutcome
  ): Promise<void> {
    const decision = this.retryPolicy.decide(attemptCount, outcome);
    if (decision.action === 'give_up') {
      await this.fail(task, attemptCount, failure, outcome.reason);
      return;
    }

    const dueAt = new Date(this.clock.now().getTime() + decision.afterMs);
    const settled = await this.settle(task, { status: 'deferred', attemptCount, dueAt, reason: outcome.reason });
    this.metrics?.incRetried(task.provider);
    this.diagnose({ taskId: task.id, outcome: 'provider_error', attemptCount, dueAt, reason: outcome.reason });
    await this.emitIfCancelled(settled);
  }

  private async fail(task: SendTask, attemptCount: number, outcome: FailureOutcome, reason: string): Promise<void> {
    const settled = await this.settle(task, { status: 'failed', attemptCount, outcome, reason, at: this.clock.now() });
    this.metrics?.incFailed(task.provider, outcome);
    this.logger.warn({ type: 'task_failed', taskId: task.id, outcome, attemptCount, reason }, 'Dispatcher');
    await this.emit(settled, outcome, null, reason);
  }

  private settle(task: SendTask, settlement: TaskSettlement): Promise<SendTask> {
    return this.store.settle(task.id, settlement, this.clock.now());
  }

  private async emitIfCancelled(task: SendTask): Promise<void> {
    if (task.status === 'failed' && task.failureOutcome === 'cancelled') {
      this.metrics?.incFailed(task.provider, 'cancelled');
      await this.emit(task, 'cancelled', null, task.lastError);
    }
  }

  private async emit(
    task: SendTask,
    outcome: DeliveryOutcome,
    providerMessageId: string | null,
    reason: string | null
  ): Promise<void> {
    const event = createDeliveryEvent({
      taskId: task.id,
      task,
      accountId: task.accountId,
      provider: task.provider,
      outcome,
      occurredAt: task.completedAt ?? this.clock.now(),
      attemptCount: task.attemptCount,
      providerMessageId,
      reason
    });
    await this.events.publish(event);
  }

  private diagnose(diagnostic: DispatchDiagnostic): void {
    this.logger.debug({ type: 'task_deferred', ...diagnostic }, 'Dispatcher');
  }

  private onStoreFailure(error: unknown): void {
    this.consecutiveStoreFailures += 1;
    const escalate = this.consecutiveStoreFailures >= this.retryPolicy.maxAttempts;
    this.logger.error(
      {
        type: escalate ? 'task_store_unavailable' : 'task_store_error',
        consecutiveFailures: this.consecutiveStoreFailures,
        reason: errorMessage(error, 'unknown')
      },
      error instanceof Error ? error.stack : undefined,
      'Dispatcher'
    );
  }
}

function classifyThrown(error: unknown): SendResult {
  if (error instanceof ProviderPermanentError) {
    return { status: 'rejected_permanent', reason: error.message };
  }
  if (error instanceof ProviderTransientError) {
    return { status: 'rejected_transient', reason: error.message };
  }
  throw error;
}
