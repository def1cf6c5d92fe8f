import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import { DeliveryEvent, DeliveryOutcome, ProviderKind, TaskKey } from '../domain/types';
import { errorMessage } from '../domain/errors';
import { Logger, silentLogger } from '../infra/logger';
import { WorkerMetrics } from '../infra/metrics';

export interface DeliveryEventSink {
  record(event: DeliveryEvent): Promise<void>;
  close?(): Promise<void>;
}

export class MemoryDeliveryEventSink implements DeliveryEventSink {
  readonly events: DeliveryEvent[] = [];

  async record(event: DeliveryEvent): Promise<void> {
    this.events.push(event);
  }
}

export type DeliveryEventInput = {
  taskId: string | null;
  task: TaskKey;
  accountId: string;
  provider: ProviderKind;
  outcome: DeliveryOutcome;
  occurredAt: Date;
  attemptCount: number;
  providerMessageId?: string | null;
  reason?: string | null;
};

export function createDeliveryEvent(input: DeliveryEventInput): DeliveryEvent {
  return Object.freeze({
    id: randomUUID(),
    taskId: input.taskId,
    task: Object.freeze({ campaignId: input.task.campaignId, stepId: input.task.stepId, recipientId: input.task.recipientId }),
    accountId: input.accountId,
    provider: input.provider,
    outcome: input.outcome,
    occurredAt: new Date(input.occurredAt.getTime()),
    attemptCount: input.attemptCount,
    providerMessageId: input.providerMessageId ?? null,
    reason: input.reason ?? null
  });
}

export type DeliveryEventPublisherOptions = {
  capacity: number;
  offerTimeoutMs: number;
  sinkRetryDelayMs: number;
  /** Consecutive sink failures before an operational alert is raised. */
  sinkAlertAfter?: number;
  onRecorded?: (event: DeliveryEvent) => Promise<void>;
  logger?: Logger;
  metrics?: WorkerMetrics;
};

const DEFAULT_SINK_ALERT_AFTER = 5;

/**
 * Bounded hand-off between the engine and the event sink. `offer` waits
 * at most `offerTimeoutMs` for buffer space; the sink is drained in the
 * background and failed writes are retried in order.
 *
 * `publish` keeps events whose offer timed out and hands them over again on
 * `retryRetained`, `flush` and `close`. Only one retry pass runs at a time.
 */
export class DeliveryEventPublisher {
  private readonly buffer: DeliveryEvent[] = [];
  private readonly retainedEvents: DeliveryEvent[] = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private draining: Promise<void> | null = null;
  private retrying: Promise<void> | null = null;
  private consecutiveSinkFailures = 0;
  private closed = false;
  private readonly logger: Logger;

  constructor(
    private readonly sink: DeliveryEventSink,
    private readonly options: DeliveryEventPublisherOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get depth(): number {
    return this.buffer.length;
  }

  get retained(): number {
    return this.retainedEvents.length;
  }

  async offer(event: DeliveryEvent): Promise<boolean> {
    if (this.closed) {
      this.logger.error({ type: 'delivery_event_after_close', event }, undefined, 'DeliveryEventPublisher');
      return false;
    }
    return this.enqueue(event);
  }

  /** Offers the event, keeping it for a later retry when the buffer stays full. */
  async publish(event: DeliveryEvent): Promise<boolean> {
    if (this.retainedEvents.length === 0 && (await this.offer(event))) {
      return true;
    }
    if (this.closed) {
      return false;
    }

    this.retainedEvents.push(event);
    this.logger.error(
      { type: 'delivery_event_retained', eventId: event.id, taskId: event.taskId, retained: this.retainedEvents.length },
      undefined,
      'DeliveryEventPublisher'
    );
    return false;
  }

  retryRetained(): Promise<void> {
    if (!this.retrying) {
      this.retrying = this.offerRetained().finally(() => {
        this.retrying = null;
      });
    }
    return this.retrying;
  }

  async flush(): Promise<void> {
    do {
      await this.retryRetained();
      await (this.draining ?? this.kick());
    } while (this.buffer.length > 0 || this.retainedEvents.length > 0 || this.draining);
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
    await this.sink.close?.();
  }

  private async enqueue(event: DeliveryEvent): Promise<boolean> {
    if (this.buffer.length >= this.options.capacity && !(await this.waitUntilRoom())) {
      this.options.metrics?.incEventOfferTimeout();
      return false;
    }

    this.buffer.push(event);
    this.options.metrics?.setEventBufferDepth(this.buffer.length);
    this.kick();
    return true;
  }

  private async offerRetained(): Promise<void> {
    while (this.retainedEvents.length > 0) {
      if (!(await this.enqueue(this.retainedEvents[0]))) {
        return;
      }
      this.retainedEvents.shift();
    }
  }

  private kick(): Promise<void> {
    if (!this.draining) {
      this.draining = this.drain().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  private async drain(): Promise<void> {
    while (this.buffer.length > 0) {
      const event = this.buffer[0];
      try {
        await this.sink.record(event);
      } catch (error) {
        this.onSinkFailure(event, error);
        if (this.closed) {
          this.abandon();
          return;
        }
        await delay(this.options.sinkRetryDelayMs);
        continue;
      }

      if (this.consecutiveSinkFailures >= (this.options.sinkAlertAfter ?? DEFAULT_SINK_ALERT_AFTER)) {
        this.logger.log(
          { type: 'delivery_event_sink_recovered', failedWrites: this.consecutiveSinkFailures },
          'DeliveryEventPublisher'
        );
      }
      this.consecutiveSinkFailures = 0;
      this.buffer.shift();
      this.options.metrics?.setEventBufferDepth(this.buffer.length);
      this.options.metrics?.incEventRecorded(event.outcome);
      this.spaceWaiters.shift()?.();
      await this.afterRecorded(event);
    }
  }

  private onSinkFailure(event: DeliveryEvent, error: unknown): void {
    this.consecutiveSinkFailures += 1;
    const reason = errorMessage(error, 'sink_error');
    if (this.consecutiveSinkFailures === (this.options.sinkAlertAfter ?? DEFAULT_SINK_ALERT_AFTER)) {
      this.options.metrics?.incEventSinkAlert();
      this.logger.error(
        { type: 'delivery_event_sink_unavailable', consecutiveFailures: this.consecutiveSinkFailures, reason },
        error instanceof Error ? error.stack : undefined,
        'DeliveryEventPublisher'
      );
      return;
    }
    this.logger.warn(
      { type: 'delivery_event_sink_failed', eventId: event.id, consecutiveFailures: this.consecutiveSinkFailures, reason },
      'DeliveryEventPublisher'
    );
  }

  private async afterRecorded(event: DeliveryEvent): Promise<void> {
    if (!this.options.onRecorded) {
      return;
    }
    try {
      await this.options.onRecorded(event);
    } catch (error) {
      this.logger.error(
        { type: 'delivery_event_post_record_failed', eventId: event.id, taskId: event.taskId },
        error instanceof Error ? error.stack : undefined,
        'DeliveryEventPublisher'
      );
    }
  }

  private abandon(): void {
    const dropped = this.buffer.splice(0, this.buffer.length);
    this.options.metrics?.setEventBufferDepth(0);
    for (const waiter of this.spaceWaiters.splice(0, this.spaceWaiters.length)) {
      waiter();
    }
    this.logger.error(
      { type: 'delivery_events_abandoned_on_close', count: dropped.length, events: dropped },
      undefined,
      'DeliveryEventPublisher'
    );
  }

  /** Waits for a free slot, giving up once `offerTimeoutMs` has passed since the call. */
  private async waitUntilRoom(): Promise<boolean> {
    const expiry = new AbortController();
    const timer = setTimeout(() => expiry.abort(), this.options.offerTimeoutMs);
    try {
      while (this.buffer.length >= this.options.capacity) {
        if (!(await this.waitForSpace(expiry.signal))) {
          return false;
        }
      }
      return true;
    } finally {
      clearTimeout(timer);
    }
  }

  private waitForSpace(expiry: AbortSignal): Promise<boolean> {
    if (expiry.aborted) {
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      const onExpiry = (): void => {
        const index = this.spaceWaiters.indexOf(waiter);
        if (index >= 0) {
          this.spaceWaiters.splice(index, 1);
        }
        resolve(false);
      };
      const waiter = (): void => {
        expiry.removeEventListener('abort', onExpiry);
        resolve(true);
      };
      this.spaceWaiters.push(waiter);
      expiry.addEventListener('abort', onExpiry, { once: true });
    });
  }
}
