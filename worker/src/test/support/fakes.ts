import { Clock } from '../../core/clock';
import { DeliveryEventSink } from '../../core/delivery-events';
import { DeliveryEvent, NewSendTask, ProviderKind, RenderedMessage, SendWindow } from '../../domain/types';
import { EngineConfig } from '../../infra/config';
import { Credentials, FetchLike, ProviderAdapter, SendResult } from '../../providers/types';

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string = '2026-03-02T10:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(at: Date | string): void {
    this.current = new Date(at).getTime();
  }
}

/** Holds every write until `open()` is called. */
export class GatedSink implements DeliveryEventSink {
  readonly recorded: DeliveryEvent[] = [];
  private release: (() => void) | null = null;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = () => resolve();
  });

  open(): void {
    this.release?.();
  }

  async record(item: DeliveryEvent): Promise<void> {
    await this.gate;
    this.recorded.push(item);
  }
}

type ScriptStep = SendResult | Error | ((signal: AbortSignal) => Promise<SendResult>);

/** Replays queued results in order, then accepts everything. */
export class ScriptedAdapter implements ProviderAdapter {
  readonly calls: Array<{ message: RenderedMessage; credentials: Credentials }> = [];
  private readonly script: ScriptStep[] = [];
  private sequence = 0;

  constructor(readonly kind: ProviderKind = 'transactional_api') {}

  enqueue(...steps: ScriptStep[]): this {
    this.script.push(...steps);
    return this;
  }

  async send(message: RenderedMessage, credentials: Credentials, signal: AbortSignal): Promise<SendResult> {
    this.calls.push({ message, credentials });
    const step = this.script.shift();
    if (step === undefined) {
      this.sequence += 1;
      return { status: 'accepted', providerMessageId: `msg-${this.sequence}` };
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(signal);
    }
    return step;
  }
}

export function never(signal: AbortSignal): Promise<SendResult> {
  return new Promise<SendResult>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

export type RecordedRequest = { url: string; init: RequestInit };

export function fakeFetch(
  respond: (request: RecordedRequest) => Response | Promise<Response>
): FetchLike & { requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fn = async (url: string, init: RequestInit): Promise<Response> => {
    const request = { url, init };
    requests.push(request);
    return respond(request);
  };
  return Object.assign(fn, { requests });
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers }
  });
}

export function message(overrides: Partial<RenderedMessage> = {}): RenderedMessage {
  return {
    subject: 'Hello Ana',
    html: '<p>Hello Ana</p>',
    text: 'Hello Ana',
    from: { email: 'news@example.com', name: 'News' },
    to: { email: 'ana@example.com', name: 'Ana' },
    headers: { 'X-Campaign-Id': 'camp-1' },
    ...overrides
  };
}

export function newTask(recipientId: string, overrides: Partial<NewSendTask> = {}): NewSendTask {
  return {
    campaignId: 'camp-1',
    stepId: 'step-0',
    recipientId,
    accountId: 'acct-1',
    provider: 'transactional_api',
    stepIndex: 0,
    message: message({ to: { email: `${recipientId}@example.com` } }),
    dueAt: new Date('2026-03-02T10:00:00.000Z'),
    ...overrides
  };
}

export const apiKey: Credentials = { kind: 'api_key', apiKey: 'test-secret' };

export const businessHours: SendWindow = {
  id: 'business',
  weekdays: [1, 2, 3, 4, 5],
  startMinute: 9 * 60,
  endMinute: 17 * 60,
  utcOffsetMinutes: 0
};

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    rateLimits: { defaults: { hourly: 1000, daily: 10_000 }, byAccount: {} },
    retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60_000, jitterRatio: 0 },
    dispatcher: { concurrency: 1, pollIntervalMs: 5, sendTimeoutMs: 200, credentialRecheckMs: 60_000, claimTimeoutMs: 1000 },
    sendWindows: { business: businessHours },
    scheduler: { engine: 'interval', tickMs: 1000, queueName: 'campaign.scheduler' },
    events: { capacity: 100, offerTimeoutMs: 50, sinkRetryDelayMs: 5, sinkAlertAfter: 5, queue: 'delivery.events' },
    defaultSender: { email: 'noreply@example.com', name: 'Campaigns' },
    redisUrl: 'redis://127.0.0.1:6379',
    rabbitUrl: 'amqp://localhost:5672',
    metricsPort: 9464,
    queueDepthIntervalMs: 15_000,
    ...overrides
  };
}
