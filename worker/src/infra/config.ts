import { ValidationError } from '../domain/errors';
import { Sender, SendWindow } from '../domain/types';
import { RateLimitConfig, SendCeilings } from '../core/rate-limiter';
import { RetryPolicyConfig } from '../core/retry-policy';
import { DispatcherOptions } from '../core/dispatcher';
import { parseClock, validateSendWindow } from '../core/send-window';

type Env = Record<string, string | undefined>;

export type SchedulerEngine = 'interval' | 'bullmq';

export type EngineConfig = {
  rateLimits: RateLimitConfig;
  retry: RetryPolicyConfig;
  dispatcher: DispatcherOptions;
  sendWindows: Record<string, SendWindow>;
  scheduler: {
    engine: SchedulerEngine;
    tickMs: number;
    queueName: string;
  };
  events: {
    capacity: number;
    offerTimeoutMs: number;
    sinkRetryDelayMs: number;
    sinkAlertAfter: number;
    queue: string;
  };
  defaultSender: Sender;
  redisUrl: string;
  databaseUrl?: string;
  rabbitUrl: string;
  metricsPort: number;
  queueDepthIntervalMs: number;
};

const WEEKDAYS: Record<string, number> = { sun: 0, mon: 1, tue: 2, wed: 3, thu: 4, fri: 5, sat: 6 };

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const sendTimeoutMs = positiveInt(env, 'PROVIDER_SEND_TIMEOUT_MS', 30_000);
  const claimTimeoutMs = positiveInt(env, 'DISPATCHER_CLAIM_TIMEOUT_MS', 120_000);
  if (claimTimeoutMs <= sendTimeoutMs) {
    throw new ValidationError('invalid_config:DISPATCHER_CLAIM_TIMEOUT_MS');
  }

  return {
    rateLimits: {
      defaults: parseCeilings(env.RATE_LIMIT_DEFAULT ?? '500/5000', 'RATE_LIMIT_DEFAULT'),
      byAccount: parseAccountLimits(env.RATE_LIMITS ?? '')
    },
    retry: {
      maxAttempts: positiveInt(env, 'RETRY_MAX_ATTEMPTS', 5),
      baseDelayMs: positiveInt(env, 'RETRY_BASE_DELAY_MS', 30_000),
      maxDelayMs: positiveInt(env, 'RETRY_MAX_DELAY_MS', 3_600_000),
      jitterRatio: ratio(env, 'RETRY_JITTER_RATIO', 0.2)
    },
    dispatcher: {
      concurrency: positiveInt(env, 'DISPATCHER_CONCURRENCY', 10),
      pollIntervalMs: positiveInt(env, 'DISPATCHER_POLL_INTERVAL_MS', 1000),
      sendTimeoutMs,
      credentialRecheckMs: positiveInt(env, 'CREDENTIAL_RECHECK_MS', 300_000),
      claimTimeoutMs
    },
    sendWindows: parseSendWindows(env.SEND_WINDOWS ?? ''),
    scheduler: {
      engine: parseEngine(env.SCHEDULER_ENGINE ?? 'interval'),
      tickMs: positiveInt(env, 'SCHEDULER_TICK_MS', 15_000),
      queueName: env.BULLMQ_SCHEDULER_QUEUE ?? 'campaign.scheduler'
    },
    events: {
      capacity: positiveInt(env, 'EVENT_BUFFER_CAPACITY', 1000),
      offerTimeoutMs: positiveInt(env, 'EVENT_OFFER_TIMEOUT_MS', 5000),
      sinkRetryDelayMs: positiveInt(env, 'EVENT_SINK_RETRY_DELAY_MS', 1000),
      sinkAlertAfter: positiveInt(env, 'EVENT_SINK_ALERT_AFTER', 5),
      queue: env.RABBITMQ_EVENTS_QUEUE ?? 'delivery.events'
    },
    defaultSender: {
      email: env.DEFAULT_FROM_EMAIL ?? 'noreply@example.com',
      name: env.DEFAULT_FROM_NAME ?? 'Campaigns'
    },
    redisUrl: env.REDIS_URL ?? 'redis://127.0.0.1:6379',
    databaseUrl: env.DATABASE_URL,
    rabbitUrl: env.RABBITMQ_URL ?? 'amqp://localhost:5672',
    metricsPort: positiveInt(env, 'WORKER_METRICS_PORT', 9464),
    queueDepthIntervalMs: positiveInt(env, 'WORKER_QUEUE_DEPTH_INTERVAL_MS', 15_000)
  };
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`invalid_config:${name}`);
  }
  return value;
}

function ratio(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError(`invalid_config:${name}`);
  }
  return value;
}

function parseEngine(raw: string): SchedulerEngine {
  const engine = raw.trim().toLowerCase();
  if (engine !== 'interval' && engine !== 'bullmq') {
    throw new ValidationError(`invalid_config:SCHEDULER_ENGINE`);
  }
  return engine;
}

/** `hourly/daily`, e.g. `200/2000`. */
export function parseCeilings(raw: string, source: string): SendCeilings {
  const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(raw);
  if (!match) {
    throw new ValidationError(`invalid_config:${source}`);
  }
  const hourly = Number(match[1]);
  const daily = Number(match[2]);
  if (hourly <= 0 || daily <= 0 || hourly > daily) {
    throw new ValidationError(`invalid_config:${source}`);
  }
  return { hourly, daily };
}

/** Comma-separated `account:hourly/daily` entries. */
export function parseAccountLimits(raw: string): Record<string, SendCeilings> {
  const limits: Record<string, SendCeilings> = {};
  for (const entry of splitList(raw)) {
    const separator = entry.lastIndexOf(':');
    if (separator <= 0) {
      throw new ValidationError(`invalid_config:RATE_LIMITS:${entry}`);
    }
    const accountId = entry.slice(0, separator).trim();
    limits[accountId] = parseCeilings(entry.slice(separator + 1), `RATE_LIMITS:${accountId}`);
  }
  return limits;
}

/**
 * Semicolon-separated `id=days@HH:MM-HH:MM[±HH:MM]` entries, where days is a
 * comma list or range of weekday names: `business=mon-fri@09:00-17:00-03:00`.
 */
export function parseSendWindows(raw: string): Record<string, SendWindow> {
  const windows: Record<string, SendWindow> = {};
  for (const entry of raw.split(';').map((item) => item.trim()).filter(Boolean)) {
    const match = /^([\w-]+)=([a-z,-]+)@(\d{1,2}:\d{2})-(\d{1,2}:\d{2})(?:([+-])(\d{2}):(\d{2}))?$/i.exec(entry);
    if (!match) {
      throw new ValidationError(`invalid_config:SEND_WINDOWS:${entry}`);
    }

    const [, id, days, start, end, sign, offsetHours, offsetMinutes] = match;
    const offset = sign ? (Number(offsetHours) * 60 + Number(offsetMinutes)) * (sign === '-' ? -1 : 1) : 0;
    const window: SendWindow = {
      id,
      weekdays: parseWeekdays(days, id),
      startMinute: parseClock(start),
      endMinute: parseClock(end),
      utcOffsetMinutes: offset
    };
    validateSendWindow(window);
    windows[id] = window;
  }
  return windows;
}

function parseWeekdays(raw: string, windowId: string): number[] {
  const days = new Set<number>();
  for (const part of raw.toLowerCase().split(',')) {
    const [from, to] = part.split('-');
    const start = WEEKDAYS[from];
    const finish = to === undefined ? start : WEEKDAYS[to];
    if (start === undefined || finish === undefined) {
      throw new ValidationError(`send_window_invalid_weekdays:${windowId}`);
    }
    for (let day = start; ; day = (day + 1) % 7) {
      days.add(day);
      if (day === finish) {
        break;
      }
    }
  }
  return [...days].sort((a, b) => a - b);
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}
