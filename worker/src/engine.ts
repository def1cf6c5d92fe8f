import { CampaignRepository } from './core/campaign-repository';
import { CampaignScheduler } from './core/campaign-scheduler';
import { Clock, systemClock } from './core/clock';
import { DeliveryEventPublisher, DeliveryEventSink } from './core/delivery-events';
import { Dispatcher } from './core/dispatcher';
import { EnrollmentStore } from './core/enrollment-store';
import { RateBudgetStore, RateLimiter } from './core/rate-limiter';
import { JitterSource, RetryPolicy } from './core/retry-policy';
import { SendTaskStore } from './core/task-queue';
import { PlaceholderTemplateRenderer, TemplateSource } from './core/template-renderer';
import { SendTaskStatus } from './domain/types';
import { EngineConfig } from './infra/config';
import { Logger, silentLogger } from './infra/logger';
import { WorkerMetrics } from './infra/metrics';
import { CredentialStore } from './providers/credentials';
import { ProviderAdapterPool } from './providers/registry';

export type EngineDeps = {
  repository: CampaignRepository;
  templates: TemplateSource;
  store: SendTaskStore;
  enrollments: EnrollmentStore;
  sink: DeliveryEventSink;
  budgets: RateBudgetStore;
  credentials: CredentialStore;
  adapters: ProviderAdapterPool;
  clock?: Clock;
  logger?: Logger;
  metrics?: WorkerMetrics;
  random?: JitterSource;
};

export type Engine = {
  scheduler: CampaignScheduler;
  dispatcher: Dispatcher;
  limiter: RateLimiter;
  events: DeliveryEventPublisher;
  store: SendTaskStore;
  refreshQueueDepth(): Promise<void>;
  close(): Promise<void>;
};

const TRACKED_STATUSES: SendTaskStatus[] = ['pending', 'in_flight', 'deferred'];

export function createEngine(config: EngineConfig, deps: EngineDeps): Engine {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  const metrics = deps.metrics;

  const limiter = new RateLimiter(deps.budgets, config.rateLimits, clock);
  const retryPolicy = new RetryPolicy(config.retry, deps.random);
  const events = new DeliveryEventPublisher(deps.sink, {
    capacity: config.events.capacity,
    offerTimeoutMs: config.events.offerTimeoutMs,
    sinkRetryDelayMs: config.events.sinkRetryDelayMs,
    sinkAlertAfter: config.events.sinkAlertAfter,
    logger,
    metrics,
    onRecorded: async (event) => {
      if (event.taskId) {
        await deps.store.archive(event.taskId);
      }
    }
  });

  const dispatcher = new Dispatcher(
    {
      store: deps.store,
      limiter,
      adapters: deps.adapters,
      credentials: deps.credentials,
      retryPolicy,
      events,
      clock,
      logger,
      metrics
    },
    config.dispatcher
  );

  const scheduler = new CampaignScheduler({
    repository: deps.repository,
    renderer: new PlaceholderTemplateRenderer(deps.templates),
    store: deps.store,
    enrollments: deps.enrollments,
    events,
    sendWindows: config.sendWindows,
    clock,
    logger,
    metrics
  });

  return {
    scheduler,
    dispatcher,
    limiter,
    events,
    store: deps.store,
    refreshQueueDepth: async () => {
      for (const status of TRACKED_STATUSES) {
        metrics?.setQueueDepth(status, await deps.store.countByStatus(status));
      }
    },
    close: async () => {
      await dispatcher.stop();
      await events.close();
      await limiter.close();
      deps.adapters.close();
    }
  };
}
