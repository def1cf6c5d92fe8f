import { Engine, createEngine } from './engine';
import { errorMessage } from './domain/errors';
import { AmqpDeliveryEventSink } from './infra/amqp-delivery-event-sink';
import { loadEngineConfig } from './infra/config';
import { DbClient } from './infra/db-client';
import { Logger, StructuredLogger } from './infra/logger';
import { WorkerMetrics } from './infra/metrics';
import { PostgresCampaignRepository } from './infra/postgres-campaign-repository';
import { PostgresEnrollmentStore } from './infra/postgres-enrollment-store';
import { PostgresSendTaskStore } from './infra/postgres-task-store';
import { RedisRateBudgetStore } from './infra/redis-rate-budget-store';
import { BullmqTickRunner, IntervalTickRunner, TickRunner } from './infra/scheduler-tick-queue';
import { EnvCredentialStore } from './providers/credentials';
import { ProviderAdapterPool } from './providers/registry';

function trackQueueDepth(engine: Engine, intervalMs: number, logger: Logger): NodeJS.Timeout {
  const poll = async (): Promise<void> => {
    try {
      await engine.refreshQueueDepth();
    } catch (error) {
      logger.warn({ type: 'queue_depth_poll_failed', reason: errorMessage(error, 'unknown') }, 'main');
    }
  };

  const timer = setInterval(() => {
    void poll();
  }, intervalMs);

  timer.unref();
  void poll();
  return timer;
}

async function bootstrap(): Promise<void> {
  const config = loadEngineConfig();
  const logger = new StructuredLogger();
  const metrics = new WorkerMetrics();
  const db = new DbClient(config.databaseUrl);
  const repository = new PostgresCampaignRepository(db, config.defaultSender);

  const engine = createEngine(config, {
    repository,
    templates: repository,
    store: new PostgresSendTaskStore(db),
    enrollments: new PostgresEnrollmentStore(db),
    sink: new AmqpDeliveryEventSink(config.rabbitUrl, config.events.queue, logger),
    budgets: new RedisRateBudgetStore(config.redisUrl),
    credentials: new EnvCredentialStore(),
    adapters: ProviderAdapterPool.withDefaults(),
    logger,
    metrics
  });

  const tick = () => engine.scheduler.tick();
  const runner: TickRunner =
    config.scheduler.engine === 'bullmq'
      ? new BullmqTickRunner(
          tick,
          { redisUrl: config.redisUrl, queueName: config.scheduler.queueName, everyMs: config.scheduler.tickMs },
          logger
        )
      : new IntervalTickRunner(tick, config.scheduler.tickMs, logger);

  metrics.startServer(config.metricsPort);
  const depthTimer = trackQueueDepth(engine, config.queueDepthIntervalMs, logger);
  engine.dispatcher.start();
  await runner.start();

  logger.log(
    { type: 'worker_started', schedulerEngine: config.scheduler.engine, concurrency: config.dispatcher.concurrency },
    'main'
  );

  const shutdown = async (): Promise<void> => {
    logger.log({ type: 'worker_stopping' }, 'main');
    clearInterval(depthTimer);
    await runner.stop();
    await engine.close();
    await Promise.all([db.close(), metrics.stopServer()]);
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

bootstrap().catch((error: unknown) => {
  new StructuredLogger().error(
    { type: 'worker_boot_failed', reason: errorMessage(error, 'unknown') },
    error instanceof Error ? error.stack : undefined,
    'main'
  );
  process.exit(1);
});
