import http from 'node:http';
import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import { DeliveryOutcome } from '../domain/types';

type EngineCounters = {
  tasksSent: Counter;
  tasksFailed: Counter;
  rateLimited: Counter;
  retried: Counter;
  tasksMaterialized: Counter;
  renderFailures: Counter;
  credentialAlerts: Counter;
  eventsRecorded: Counter;
  eventOfferTimeouts: Counter;
  eventSinkAlerts: Counter;
};

type EngineGauges = {
  queueDepth: Gauge;
  eventBufferDepth: Gauge;
};

export class WorkerMetrics {
  readonly registry = new Registry();
  private readonly counters: EngineCounters;
  private readonly gauges: EngineGauges;
  private server: http.Server | null = null;

  constructor(options: { collectDefaults?: boolean } = {}) {
    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.counters = {
      tasksSent: new Counter({
        name: 'dispatch_tasks_sent_total',
        help: 'Send tasks accepted by a provider',
        labelNames: ['provider'],
        registers: [this.registry]
      }),
      tasksFailed: new Counter({
        name: 'dispatch_tasks_failed_total',
        help: 'Send tasks that ended failed',
        labelNames: ['provider', 'outcome'],
        registers: [this.registry]
      }),
      rateLimited: new Counter({
        name: 'dispatch_rate_limited_total',
        help: 'Pickups deferred by the rate limiter',
        labelNames: ['provider', 'window'],
        registers: [this.registry]
      }),
      retried: new Counter({
        name: 'dispatch_retries_total',
        help: 'Attempts rescheduled after a transient failure',
        labelNames: ['provider'],
        registers: [this.registry]
      }),
      tasksMaterialized: new Counter({
        name: 'scheduler_tasks_materialized_total',
        help: 'Send tasks created by the campaign scheduler',
        labelNames: ['kind'],
        registers: [this.registry]
      }),
      renderFailures: new Counter({
        name: 'scheduler_render_failures_total',
        help: 'Recipients skipped because their template failed to render',
        registers: [this.registry]
      }),
      credentialAlerts: new Counter({
        name: 'dispatch_credential_alerts_total',
        help: 'Credential resolution failures per account and provider',
        labelNames: ['provider'],
        registers: [this.registry]
      }),
      eventsRecorded: new Counter({
        name: 'delivery_events_recorded_total',
        help: 'Delivery events accepted by the sink',
        labelNames: ['outcome'],
        registers: [this.registry]
      }),
      eventOfferTimeouts: new Counter({
        name: 'delivery_events_offer_timeouts_total',
        help: 'Delivery events that waited too long for buffer space',
        registers: [this.registry]
      }),
      eventSinkAlerts: new Counter({
        name: 'delivery_events_sink_alerts_total',
        help: 'Times the event sink kept failing past the alert threshold',
        registers: [this.registry]
      })
    };

    this.gauges = {
      queueDepth: new Gauge({
        name: 'dispatch_queue_depth',
        help: 'Send tasks by status',
        labelNames: ['status'],
        registers: [this.registry]
      }),
      eventBufferDepth: new Gauge({
        name: 'delivery_event_buffer_depth',
        help: 'Delivery events waiting for the sink',
        registers: [this.registry]
      })
    };
  }

  startServer(port = Number(process.env.WORKER_METRICS_PORT ?? 9464)): void {
    this.server = http.createServer(async (req, res) => {
      if (req.url !== '/metrics') {
        res.statusCode = 404;
        res.end('not found');
        return;
      }

      const metrics = await this.registry.metrics();
      res.statusCode = 200;
      res.setHeader('Content-Type', this.registry.contentType);
      res.end(metrics);
    });

    this.server.listen(port);
  }

  async stopServer(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  incSent(provider: string): void {
    this.counters.tasksSent.inc({ provider });
  }

  incFailed(provider: string, outcome: DeliveryOutcome): void {
    this.counters.tasksFailed.inc({ provider, outcome });
  }

  incRateLimited(provider: string, window: string): void {
    this.counters.rateLimited.inc({ provider, window });
  }

  incRetried(provider: string): void {
    this.counters.retried.inc({ provider });
  }

  incMaterialized(kind: string): void {
    this.counters.tasksMaterialized.inc({ kind });
  }

  incRenderFailure(): void {
    this.counters.renderFailures.inc();
  }

  incCredentialAlert(provider: string): void {
    this.counters.credentialAlerts.inc({ provider });
  }

  incEventRecorded(outcome: DeliveryOutcome): void {
    this.counters.eventsRecorded.inc({ outcome });
  }

  incEventOfferTimeout(): void {
    this.counters.eventOfferTimeouts.inc();
  }

  incEventSinkAlert(): void {
    this.counters.eventSinkAlerts.inc();
  }

  setQueueDepth(status: string, depth: number): void {
    this.gauges.queueDepth.set({ status }, depth);
  }

  setEventBufferDepth(depth: number): void {
    this.gauges.eventBufferDepth.set(depth);
  }
}
