import { Job, Queue, Worker } from 'bullmq';
import { TickReport } from '../core/campaign-scheduler';
import { errorMessage } from '../domain/errors';
import { Logger, silentLogger } from './logger';

type RedisConnection = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
};

export function redisConnectionFromUrl(redisUrl: string): RedisConnection {
  const url = new URL(redisUrl);
  const db = url.pathname.replace('/', '');
  return {
    host: url.hostname || '127.0.0.1',
    port: Number(url.port || 6379),
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: db ? Number(db) : undefined
  };
}

type SchedulerTickJob = {
  requestedAt: string;
};

export type TickRunner = {
  start(): Promise<void>;
  stop(): Promise<void>;
};

/**
 * Drives `tick` from a repeatable BullMQ job, so only one worker process
 * scans campaigns per interval no matter how many are running.
 */
export class BullmqTickRunner implements TickRunner {
  private readonly connection: RedisConnection;
  private readonly queue: Queue<SchedulerTickJob>;
  private worker: Worker<SchedulerTickJob, TickReport> | null = null;

  constructor(
    private readonly tick: () => Promise<TickReport>,
    private readonly options: { redisUrl: string; queueName: string; everyMs: number },
    private readonly logger: Logger = silentLogger
  ) {
    this.connection = redisConnectionFromUrl(options.redisUrl);
    this.queue = new Queue<SchedulerTickJob>(options.queueName, { connection: this.connection });
  }

  async start(): Promise<void> {
    await this.queue.add(
      'scheduler:tick',
      { requestedAt: new Date().toISOString() },
      {
        repeat: { every: this.options.everyMs },
        removeOnComplete: 100,
        removeOnFail: 500
      }
    );

    const worker = new Worker<SchedulerTickJob, TickReport>(
      this.options.queueName,
      async (_job: Job<SchedulerTickJob>) => this.tick(),
      { connection: this.connection, concurrency: 1 }
    );

    worker.on('failed', (job, err) => {
      this.logger.error(
        { type: 'scheduler_tick_failed', jobId: job?.id, reason: errorMessage(err, 'tick_failed') },
        err.stack,
        'BullmqTickRunner'
      );
    });

    this.worker = worker;
  }

  async stop(): Promise<void> {
    await this.worker?.close();
    this.worker = null;
    await this.queue.close();
  }
}

/** In-process ticks on a timer. A tick never overlaps the previous one. */
export class IntervalTickRunner implements TickRunner {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly tick: () => Promise<TickReport>,
    private readonly everyMs: number,
    private readonly logger: Logger = silentLogger
  ) {}

  async start(): Promise<void> {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.runTick();
    }, this.everyMs);
    await this.runTick();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.running;
  }

  private runTick(): Promise<void> {
    if (this.running) {
      return this.running;
    }

    this.running = this.tick()
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error(
            { type: 'scheduler_tick_failed', reason: errorMessage(error, 'tick_failed') },
            error instanceof Error ? error.stack : undefined,
            'IntervalTickRunner'
          );
        }
      )
      .finally(() => {
        this.running = null;
      });
    return this.running;
  }
}
