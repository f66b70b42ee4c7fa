import { Queue, Worker, type Job } from 'bullmq';
import IORedis, { type Redis } from 'ioredis';
import type { FastifyBaseLogger } from 'fastify';
import type { LoadOptions } from './types';

export interface LoadJobPayload {
  jobId: string;
  path: string;
  options: LoadOptions;
}

export interface LoadQueueOptions {
  queueName: string;
  redisUrl: string;
  inlineMode: boolean;
  keyPrefix: string;
  concurrency?: number;
  logger: FastifyBaseLogger;
}

export type LoadJobProcessor = (payload: LoadJobPayload) => Promise<void>;

/**
 * Runs load jobs either in-process (inline mode) or through a BullMQ queue
 * whose worker lives in this process. `enqueue` never waits for the job.
 */
export class LoadQueue {
  private readonly options: LoadQueueOptions;
  private readonly processor: LoadJobProcessor;
  private readonly inflight = new Set<Promise<void>>();
  private connection: Redis | null = null;
  private queue: Queue<LoadJobPayload> | null = null;
  private worker: Worker<LoadJobPayload> | null = null;
  private workerConnection: Redis | null = null;
  private readyPromise: Promise<void> | null = null;

  constructor(options: LoadQueueOptions, processor: LoadJobProcessor) {
    this.options = options;
    this.processor = processor;
  }

  get inlineMode(): boolean {
    return this.options.inlineMode;
  }

  private async ensureQueue(): Promise<void> {
    if (this.options.inlineMode || this.queue) {
      return;
    }

    if (!this.readyPromise) {
      this.readyPromise = this.createQueue().catch((err: unknown) => {
        this.readyPromise = null;
        throw err;
      });
    }

    await this.readyPromise;
  }

  private async createQueue(): Promise<void> {
    const logger = this.options.logger;
    const connection = new IORedis(this.options.redisUrl, {
      maxRetriesPerRequest: null,
      lazyConnect: true
    });

    connection.on('error', (err) => {
      logger.error({ err }, 'load queue redis connection error');
    });

    let workerConnection: Redis | null = null;
    let worker: Worker<LoadJobPayload> | null = null;
    let queue: Queue<LoadJobPayload> | null = null;
    const prefix = `${this.options.keyPrefix}:bull`;

    try {
      if (connection.status === 'wait') {
        await connection.connect();
      }
      await connection.ping();

      queue = new Queue<LoadJobPayload>(this.options.queueName, { connection, prefix });

      workerConnection = connection.duplicate();
      if (workerConnection.status === 'wait') {
        await workerConnection.connect();
      }

      worker = new Worker<LoadJobPayload>(
        this.options.queueName,
        async (job: Job<LoadJobPayload>) => {
          await this.processor(job.data);
        },
        {
          connection: workerConnection,
          concurrency: this.options.concurrency ?? 1,
          prefix
        }
      );

      worker.on('error', (err) => {
        logger.error({ err }, 'load queue worker error');
      });

      await worker.waitUntilReady();

      this.connection = connection;
      this.queue = queue;
      this.worker = worker;
      this.workerConnection = workerConnection;
    } catch (err) {
      await Promise.allSettled([worker?.close(), queue?.close(), workerConnection?.quit()]);
      connection.removeAllListeners();
      await connection.quit().catch((quitErr: unknown) => {
        logger.debug({ err: quitErr }, 'failed to quit load queue redis connection after init failure');
      });
      throw err instanceof Error ? err : new Error(String(err));
    }
  }

  async ensureReady(): Promise<void> {
    await this.ensureQueue();
  }

  async enqueue(payload: LoadJobPayload): Promise<void> {
    if (this.options.inlineMode) {
      this.runInline(payload);
      return;
    }

    await this.ensureQueue();

    if (!this.queue) {
      throw new Error('Load queue not initialised');
    }

    await this.queue.add('load', payload, {
      jobId: payload.jobId,
      removeOnComplete: true,
      removeOnFail: false
    });
  }

  private runInline(payload: LoadJobPayload): void {
    const task = this.processor(payload)
      .catch((err: unknown) => {
        this.options.logger.error({ err, jobId: payload.jobId, path: payload.path }, 'inline load job failed');
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  /** Resolves once every inline job started so far has finished. */
  async whenIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  async close(): Promise<void> {
    const logger = this.options.logger;
    await this.whenIdle();

    if (this.worker) {
      await this.worker.close().catch((err: unknown) => logger.error({ err }, 'failed to close load worker'));
      this.worker = null;
    }

    if (this.workerConnection) {
      await this.workerConnection
        .quit()
        .catch((err: unknown) => logger.error({ err }, 'failed to close load worker redis connection'));
      this.workerConnection = null;
    }

    if (this.queue) {
      await this.queue.close().catch((err: unknown) => logger.error({ err }, 'failed to close load queue'));
      this.queue = null;
    }

    if (this.connection) {
      await this.connection
        .quit()
        .catch((err: unknown) => logger.error({ err }, 'failed to close load queue redis connection'));
      this.connection = null;
    }

    this.readyPromise = null;
  }
}
