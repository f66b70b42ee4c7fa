import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { PagedCache } from '../cache/types';
import { assertUnreachable, describeError } from '../errors';
import type { FileSystemClient } from '../fs/types';
import type { WorkerMetrics } from '../metrics';
import { LoadJobRunner, createLoadProgress, type LoadProgress } from './jobRunner';
import { LoadQueue, type LoadJobPayload } from './queue';
import type { LoadOptions, LoadService, ProgressFormat } from './types';

export type LoadJobState = 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'STOPPED';

type LoadJobRecord = {
  jobId: string;
  path: string;
  options: LoadOptions;
  state: LoadJobState;
  controller: AbortController;
  progress: LoadProgress;
  startedAt: number;
  finishedAt: number | null;
  error: string | null;
  running: Promise<void> | null;
};

export interface LoadJobManagerOptions {
  fileSystem: FileSystemClient;
  pagedCache: PagedCache;
  metrics: WorkerMetrics;
  logger: FastifyBaseLogger;
  queue: {
    inlineMode: boolean;
    redisUrl: string;
    keyPrefix: string;
    queueName: string;
    concurrency?: number;
  };
  now?: () => number;
  /** Finished job records kept for progress queries. Defaults to 1000. */
  maxFinishedJobs?: number;
}

const DEFAULT_MAX_FINISHED_JOBS = 1000;

export type LoadProgressReport = {
  path: string;
  jobId: string;
  state: LoadJobState;
  filesDiscovered: number;
  filesLoaded: number;
  pagesLoaded: number;
  pagesSkipped: number;
  bytesLoaded: number;
  listingComplete: boolean;
  verified: boolean;
  failureCount: number;
  failedFiles?: string[];
  error: string | null;
  durationMs: number;
};

/**
 * Tracks one load job per path. Jobs are handed to a {@link LoadQueue} and
 * their progress is kept in this process, which is where the queue worker runs.
 */
export class LoadJobManager implements LoadService {
  private readonly jobs = new Map<string, LoadJobRecord>();
  private readonly runner: LoadJobRunner;
  private readonly queue: LoadQueue;
  private readonly metrics: WorkerMetrics;
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => number;
  private readonly maxFinishedJobs: number;

  constructor(options: LoadJobManagerOptions) {
    this.metrics = options.metrics;
    this.maxFinishedJobs = Math.max(0, options.maxFinishedJobs ?? DEFAULT_MAX_FINISHED_JOBS);
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.runner = new LoadJobRunner({
      fileSystem: options.fileSystem,
      pagedCache: options.pagedCache,
      now: this.now
    });
    this.queue = new LoadQueue(
      {
        ...options.queue,
        logger: options.logger
      },
      (payload) => this.process(payload)
    );
  }

  async load(path: string, options: LoadOptions): Promise<string> {
    const opType = options.opType ?? 'submit';
    switch (opType) {
      case 'submit':
        return this.submit(path, options);
      case 'stop':
        return this.stop(path);
      case 'progress':
        return this.progress(path, options);
      default:
        return assertUnreachable(opType);
    }
  }

  getJobState(path: string): LoadJobState | null {
    return this.jobs.get(path)?.state ?? null;
  }

  private async submit(path: string, options: LoadOptions): Promise<string> {
    let existing = this.jobs.get(path);
    if (existing && existing.state === 'STOPPED' && existing.running) {
      // a stopped runner may still be writing its current page
      await existing.running;
      existing = this.jobs.get(path);
    }
    if (existing && existing.state === 'RUNNING') {
      return `Load job for ${path} is already running`;
    }

    const record: LoadJobRecord = {
      jobId: randomUUID(),
      path,
      options,
      state: 'RUNNING',
      controller: new AbortController(),
      progress: createLoadProgress(),
      startedAt: this.now(),
      finishedAt: null,
      error: null,
      running: null
    };
    this.jobs.delete(path);
    this.jobs.set(path, record);

    try {
      await this.queue.enqueue({ jobId: record.jobId, path, options });
    } catch (err) {
      this.jobs.delete(path);
      throw err;
    }
    this.metrics.recordLoadJob('submitted');
    this.logger.info({ jobId: record.jobId, path }, 'load job submitted');
    return `Load job submitted for ${path}`;
  }

  private async stop(path: string): Promise<string> {
    const record = this.jobs.get(path);
    if (!record || record.state !== 'RUNNING') {
      return `No running load job for ${path}`;
    }
    record.state = 'STOPPED';
    record.finishedAt = this.now();
    record.controller.abort();
    this.metrics.recordLoadJob('stopped');
    this.logger.info({ jobId: record.jobId, path }, 'load job stopped');
    this.pruneFinished();
    return `Load job for ${path} stopped`;
  }

  private async progress(path: string, options: LoadOptions): Promise<string> {
    const record = this.jobs.get(path);
    if (!record) {
      return `No load job found for ${path}`;
    }
    const report = this.buildReport(record, options.verbose);
    return renderProgress(report, options.progressFormat);
  }

  private buildReport(record: LoadJobRecord, verbose: boolean): LoadProgressReport {
    const { progress } = record;
    const report: LoadProgressReport = {
      path: record.path,
      jobId: record.jobId,
      state: record.state,
      filesDiscovered: progress.filesDiscovered,
      filesLoaded: progress.filesLoaded,
      pagesLoaded: progress.pagesLoaded,
      pagesSkipped: progress.pagesSkipped,
      bytesLoaded: progress.bytesLoaded,
      listingComplete: progress.listingComplete,
      verified: progress.verified,
      failureCount: progress.failures.length,
      error: record.error,
      durationMs: (record.finishedAt ?? this.now()) - record.startedAt
    };
    if (verbose) {
      report.failedFiles = progress.failures.map((failure) => `${failure.path}: ${failure.reason}`);
    }
    return report;
  }

  private async process(payload: LoadJobPayload): Promise<void> {
    const record = this.jobs.get(payload.path);
    if (!record || record.jobId !== payload.jobId || record.state !== 'RUNNING') {
      return;
    }

    const running = this.execute(record);
    record.running = running;
    try {
      await running;
    } finally {
      record.running = null;
      this.pruneFinished();
    }
  }

  private async execute(record: LoadJobRecord): Promise<void> {
    try {
      await this.runner.run(record.path, record.options, record.progress, record.controller.signal);
    } catch (err) {
      record.error = describeError(err);
    }

    if (record.state !== 'RUNNING') {
      return;
    }
    record.finishedAt = this.now();
    if (record.error || record.progress.failures.length > 0) {
      record.state = 'FAILED';
      this.metrics.recordLoadJob('failed');
      this.logger.warn(
        { jobId: record.jobId, path: record.path, error: record.error, failures: record.progress.failures.length },
        'load job failed'
      );
    } else {
      record.state = 'SUCCEEDED';
      this.metrics.recordLoadJob('completed');
      this.logger.info(
        { jobId: record.jobId, path: record.path, files: record.progress.filesLoaded, bytes: record.progress.bytesLoaded },
        'load job completed'
      );
    }
  }

  private pruneFinished(): void {
    let finished = 0;
    for (const record of this.jobs.values()) {
      if (record.state !== 'RUNNING' && !record.running) {
        finished += 1;
      }
    }
    for (const [path, record] of this.jobs) {
      if (finished <= this.maxFinishedJobs) {
        break;
      }
      if (record.state !== 'RUNNING' && !record.running) {
        this.jobs.delete(path);
        finished -= 1;
      }
    }
  }

  async whenIdle(): Promise<void> {
    await this.queue.whenIdle();
  }

  async close(): Promise<void> {
    for (const record of this.jobs.values()) {
      if (record.state === 'RUNNING') {
        record.controller.abort();
      }
    }
    await this.queue.close();
  }
}

export function renderProgress(report: LoadProgressReport, format: ProgressFormat): string {
  if (format === 'JSON') {
    return JSON.stringify(report);
  }
  const lines = [
    `Progress for loading path '${report.path}':`,
    `\tState: ${report.state}`,
    `\tFiles discovered: ${report.filesDiscovered}${report.listingComplete ? '' : ' (listing in progress)'}`,
    `\tFiles loaded: ${report.filesLoaded}`,
    `\tPages loaded: ${report.pagesLoaded}`,
    `\tPages skipped: ${report.pagesSkipped}`,
    `\tBytes loaded: ${report.bytesLoaded}`,
    `\tFiles failed: ${report.failureCount}`
  ];
  if (report.error) {
    lines.push(`\tError: ${report.error}`);
  }
  if (report.failedFiles && report.failedFiles.length > 0) {
    lines.push('\tFailed files:', ...report.failedFiles.map((entry) => `\t\t${entry}`));
  }
  return lines.join('\n');
}
