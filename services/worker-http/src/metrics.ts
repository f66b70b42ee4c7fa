import { Counter, Gauge, Histogram, type Registry } from 'prom-client';

export type LoadJobOutcome = 'submitted' | 'completed' | 'failed' | 'stopped';

export interface WorkerMetrics {
  readonly registry: Registry;
  recordBytesRequested(bytes: number): void;
  recordBytesServed(bytes: number): void;
  cacheHitRate(): Promise<number>;
  recordExchange(method: string, route: string, status: number, durationSeconds: number): void;
  recordLoadJob(outcome: LoadJobOutcome): void;
  reset(): void;
}

export interface WorkerMetricsOptions {
  registry: Registry;
  prefix?: string;
}

const DEFAULT_PREFIX = 'worker_http_';

async function counterTotal(counter: Counter<string>): Promise<number> {
  const snapshot = await counter.get();
  return snapshot.values.reduce((sum, entry) => sum + entry.value, 0);
}

export function createWorkerMetrics(options: WorkerMetricsOptions): WorkerMetrics {
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const registers = [options.registry];

  const bytesRequested = new Counter({
    name: `${prefix}bytes_requested_total`,
    help: 'Bytes requested through page reads',
    registers
  });

  const bytesServed = new Counter({
    name: `${prefix}bytes_read_cache_total`,
    help: 'Bytes served from the page cache',
    registers
  });

  const hitRate = async (): Promise<number> => {
    const requested = await counterTotal(bytesRequested);
    if (requested <= 0) {
      return 0;
    }
    return (await counterTotal(bytesServed)) / requested;
  };

  new Gauge({
    name: `${prefix}cache_hit_rate`,
    help: 'Bytes served from cache divided by bytes requested',
    registers,
    async collect() {
      this.set(await hitRate());
    }
  });

  const requestsTotal = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of data-plane HTTP exchanges',
    labelNames: ['method', 'route', 'status'],
    registers
  });

  const requestDurationSeconds = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'Duration of data-plane HTTP exchanges',
    labelNames: ['method', 'route', 'status'],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers
  });

  const loadJobs = new Counter({
    name: `${prefix}load_jobs_total`,
    help: 'Load jobs grouped by outcome',
    labelNames: ['outcome'],
    registers
  });

  return {
    registry: options.registry,
    recordBytesRequested(bytes: number) {
      if (bytes > 0) {
        bytesRequested.inc(bytes);
      }
    },
    recordBytesServed(bytes: number) {
      if (bytes > 0) {
        bytesServed.inc(bytes);
      }
    },
    cacheHitRate: hitRate,
    recordExchange(method: string, route: string, status: number, durationSeconds: number) {
      requestsTotal.labels(method, route, String(status)).inc();
      requestDurationSeconds.labels(method, route, String(status)).observe(Math.max(0, durationSeconds));
    },
    recordLoadJob(outcome: LoadJobOutcome) {
      loadJobs.labels(outcome).inc();
    },
    reset() {
      options.registry.resetMetrics();
    }
  };
}
