import type { FastifyBaseLogger } from 'fastify';
import type { PagedCache } from '../cache/types';
import type { FileSystemClient } from '../fs/types';
import type { RequestDescriptor } from '../http/requestUri';
import type { ResponseContext } from '../http/responseContext';
import type { LoadService } from '../load/types';
import type { WorkerMetrics } from '../metrics';

export type OperationRequest = {
  method: string;
  descriptor: RequestDescriptor;
  body: Buffer | null;
};

export type OperationHandler = (request: OperationRequest) => Promise<ResponseContext>;

export type HandlerDependencies = {
  pagedCache: PagedCache;
  fileSystem: FileSystemClient;
  loadService: LoadService;
  metrics: WorkerMetrics;
  logger: FastifyBaseLogger;
};
