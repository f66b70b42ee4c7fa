import type { FastifyBaseLogger } from 'fastify';
import { UnmatchedRouteError, WorkerHttpError } from '../errors';
import { createFileStatusHandler, createListFilesHandler } from '../handlers/fileInfo';
import { createHealthHandler } from '../handlers/health';
import { createLoadHandler } from '../handlers/load';
import { createPageReadHandler } from '../handlers/pageRead';
import { createPageWriteHandler } from '../handlers/pageWrite';
import type { HandlerDependencies, OperationHandler } from '../handlers/types';
import { parseRequestUri, type RequestDescriptor } from './requestUri';
import { ResponseContext } from './responseContext';
import type { DispatchResult, Dispatcher, InboundRequest } from './types';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export type OperationName = 'pageRead' | 'pageWrite' | 'listFiles' | 'fileStatus' | 'load' | 'health';

export const ROUTE_TABLE = {
  file: { GET: 'pageRead', POST: 'pageWrite', PUT: 'pageWrite' },
  files: { GET: 'listFiles' },
  info: { GET: 'fileStatus' },
  load: { GET: 'load' },
  health: { GET: 'health' }
} as const satisfies Record<string, Partial<Record<HttpMethod, OperationName>>>;

export type MappingPath = keyof typeof ROUTE_TABLE;

export function createOperationHandlers(deps: HandlerDependencies): Record<OperationName, OperationHandler> {
  return {
    pageRead: createPageReadHandler(deps),
    pageWrite: createPageWriteHandler(deps),
    listFiles: createListFilesHandler(deps),
    fileStatus: createFileStatusHandler(deps),
    load: createLoadHandler(deps),
    health: createHealthHandler()
  };
}

export function renderError(err: WorkerHttpError): ResponseContext {
  const headers: Record<string, string> = {};
  if (err instanceof UnmatchedRouteError && err.allowedMethods.length > 0) {
    headers.allow = err.allowedMethods.join(', ');
  }
  return ResponseContext.json(
    err.status,
    {
      error: {
        code: err.code,
        message: err.message,
        details: err.details ?? null
      }
    },
    headers
  );
}

const UNMATCHED_ROUTE = 'unmatched';

/**
 * Resolves `(method, mappingPath)` through a table built once at startup and
 * turns every {@link WorkerHttpError} into an error response. Anything else a
 * handler throws escapes to the caller.
 */
export class Router implements Dispatcher {
  private readonly routes = new Map<string, Map<string, OperationHandler>>();
  private readonly logger: FastifyBaseLogger;

  constructor(handlers: Record<OperationName, OperationHandler>, logger: FastifyBaseLogger) {
    this.logger = logger;
    for (const [mappingPath, methods] of Object.entries(ROUTE_TABLE)) {
      const byMethod = new Map<string, OperationHandler>();
      for (const [method, operation] of Object.entries(methods)) {
        byMethod.set(method, handlers[operation]);
      }
      this.routes.set(mappingPath, byMethod);
    }
  }

  static create(deps: HandlerDependencies): Router {
    return new Router(createOperationHandlers(deps), deps.logger);
  }

  resolve(method: string, mappingPath: string): OperationHandler {
    const byMethod = this.routes.get(mappingPath);
    if (!byMethod) {
      throw new UnmatchedRouteError(method, mappingPath);
    }
    const handler = byMethod.get(method.toUpperCase());
    if (!handler) {
      throw new UnmatchedRouteError(method, mappingPath, [...byMethod.keys()]);
    }
    return handler;
  }

  async dispatch(request: InboundRequest): Promise<DispatchResult> {
    let descriptor: RequestDescriptor | null = null;
    let route = UNMATCHED_ROUTE;
    try {
      descriptor = parseRequestUri(request.uri);
      const handler = this.resolve(request.method, descriptor.mappingPath);
      route = descriptor.mappingPath;
      const response = await handler({ method: request.method, descriptor, body: request.body });
      return { response, route };
    } catch (err) {
      if (err instanceof WorkerHttpError) {
        this.logger.debug(
          { code: err.code, method: request.method, uri: request.uri, mappingPath: descriptor?.mappingPath ?? null },
          'request rejected'
        );
        return { response: renderError(err), route };
      }
      throw err;
    }
  }
}
