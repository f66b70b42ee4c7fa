import fastify, { type FastifyError, type FastifyReply, type FastifyRequest } from 'fastify';
import { LocalPagedCache } from './cache/localPagedCache';
import type { PagedCache } from './cache/types';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { MalformedRequestError, WorkerHttpError } from './errors';
import { LocalFileSystemClient } from './fs/localFileSystem';
import type { FileSystemClient } from './fs/types';
import { Router, renderError } from './http/router';
import { LoadJobManager } from './load/manager';
import type { LoadService } from './load/types';
import { createLoggerOptions } from './logger';
import { metricsPlugin } from './plugins/metrics';
import { registerDataPlaneRoutes } from './routes/dataPlane';

export type WorkerCollaborators = {
  fileSystem?: FileSystemClient;
  pagedCache?: PagedCache;
  loadService?: LoadService;
};

export type BuildAppOptions = {
  config?: ServiceConfig;
  collaborators?: WorkerCollaborators;
};

export async function buildApp(options?: BuildAppOptions) {
  const config = options?.config ?? loadServiceConfig();
  const collaborators = options?.collaborators ?? {};

  const app = fastify({
    logger: createLoggerOptions(config.logLevel),
    keepAliveTimeout: config.keepAliveTimeoutMs,
    bodyLimit: config.bodyLimitBytes,
    frameworkErrors: (err: FastifyError, _request: FastifyRequest, reply: FastifyReply) => {
      const rendered = renderError(new MalformedRequestError(err.message, { fastifyCode: err.code }));
      reply.code(rendered.status).headers(rendered.headers).send(rendered.body);
    }
  });

  await app.register(metricsPlugin, { enabled: config.metricsEnabled });

  const fileSystem: FileSystemClient = collaborators.fileSystem ?? new LocalFileSystemClient(config.storage.rootDir);
  const pagedCache: PagedCache =
    collaborators.pagedCache ??
    new LocalPagedCache({ cacheDir: config.storage.cacheDir, pageSize: config.pageSizeBytes });

  let loadManager: LoadJobManager | null = null;
  let loadService = collaborators.loadService;
  if (!loadService) {
    loadManager = new LoadJobManager({
      fileSystem,
      pagedCache,
      metrics: app.metrics.worker,
      logger: app.log.child({ component: 'load' }),
      queue: {
        inlineMode: config.load.mode === 'inline',
        redisUrl: config.load.redisUrl,
        keyPrefix: config.load.keyPrefix,
        queueName: config.load.queueName,
        concurrency: config.load.concurrency
      }
    });
    loadService = loadManager;
  }

  const router = Router.create({
    fileSystem,
    pagedCache,
    loadService,
    metrics: app.metrics.worker,
    logger: app.log
  });

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof WorkerHttpError) {
      const rendered = renderError(err);
      reply.code(rendered.status).headers(rendered.headers).send(rendered.body);
      return;
    }
    const status = typeof err.statusCode === 'number' && err.statusCode >= 400 ? err.statusCode : 500;
    if (status >= 500) {
      request.log.error({ err }, 'unhandled request error');
    }
    reply.code(status).send({
      error: {
        code: status >= 500 ? 'BACKEND_IO' : 'MALFORMED_REQUEST',
        message: err.message,
        details: err.code ? { fastifyCode: err.code } : null
      }
    });
  });

  await registerDataPlaneRoutes(app, { dispatcher: router, metrics: app.metrics.worker });

  app.addHook('onClose', async () => {
    if (loadManager) {
      await loadManager.close();
    }
  });

  return { app, config, router, loadManager };
}
