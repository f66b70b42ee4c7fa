import type { Socket } from 'node:net';
import type { FastifyInstance, FastifyReply, FastifyRequest, HTTPMethods } from 'fastify';
import { ConnectionPump } from '../http/connectionPump';
import { ServerResponseChannel } from '../http/nodeChannel';
import type { Dispatcher, InboundRequest } from '../http/types';
import type { WorkerMetrics } from '../metrics';

export type DataPlaneRouteOptions = {
  dispatcher: Dispatcher;
  metrics: WorkerMetrics;
};

const DATA_PLANE_METHODS: HTTPMethods[] = ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'];

/**
 * Hands every request that no other route claims to the connection pump of
 * its socket. Replies are hijacked: the pump writes the raw response itself.
 */
export async function registerDataPlaneRoutes(app: FastifyInstance, options: DataPlaneRouteOptions): Promise<void> {
  const pumps = new WeakMap<Socket, ConnectionPump>();
  let nextConnectionId = 0;

  const pumpFor = (socket: Socket): ConnectionPump => {
    const existing = pumps.get(socket);
    if (existing) {
      return existing;
    }
    nextConnectionId += 1;
    const connectionId = `conn-${nextConnectionId}`;
    const pump = new ConnectionPump({
      dispatcher: options.dispatcher,
      logger: app.log.child({ connectionId }),
      connectionId,
      onExchange: (record) => {
        options.metrics.recordExchange(record.method, record.route, record.status, record.durationSeconds);
      }
    });
    pumps.set(socket, pump);
    socket.once('close', () => {
      pump.peerClosed();
    });
    return pump;
  };

  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  const handleDataPlaneRequest = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    reply.hijack();
    const inbound: InboundRequest = {
      method: request.method,
      uri: request.raw.url ?? request.url,
      httpVersion: request.raw.httpVersion,
      headers: request.headers,
      body: Buffer.isBuffer(request.body) ? request.body : null
    };
    await pumpFor(request.raw.socket).receive(inbound, new ServerResponseChannel(reply.raw));
  };

  app.route({
    method: DATA_PLANE_METHODS,
    url: '*',
    exposeHeadRoute: false,
    handler: handleDataPlaneRequest
  });

  app.setNotFoundHandler(handleDataPlaneRequest);
}
