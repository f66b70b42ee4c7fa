import type { IncomingHttpHeaders } from 'node:http';
import { performance } from 'node:perf_hooks';
import type { FastifyBaseLogger } from 'fastify';
import type { ResponseContext, ResponseHeaders } from './responseContext';
import type { Dispatcher, InboundRequest } from './types';

export type PumpState = 'awaiting-request' | 'request-received' | 'dispatched' | 'response-written' | 'closed';

export type CloseReason = 'not-keep-alive' | 'fault' | 'write-failed';

/** The write side of one exchange. */
export interface ResponseChannel {
  writeHead(status: number, headers: ResponseHeaders): void;
  writePayload(payload: Buffer): Promise<void>;
  /** Writes the end-of-message marker and resolves once the response is flushed. */
  end(body?: Buffer): Promise<void>;
  close(reason: CloseReason): void;
}

export type ExchangeRecord = {
  connectionId: string;
  method: string;
  route: string;
  status: number;
  durationSeconds: number;
};

export interface ConnectionPumpOptions {
  dispatcher: Dispatcher;
  logger: FastifyBaseLogger;
  connectionId: string;
  onExchange?: (record: ExchangeRecord) => void;
  now?: () => number;
}

function normalizeVersion(httpVersion: string): string {
  return httpVersion.trim().toUpperCase().replace(/^HTTP\//, '');
}

function connectionTokens(headers: IncomingHttpHeaders): string[] {
  const raw = headers.connection;
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token.length > 0);
}

/** HTTP/1.1 keeps the connection unless told to close; HTTP/1.0 only keeps it on request. */
export function isKeepAlive(httpVersion: string, headers: IncomingHttpHeaders): boolean {
  const tokens = connectionTokens(headers);
  if (tokens.includes('close')) {
    return false;
  }
  const version = normalizeVersion(httpVersion);
  if (version === '1.0' || version === '0.9') {
    return tokens.includes('keep-alive');
  }
  return true;
}

export function applyConnectionHeader(response: ResponseContext, httpVersion: string, keepAlive: boolean): ResponseContext {
  if (!keepAlive) {
    return response.withHeader('connection', 'close');
  }
  if (normalizeVersion(httpVersion) === '1.0') {
    return response.withHeader('connection', 'keep-alive');
  }
  return response;
}

/**
 * Drives the exchanges of one connection. Requests are processed one at a
 * time in arrival order; the connection is closed exactly once.
 */
export class ConnectionPump {
  private current: PumpState = 'awaiting-request';
  private tail: Promise<void> = Promise.resolve();
  private readonly dispatcher: Dispatcher;
  private readonly logger: FastifyBaseLogger;
  private readonly connectionId: string;
  private readonly onExchange?: (record: ExchangeRecord) => void;
  private readonly now: () => number;

  constructor(options: ConnectionPumpOptions) {
    this.dispatcher = options.dispatcher;
    this.logger = options.logger;
    this.connectionId = options.connectionId;
    this.onExchange = options.onExchange;
    this.now = options.now ?? (() => performance.now());
  }

  get state(): PumpState {
    return this.current;
  }

  receive(request: InboundRequest, channel: ResponseChannel): Promise<void> {
    const next = this.tail.then(() => this.process(request, channel));
    this.tail = next;
    return next;
  }

  peerClosed(): void {
    if (this.current === 'closed') {
      return;
    }
    this.logger.debug({ connectionId: this.connectionId, state: this.current }, 'peer closed connection');
    this.current = 'closed';
  }

  private async process(request: InboundRequest, channel: ResponseChannel): Promise<void> {
    if (this.current === 'closed') {
      this.logger.debug(
        { connectionId: this.connectionId, method: request.method, uri: request.uri },
        'request ignored on closed connection'
      );
      return;
    }

    const startedAt = this.now();
    this.current = 'request-received';
    const keepAlive = isKeepAlive(request.httpVersion, request.headers);

    this.current = 'dispatched';
    let response: ResponseContext;
    let route: string;
    try {
      const result = await this.dispatcher.dispatch(request);
      response = applyConnectionHeader(result.response, request.httpVersion, keepAlive);
      route = result.route;
    } catch (err) {
      this.logger.error(
        { err, connectionId: this.connectionId, method: request.method, uri: request.uri },
        'dispatch fault, closing connection'
      );
      this.close(channel, 'fault');
      return;
    }

    try {
      channel.writeHead(response.status, response.headers);
      if (!response.isFullyBuffered && response.payload) {
        await channel.writePayload(response.payload);
      }
      await channel.end(response.body ?? undefined);
    } catch (err) {
      this.logger.warn({ err, connectionId: this.connectionId, method: request.method, uri: request.uri }, 'response write failed');
      this.close(channel, 'write-failed');
      return;
    }

    if (this.current !== 'dispatched') {
      return;
    }
    this.current = 'response-written';
    this.onExchange?.({
      connectionId: this.connectionId,
      method: request.method,
      route,
      status: response.status,
      durationSeconds: (this.now() - startedAt) / 1000
    });

    if (keepAlive) {
      this.current = 'awaiting-request';
    } else {
      this.close(channel, 'not-keep-alive');
    }
  }

  private close(channel: ResponseChannel, reason: CloseReason): void {
    if (this.current === 'closed') {
      return;
    }
    this.current = 'closed';
    try {
      channel.close(reason);
    } catch (err) {
      this.logger.warn({ err, connectionId: this.connectionId, reason }, 'failed to close connection');
    }
    this.logger.debug({ connectionId: this.connectionId, reason }, 'connection closed');
  }
}
