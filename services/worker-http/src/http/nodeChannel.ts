import type { ServerResponse } from 'node:http';
import type { Socket } from 'node:net';
import type { CloseReason, ResponseChannel } from './connectionPump';
import type { ResponseHeaders } from './responseContext';

class ConnectionClosedError extends Error {
  constructor(stage: string) {
    super(`connection closed before ${stage} was flushed`);
    this.name = 'ConnectionClosedError';
  }
}

/** Writes exchanges straight onto a hijacked Node `ServerResponse`. */
export class ServerResponseChannel implements ResponseChannel {
  private readonly response: ServerResponse;
  private readonly socket: Socket | null;

  constructor(response: ServerResponse) {
    this.response = response;
    this.socket = response.socket;
  }

  writeHead(status: number, headers: ResponseHeaders): void {
    for (const [name, value] of Object.entries(headers)) {
      this.response.setHeader(name, value);
    }
    this.response.writeHead(status);
  }

  writePayload(payload: Buffer): Promise<void> {
    const response = this.response;
    if (response.destroyed) {
      return Promise.reject(new ConnectionClosedError('payload'));
    }
    if (response.write(payload)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onClose = () => {
        cleanup();
        reject(new ConnectionClosedError('payload'));
      };
      const cleanup = () => {
        response.off('drain', onDrain);
        response.off('close', onClose);
      };
      response.once('drain', onDrain);
      response.once('close', onClose);
    });
  }

  end(body?: Buffer): Promise<void> {
    const response = this.response;
    if (response.destroyed) {
      return Promise.reject(new ConnectionClosedError('response'));
    }
    return new Promise<void>((resolve, reject) => {
      const onFinish = () => {
        cleanup();
        resolve();
      };
      const onClose = () => {
        cleanup();
        reject(new ConnectionClosedError('response'));
      };
      const cleanup = () => {
        response.off('finish', onFinish);
        response.off('close', onClose);
      };
      response.once('finish', onFinish);
      response.once('close', onClose);
      if (body && body.length > 0) {
        response.end(body);
      } else {
        response.end();
      }
    });
  }

  close(reason: CloseReason): void {
    if (reason === 'not-keep-alive') {
      if (this.socket && !this.socket.destroyed) {
        this.socket.end();
      }
      return;
    }
    this.response.destroy();
  }
}
