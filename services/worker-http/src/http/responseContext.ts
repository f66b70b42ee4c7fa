export const CONTENT_TYPE_TEXT = 'text/plain';
export const CONTENT_TYPE_JSON = 'application/json';

export type ResponseHeaders = Record<string, string>;

type ResponseContextInit =
  | { kind: 'buffered'; status: number; headers: ResponseHeaders; body: Buffer }
  | { kind: 'streamed'; status: number; headers: ResponseHeaders; payload: Buffer };

/**
 * One HTTP response as produced by an operation handler. A buffered response
 * carries its whole body; a streamed one is written as headers followed by
 * the raw payload and an end-of-message marker.
 */
export class ResponseContext {
  readonly status: number;
  readonly headers: ResponseHeaders;
  readonly isFullyBuffered: boolean;
  readonly body: Buffer | null;
  readonly payload: Buffer | null;

  private constructor(init: ResponseContextInit) {
    this.status = init.status;
    this.headers = init.headers;
    this.isFullyBuffered = init.kind === 'buffered';
    this.body = init.kind === 'buffered' ? init.body : null;
    this.payload = init.kind === 'streamed' ? init.payload : null;
  }

  static buffered(status: number, contentType: string, body: Buffer | string, headers: ResponseHeaders = {}): ResponseContext {
    const bytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
    return new ResponseContext({
      kind: 'buffered',
      status,
      body: bytes,
      headers: {
        ...headers,
        'content-type': contentType,
        'content-length': String(bytes.length)
      }
    });
  }

  static text(status: number, body: string): ResponseContext {
    return ResponseContext.buffered(status, CONTENT_TYPE_TEXT, body);
  }

  static json(status: number, value: unknown, headers: ResponseHeaders = {}): ResponseContext {
    return ResponseContext.buffered(status, CONTENT_TYPE_JSON, JSON.stringify(value), headers);
  }

  static streamed(status: number, contentType: string, payload: Buffer): ResponseContext {
    return new ResponseContext({
      kind: 'streamed',
      status,
      payload,
      headers: {
        'content-type': contentType,
        'content-length': String(payload.length)
      }
    });
  }

  withHeader(name: string, value: string): ResponseContext {
    const headers = { ...this.headers, [name.toLowerCase()]: value };
    if (this.isFullyBuffered) {
      return new ResponseContext({ kind: 'buffered', status: this.status, headers, body: this.body ?? Buffer.alloc(0) });
    }
    return new ResponseContext({ kind: 'streamed', status: this.status, headers, payload: this.payload ?? Buffer.alloc(0) });
  }
}
