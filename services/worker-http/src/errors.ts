export type WorkerHttpErrorCode =
  | 'MALFORMED_REQUEST'
  | 'INVALID_RANGE'
  | 'UNMATCHED_ROUTE'
  | 'PAGE_NOT_FOUND'
  | 'BACKEND_IO';

export class WorkerHttpError extends Error {
  public readonly code: WorkerHttpErrorCode;
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: WorkerHttpErrorCode, status: number, details?: Record<string, unknown>) {
    super(message);
    this.name = 'WorkerHttpError';
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class MalformedRequestError extends WorkerHttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MALFORMED_REQUEST', 400, details);
    this.name = 'MalformedRequestError';
  }
}

export class InvalidRangeError extends WorkerHttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_RANGE', 400, details);
    this.name = 'InvalidRangeError';
  }
}

export class UnmatchedRouteError extends WorkerHttpError {
  public readonly allowedMethods: readonly string[];

  constructor(method: string, mappingPath: string, allowedMethods: readonly string[] = []) {
    const status = allowedMethods.length > 0 ? 405 : 404;
    const message =
      status === 405
        ? `Method ${method} is not allowed for /${mappingPath}`
        : `No route for ${method} /${mappingPath}`;
    super(message, 'UNMATCHED_ROUTE', status, { method, mappingPath });
    this.name = 'UnmatchedRouteError';
    this.allowedMethods = allowedMethods;
  }
}

export class PageNotFoundError extends WorkerHttpError {
  constructor(fileId: string, pageIndex: number, reason?: string) {
    super(`page not found: fileId ${fileId}, pageIndex ${pageIndex}`, 'PAGE_NOT_FOUND', 404, {
      fileId,
      pageIndex,
      reason: reason ?? null
    });
    this.name = 'PageNotFoundError';
  }
}

export class BackendIOError extends WorkerHttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'BACKEND_IO', 500, details);
    this.name = 'BackendIOError';
  }
}

/**
 * Raised on the write path when a request carries no body. It is always turned
 * into an in-band `{ success: false }` outcome and never becomes an HTTP error.
 */
export class MissingBodyError extends Error {
  constructor() {
    super('request body is required to write a page');
    this.name = 'MissingBodyError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
