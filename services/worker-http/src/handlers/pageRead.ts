import type { PageLocation } from '../cache/types';
import { BackendIOError, InvalidRangeError, PageNotFoundError, WorkerHttpError, describeError } from '../errors';
import { FileSystemError, READ_EOF } from '../fs/types';
import type { RequestDescriptor } from '../http/requestUri';
import { CONTENT_TYPE_TEXT, ResponseContext } from '../http/responseContext';
import { optionalParameter, parseNonNegativeInteger, parsePageAddress, type PageAddress } from './params';
import type { HandlerDependencies, OperationHandler } from './types';

export type ReadRange = {
  offset: number;
  length: number;
};

/**
 * `offset` defaults to 0. Without `length` the read runs to the end of the
 * page, so `offset` alone yields `pageSize - offset` bytes.
 */
export function resolveReadRange(descriptor: RequestDescriptor, pageSize: number): ReadRange {
  const offsetParam = optionalParameter(descriptor, 'offset');
  const lengthParam = optionalParameter(descriptor, 'length');
  const offset = offsetParam === null ? 0 : parseNonNegativeInteger(offsetParam, 'offset');
  if (offset > pageSize) {
    throw new InvalidRangeError(`offset ${offset} is beyond the page size of ${pageSize}`, { offset, pageSize });
  }
  const length = lengthParam === null ? pageSize - offset : parseNonNegativeInteger(lengthParam, 'length');
  if (offset + length > pageSize) {
    throw new InvalidRangeError(`range ${offset}+${length} exceeds the page size of ${pageSize}`, {
      offset,
      length,
      pageSize
    });
  }
  return { offset, length };
}

async function locate(deps: HandlerDependencies, address: PageAddress): Promise<PageLocation> {
  let location: PageLocation | null;
  try {
    location = await deps.pagedCache.locatePage(address.fileId, address.pageIndex);
  } catch (err) {
    throw new BackendIOError('Failed to locate page', { ...address, reason: describeError(err) });
  }
  if (!location) {
    throw new PageNotFoundError(address.fileId, address.pageIndex, 'page is not registered in the cache');
  }
  return location;
}

async function readRange(
  deps: HandlerDependencies,
  address: PageAddress,
  location: PageLocation,
  range: ReadRange
): Promise<Buffer> {
  try {
    const reader = await deps.fileSystem.openPositionReader(location.path);
    try {
      const target = Buffer.alloc(range.length);
      const readLength = await reader.read(location.position + range.offset, target, range.length);
      if (readLength === READ_EOF) {
        throw new PageNotFoundError(address.fileId, address.pageIndex, 'nothing to read at the requested position');
      }
      return target.subarray(0, readLength);
    } finally {
      await reader.close().catch((closeErr: unknown) => {
        deps.logger.warn({ err: closeErr, path: location.path }, 'failed to close position reader');
      });
    }
  } catch (err) {
    if (err instanceof WorkerHttpError) {
      throw err;
    }
    if (err instanceof FileSystemError && err.code === 'NOT_FOUND') {
      throw new PageNotFoundError(address.fileId, address.pageIndex, err.message);
    }
    deps.logger.error({ err, ...address, path: location.path }, 'page read failed');
    throw new BackendIOError('Failed to read page', { ...address, reason: describeError(err) });
  }
}

export function createPageReadHandler(deps: HandlerDependencies): OperationHandler {
  return async ({ descriptor }) => {
    const address = parsePageAddress(descriptor.remainingSegments);
    const range = resolveReadRange(descriptor, deps.pagedCache.getPageSize());

    deps.metrics.recordBytesRequested(range.length);
    const location = await locate(deps, address);
    const payload = await readRange(deps, address, location, range);
    deps.metrics.recordBytesServed(range.length);

    return ResponseContext.streamed(200, CONTENT_TYPE_TEXT, payload);
  };
}
