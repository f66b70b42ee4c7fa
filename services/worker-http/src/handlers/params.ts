import { MalformedRequestError } from '../errors';
import { handleReservedCharacters, type RequestDescriptor } from '../http/requestUri';

const DECIMAL_PATTERN = /^\d+$/;

export type PageAddress = {
  fileId: string;
  pageIndex: number;
};

export function parseNonNegativeInteger(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isSafeInteger(parsed)) {
    throw new MalformedRequestError(`${name} must be a non-negative integer`, { [name]: value });
  }
  return parsed;
}

/** Reads `[fileId, "page", pageIndex]` from the segments after `/file`. */
export function parsePageAddress(segments: readonly string[]): PageAddress {
  if (segments.length !== 3 || segments[1] !== 'page' || !segments[0]) {
    throw new MalformedRequestError('Expected /file/{fileId}/page/{pageIndex}', {
      segments: [...segments]
    });
  }
  return {
    fileId: segments[0],
    pageIndex: parseNonNegativeInteger(segments[2], 'pageIndex')
  };
}

export function optionalParameter(descriptor: RequestDescriptor, name: string): string | null {
  const value = descriptor.parameters[name];
  return value !== undefined && value !== '' ? value : null;
}

export function requirePathParameter(descriptor: RequestDescriptor): string {
  const raw = optionalParameter(descriptor, 'path');
  if (raw === null) {
    throw new MalformedRequestError('The path query parameter is required');
  }
  return handleReservedCharacters(raw);
}
