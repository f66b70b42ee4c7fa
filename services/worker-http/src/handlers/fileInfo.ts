import { BackendIOError, describeError } from '../errors';
import type { FileStatus } from '../fs/types';
import { ResponseContext } from '../http/responseContext';
import { requirePathParameter } from './params';
import type { HandlerDependencies, OperationHandler } from './types';

export type FileEntry = {
  type: 'file' | 'directory';
  name: string;
  logicalPath: string;
  backingPath: string;
  lastModifiedMillis: number;
  lengthBytes: number;
};

export function toFileEntry(status: FileStatus): FileEntry {
  return {
    type: status.folder ? 'directory' : 'file',
    name: status.name,
    logicalPath: status.path,
    backingPath: status.backingPath,
    lastModifiedMillis: Math.trunc(status.lastModifiedMs),
    lengthBytes: status.length
  };
}

function backendFailure(deps: HandlerDependencies, path: string, action: string, err: unknown): BackendIOError {
  deps.logger.error({ err, path }, `failed to ${action}`);
  return new BackendIOError(`Failed to ${action} of path ${path}`, { path, reason: describeError(err) });
}

export function createListFilesHandler(deps: HandlerDependencies): OperationHandler {
  return async ({ descriptor }) => {
    const path = requirePathParameter(descriptor);
    let statuses: FileStatus[];
    try {
      statuses = await deps.fileSystem.listStatus(path);
    } catch (err) {
      throw backendFailure(deps, path, 'list files', err);
    }
    return ResponseContext.json(200, statuses.map(toFileEntry));
  };
}

// Same array shape as the listing so clients parse both alike.
export function createFileStatusHandler(deps: HandlerDependencies): OperationHandler {
  return async ({ descriptor }) => {
    const path = requirePathParameter(descriptor);
    let status: FileStatus;
    try {
      status = await deps.fileSystem.getStatus(path);
    } catch (err) {
      throw backendFailure(deps, path, 'get status', err);
    }
    return ResponseContext.json(200, [toFileEntry(status)]);
  };
}
