import { promises as fs, type Stats } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { FileSystemError, READ_EOF, type FileStatus, type FileSystemClient, type PositionReader } from './types';

function toLogicalPath(input: string): string {
  const normalized = path.posix.normalize(`/${input.trim().replace(/\\+/g, '/')}`);
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : '/';
}

function toFileSystemError(err: unknown, logicalPath: string): FileSystemError {
  if (err instanceof FileSystemError) {
    return err;
  }
  const code = (err as NodeJS.ErrnoException).code;
  if (code === 'ENOENT') {
    return new FileSystemError(`Path does not exist: ${logicalPath}`, 'NOT_FOUND', { path: logicalPath });
  }
  if (code === 'ENOTDIR') {
    return new FileSystemError(`Path is not a directory: ${logicalPath}`, 'NOT_A_DIRECTORY', { path: logicalPath });
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new FileSystemError(`I/O failure on ${logicalPath}: ${reason}`, 'IO', { path: logicalPath, errno: code ?? null });
}

/**
 * File system client over a directory on the local disk. Logical paths are
 * rooted at `rootDir`; `/` is the root directory itself.
 */
export class LocalFileSystemClient implements FileSystemClient {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  resolve(logicalPath: string): string {
    const normalized = toLogicalPath(logicalPath);
    const resolved = path.resolve(this.rootDir, `.${normalized}`);
    if (resolved !== this.rootDir && !resolved.startsWith(`${this.rootDir}${path.sep}`)) {
      throw new FileSystemError('Resolved path escapes the storage root', 'INVALID_PATH', {
        root: this.rootDir,
        requestedPath: logicalPath
      });
    }
    return resolved;
  }

  private describe(logicalPath: string, backingPath: string, stats: Stats): FileStatus {
    return {
      name: logicalPath === '/' ? '' : path.posix.basename(logicalPath),
      path: logicalPath,
      backingPath,
      folder: stats.isDirectory(),
      lastModifiedMs: stats.mtimeMs,
      length: stats.isDirectory() ? 0 : stats.size
    };
  }

  async getStatus(requestedPath: string): Promise<FileStatus> {
    const logicalPath = toLogicalPath(requestedPath);
    const backingPath = this.resolve(logicalPath);
    try {
      const stats = await fs.stat(backingPath);
      return this.describe(logicalPath, backingPath, stats);
    } catch (err) {
      throw toFileSystemError(err, logicalPath);
    }
  }

  async listStatus(requestedPath: string): Promise<FileStatus[]> {
    const logicalPath = toLogicalPath(requestedPath);
    const backingPath = this.resolve(logicalPath);
    try {
      const stats = await fs.stat(backingPath);
      if (!stats.isDirectory()) {
        return [this.describe(logicalPath, backingPath, stats)];
      }
      const names = (await fs.readdir(backingPath)).sort();
      const statuses: FileStatus[] = [];
      for (const name of names) {
        const childLogical = path.posix.join(logicalPath, name);
        const childBacking = path.join(backingPath, name);
        statuses.push(this.describe(childLogical, childBacking, await fs.stat(childBacking)));
      }
      return statuses;
    } catch (err) {
      throw toFileSystemError(err, logicalPath);
    }
  }

  async openPositionReader(requestedPath: string): Promise<PositionReader> {
    const logicalPath = toLogicalPath(requestedPath);
    const backingPath = this.resolve(logicalPath);
    let handle: FileHandle;
    try {
      handle = await fs.open(backingPath, 'r');
    } catch (err) {
      throw toFileSystemError(err, logicalPath);
    }

    return {
      async read(position: number, target: Buffer, length: number): Promise<number> {
        const wanted = Math.min(length, target.length);
        if (wanted === 0) {
          return 0;
        }
        try {
          const { bytesRead } = await handle.read(target, 0, wanted, position);
          return bytesRead === 0 ? READ_EOF : bytesRead;
        } catch (err) {
          throw toFileSystemError(err, logicalPath);
        }
      },
      async close(): Promise<void> {
        await handle.close();
      }
    };
  }
}
