import path from 'node:path';
import pino from 'pino';
import { Registry } from 'prom-client';
import { fileIdForPath } from '../src/cache/localPagedCache';
import type { PageLocation, PagedCache } from '../src/cache/types';
import { FileSystemError, READ_EOF, type FileStatus, type FileSystemClient, type PositionReader } from '../src/fs/types';
import type { HandlerDependencies } from '../src/handlers/types';
import type { LoadOptions, LoadService } from '../src/load/types';
import { createWorkerMetrics } from '../src/metrics';

export type LogRecord = Record<string, unknown>;

export function createCapturingLogger(level = 'debug') {
  const records: LogRecord[] = [];
  const logger = pino(
    { level, base: undefined },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      }
    }
  );
  return { logger, records };
}

export function createSilentLogger() {
  return pino({ level: 'silent' });
}

const MTIME_MS = 1_700_000_000_000;

/** File system namespace held in memory; directories are implied by file paths. */
export class InMemoryFileSystem implements FileSystemClient {
  readonly files = new Map<string, Buffer>();
  readonly failures = new Map<string, Error>();
  openReaders = 0;

  addFile(filePath: string, content: Buffer | string): this {
    this.files.set(filePath, typeof content === 'string' ? Buffer.from(content) : content);
    return this;
  }

  private isDirectory(dirPath: string): boolean {
    const prefix = dirPath === '/' ? '/' : `${dirPath}/`;
    for (const filePath of this.files.keys()) {
      if (filePath.startsWith(prefix)) {
        return true;
      }
    }
    return false;
  }

  private status(entryPath: string): FileStatus {
    const content = this.files.get(entryPath);
    return {
      name: entryPath === '/' ? '' : path.posix.basename(entryPath),
      path: entryPath,
      backingPath: `/backing${entryPath}`,
      folder: content === undefined,
      lastModifiedMs: MTIME_MS,
      length: content?.length ?? 0
    };
  }

  private failIfConfigured(entryPath: string): void {
    const failure = this.failures.get(entryPath);
    if (failure) {
      throw failure;
    }
  }

  async getStatus(entryPath: string): Promise<FileStatus> {
    this.failIfConfigured(entryPath);
    if (this.files.has(entryPath) || this.isDirectory(entryPath)) {
      return this.status(entryPath);
    }
    throw new FileSystemError(`Path does not exist: ${entryPath}`, 'NOT_FOUND', { path: entryPath });
  }

  async listStatus(dirPath: string): Promise<FileStatus[]> {
    this.failIfConfigured(dirPath);
    if (this.files.has(dirPath)) {
      return [this.status(dirPath)];
    }
    if (!this.isDirectory(dirPath)) {
      throw new FileSystemError(`Path does not exist: ${dirPath}`, 'NOT_FOUND', { path: dirPath });
    }
    const prefix = dirPath === '/' ? '/' : `${dirPath}/`;
    const children = new Set<string>();
    for (const filePath of this.files.keys()) {
      if (filePath.startsWith(prefix)) {
        children.add(prefix + filePath.slice(prefix.length).split('/')[0]);
      }
    }
    return [...children].sort().map((child) => this.status(child));
  }

  async openPositionReader(filePath: string): Promise<PositionReader> {
    this.failIfConfigured(filePath);
    const content = this.files.get(filePath);
    if (!content) {
      throw new FileSystemError(`Path does not exist: ${filePath}`, 'NOT_FOUND', { path: filePath });
    }
    this.openReaders += 1;
    return {
      read: async (position, target, length) => {
        if (position >= content.length) {
          return READ_EOF;
        }
        return content.copy(target, 0, position, Math.min(content.length, position + length));
      },
      close: async () => {
        this.openReaders -= 1;
      }
    };
  }
}

export class InMemoryPagedCache implements PagedCache {
  readonly sources = new Map<string, string>();
  readonly pages = new Map<string, Buffer>();
  writeResult = true;
  writeError: Error | null = null;
  locateError: Error | null = null;

  constructor(private readonly pageSize: number) {}

  getPageSize(): number {
    return this.pageSize;
  }

  async registerFile(filePath: string): Promise<string> {
    const fileId = fileIdForPath(filePath);
    this.sources.set(fileId, filePath);
    return fileId;
  }

  async locatePage(fileId: string, pageIndex: number): Promise<PageLocation | null> {
    if (this.locateError) {
      throw this.locateError;
    }
    const source = this.sources.get(fileId);
    return source === undefined ? null : { path: source, position: pageIndex * this.pageSize };
  }

  async hasPage(fileId: string, pageIndex: number): Promise<boolean> {
    return this.pages.has(`${fileId}:${pageIndex}`);
  }

  async writePage(fileId: string, pageIndex: number, data: Buffer): Promise<boolean> {
    if (this.writeError) {
      throw this.writeError;
    }
    if (this.writeResult) {
      this.pages.set(`${fileId}:${pageIndex}`, Buffer.from(data));
    }
    return this.writeResult;
  }
}

export type RecordedLoadCall = {
  path: string;
  options: LoadOptions;
};

export class RecordingLoadService implements LoadService {
  readonly calls: RecordedLoadCall[] = [];
  failure: Error | null = null;

  constructor(private readonly reply = 'Load job submitted') {}

  async load(loadPath: string, options: LoadOptions): Promise<string> {
    this.calls.push({ path: loadPath, options });
    if (this.failure) {
      throw this.failure;
    }
    return this.reply;
  }
}

export type TestDependencies = HandlerDependencies & {
  fileSystem: InMemoryFileSystem;
  pagedCache: InMemoryPagedCache;
  loadService: RecordingLoadService;
  records: LogRecord[];
};

export function createTestDependencies(pageSize = 20): TestDependencies {
  const { logger, records } = createCapturingLogger();
  return {
    fileSystem: new InMemoryFileSystem(),
    pagedCache: new InMemoryPagedCache(pageSize),
    loadService: new RecordingLoadService(),
    metrics: createWorkerMetrics({ registry: new Registry() }),
    logger,
    records
  };
}
