import { setTimeout as delay } from 'node:timers/promises';
import type { PagedCache } from '../cache/types';
import { describeError } from '../errors';
import { READ_EOF, type FileStatus, type FileSystemClient } from '../fs/types';
import type { LoadOptions } from './types';

export type LoadFailure = {
  path: string;
  reason: string;
};

export type LoadProgress = {
  filesDiscovered: number;
  filesLoaded: number;
  pagesLoaded: number;
  pagesSkipped: number;
  bytesLoaded: number;
  listingComplete: boolean;
  verified: boolean;
  failures: LoadFailure[];
};

export function createLoadProgress(): LoadProgress {
  return {
    filesDiscovered: 0,
    filesLoaded: 0,
    pagesLoaded: 0,
    pagesSkipped: 0,
    bytesLoaded: 0,
    listingComplete: false,
    verified: false,
    failures: []
  };
}

export type LoadJobRunnerDependencies = {
  fileSystem: FileSystemClient;
  pagedCache: PagedCache;
  now?: () => number;
};

type LoadedFile = {
  path: string;
  fileId: string;
  pageCount: number;
};

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

async function* walkFiles(
  fileSystem: FileSystemClient,
  root: FileStatus,
  signal: AbortSignal
): AsyncGenerator<FileStatus> {
  if (!root.folder) {
    yield root;
    return;
  }
  const pending = [root.path];
  while (pending.length > 0 && !signal.aborted) {
    const directory = pending.shift();
    if (directory === undefined) {
      break;
    }
    for (const child of await fileSystem.listStatus(directory)) {
      if (child.folder) {
        pending.push(child.path);
      } else {
        yield child;
      }
    }
  }
}

/**
 * Copies every file under a path into the paged cache, page by page. Progress
 * counters are updated in place so callers can report on a running job.
 */
export class LoadJobRunner {
  private readonly fileSystem: FileSystemClient;
  private readonly pagedCache: PagedCache;
  private readonly now: () => number;

  constructor(deps: LoadJobRunnerDependencies) {
    this.fileSystem = deps.fileSystem;
    this.pagedCache = deps.pagedCache;
    this.now = deps.now ?? Date.now;
  }

  async run(path: string, options: LoadOptions, progress: LoadProgress, signal: AbortSignal): Promise<void> {
    const filter = options.fileFilterPattern ? new RegExp(options.fileFilterPattern) : null;
    const root = await this.fileSystem.getStatus(path);
    const startedAt = this.now();
    const loaded: LoadedFile[] = [];

    const accept = (file: FileStatus) => !filter || filter.test(file.name);

    let files: AsyncIterable<FileStatus> | FileStatus[];
    if (options.partialListing) {
      files = walkFiles(this.fileSystem, root, signal);
    } else {
      const listed: FileStatus[] = [];
      for await (const file of walkFiles(this.fileSystem, root, signal)) {
        if (accept(file)) {
          listed.push(file);
        }
      }
      progress.filesDiscovered = listed.length;
      progress.listingComplete = true;
      files = listed;
    }

    for await (const file of files) {
      if (signal.aborted) {
        return;
      }
      if (options.partialListing) {
        if (!accept(file)) {
          continue;
        }
        progress.filesDiscovered += 1;
      }
      try {
        const result = await this.loadFile(file, options, progress, signal, startedAt);
        if (result) {
          loaded.push(result);
          progress.filesLoaded += 1;
        }
      } catch (err) {
        if (isAbortError(err)) {
          return;
        }
        progress.failures.push({ path: file.path, reason: describeError(err) });
      }
    }
    progress.listingComplete = true;

    if (options.verify && !options.loadMetadataOnly && !signal.aborted) {
      await this.verify(loaded, progress);
    }
  }

  private async loadFile(
    file: FileStatus,
    options: LoadOptions,
    progress: LoadProgress,
    signal: AbortSignal,
    startedAt: number
  ): Promise<LoadedFile | null> {
    const fileId = await this.pagedCache.registerFile(file.path);
    const pageSize = this.pagedCache.getPageSize();
    const pageCount = Math.ceil(file.length / pageSize);
    if (options.loadMetadataOnly) {
      return { path: file.path, fileId, pageCount };
    }

    const reader = await this.fileSystem.openPositionReader(file.path);
    try {
      for (let pageIndex = 0; pageIndex < pageCount; pageIndex += 1) {
        if (signal.aborted) {
          return null;
        }
        if (options.skipIfExists && (await this.pagedCache.hasPage(fileId, pageIndex))) {
          progress.pagesSkipped += 1;
          continue;
        }
        const position = pageIndex * pageSize;
        const target = Buffer.alloc(Math.min(pageSize, file.length - position));
        const readLength = await reader.read(position, target, target.length);
        if (readLength === READ_EOF) {
          break;
        }
        const written = await this.pagedCache.writePage(fileId, pageIndex, target.subarray(0, readLength));
        if (!written) {
          throw new Error(`cache rejected page ${pageIndex}`);
        }
        progress.pagesLoaded += 1;
        progress.bytesLoaded += readLength;
        await this.throttle(options.bandwidth, progress.bytesLoaded, startedAt, signal);
      }
    } finally {
      await reader.close();
    }
    return { path: file.path, fileId, pageCount };
  }

  // A bandwidth of 0 is treated like no limit.
  private async throttle(bandwidth: number | null, bytesLoaded: number, startedAt: number, signal: AbortSignal): Promise<void> {
    if (!bandwidth || bandwidth <= 0) {
      return;
    }
    const expectedMs = (bytesLoaded / bandwidth) * 1000;
    const elapsedMs = this.now() - startedAt;
    if (expectedMs > elapsedMs) {
      await delay(expectedMs - elapsedMs, undefined, { signal });
    }
  }

  private async verify(loaded: LoadedFile[], progress: LoadProgress): Promise<void> {
    for (const file of loaded) {
      for (let pageIndex = 0; pageIndex < file.pageCount; pageIndex += 1) {
        if (!(await this.pagedCache.hasPage(file.fileId, pageIndex))) {
          progress.failures.push({ path: file.path, reason: `page ${pageIndex} missing after load` });
        }
      }
    }
    progress.verified = true;
  }
}
