import { createHash, randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { PagedCacheError, type PageLocation, type PagedCache } from './types';

const FILE_ID_PATTERN = /^[0-9a-f]{64}$/;
const SOURCE_FILE = 'source';

export function fileIdForPath(logicalPath: string): string {
  return createHash('sha256').update(logicalPath).digest('hex');
}

async function readOptional(target: string): Promise<string | null> {
  try {
    return await fs.readFile(target, 'utf8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

export type LocalPagedCacheOptions = {
  cacheDir: string;
  pageSize: number;
};

/**
 * Page store on the local disk:
 *
 *   <cacheDir>/<fileId>/source         logical path the file id was registered for
 *   <cacheDir>/<fileId>/<index>.page   cached page bytes
 */
export class LocalPagedCache implements PagedCache {
  private readonly cacheDir: string;
  private readonly pageSize: number;

  constructor(options: LocalPagedCacheOptions) {
    if (!Number.isSafeInteger(options.pageSize) || options.pageSize <= 0) {
      throw new PagedCacheError('Page size must be a positive integer', { pageSize: options.pageSize });
    }
    this.cacheDir = path.resolve(options.cacheDir);
    this.pageSize = options.pageSize;
  }

  getPageSize(): number {
    return this.pageSize;
  }

  private fileDir(fileId: string): string {
    if (!FILE_ID_PATTERN.test(fileId)) {
      throw new PagedCacheError('Invalid file id', { fileId });
    }
    return path.join(this.cacheDir, fileId);
  }

  private pagePath(fileId: string, pageIndex: number): string {
    if (!Number.isSafeInteger(pageIndex) || pageIndex < 0) {
      throw new PagedCacheError('Invalid page index', { fileId, pageIndex });
    }
    return path.join(this.fileDir(fileId), `${pageIndex}.page`);
  }

  async registerFile(logicalPath: string): Promise<string> {
    const fileId = fileIdForPath(logicalPath);
    const dir = this.fileDir(fileId);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, SOURCE_FILE), logicalPath, 'utf8');
    return fileId;
  }

  async locatePage(fileId: string, pageIndex: number): Promise<PageLocation | null> {
    if (!FILE_ID_PATTERN.test(fileId) || !Number.isSafeInteger(pageIndex) || pageIndex < 0) {
      return null;
    }
    const source = await readOptional(path.join(this.fileDir(fileId), SOURCE_FILE));
    if (source === null) {
      return null;
    }
    return { path: source, position: pageIndex * this.pageSize };
  }

  async hasPage(fileId: string, pageIndex: number): Promise<boolean> {
    try {
      const stats = await fs.stat(this.pagePath(fileId, pageIndex));
      return stats.isFile();
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw err;
    }
  }

  async writePage(fileId: string, pageIndex: number, data: Buffer): Promise<boolean> {
    if (data.length > this.pageSize) {
      throw new PagedCacheError(`Page of ${data.length} bytes exceeds the page size of ${this.pageSize}`, {
        fileId,
        pageIndex
      });
    }
    const target = this.pagePath(fileId, pageIndex);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const staging = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(staging, data);
    await fs.rename(staging, target);
    return true;
  }
}
