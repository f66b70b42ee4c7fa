export class PagedCacheError extends Error {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PagedCacheError';
    this.details = details;
  }
}

/** Where the bytes of a page live in the file system namespace. */
export type PageLocation = {
  path: string;
  position: number;
};

export interface PagedCache {
  getPageSize(): number;
  registerFile(path: string): Promise<string>;
  locatePage(fileId: string, pageIndex: number): Promise<PageLocation | null>;
  hasPage(fileId: string, pageIndex: number): Promise<boolean>;
  writePage(fileId: string, pageIndex: number, data: Buffer): Promise<boolean>;
}
