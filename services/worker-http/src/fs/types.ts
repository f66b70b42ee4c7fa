export type FileSystemErrorCode = 'NOT_FOUND' | 'NOT_A_DIRECTORY' | 'INVALID_PATH' | 'IO';

export class FileSystemError extends Error {
  public readonly code: FileSystemErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: FileSystemErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'FileSystemError';
    this.code = code;
    this.details = details;
  }
}

export type FileStatus = {
  name: string;
  path: string;
  backingPath: string;
  folder: boolean;
  lastModifiedMs: number;
  length: number;
};

/** Returned by {@link PositionReader.read} when nothing is left to read at the position. */
export const READ_EOF = -1;

export interface PositionReader {
  /**
   * Reads up to `length` bytes starting at `position` into `target` from
   * offset 0. Resolves with the number of bytes read, or {@link READ_EOF}.
   */
  read(position: number, target: Buffer, length: number): Promise<number>;
  close(): Promise<void>;
}

export interface FileSystemClient {
  listStatus(path: string): Promise<FileStatus[]>;
  getStatus(path: string): Promise<FileStatus>;
  openPositionReader(path: string): Promise<PositionReader>;
  close?(): Promise<void>;
}
