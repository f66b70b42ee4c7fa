export type LoadOpType = 'submit' | 'stop' | 'progress';

export type ProgressFormat = 'TEXT' | 'JSON';

export type LoadOptions = Readonly<{
  opType: LoadOpType | null;
  partialListing: boolean;
  verify: boolean;
  /** Bytes per second; null means unthrottled. */
  bandwidth: number | null;
  verbose: boolean;
  loadMetadataOnly: boolean;
  skipIfExists: boolean;
  fileFilterPattern: string | null;
  progressFormat: ProgressFormat;
}>;

export interface LoadService {
  /** Submits, stops or reports on the load job for `path` and returns a status line for the caller. */
  load(path: string, options: LoadOptions): Promise<string>;
}
