import type { LoadOpType, LoadOptions, ProgressFormat } from './types';

export const DEFAULT_LOAD_OPTIONS: LoadOptions = Object.freeze({
  opType: null,
  partialListing: false,
  verify: false,
  bandwidth: null,
  verbose: false,
  loadMetadataOnly: false,
  skipIfExists: false,
  fileFilterPattern: null,
  progressFormat: 'TEXT'
});

export function parseLoadOpType(value: string): LoadOpType | null {
  switch (value.trim().toLowerCase()) {
    case 'submit':
      return 'submit';
    case 'stop':
      return 'stop';
    case 'progress':
      return 'progress';
    default:
      return null;
  }
}

export function parseProgressFormat(value: string): ProgressFormat | null {
  switch (value.trim().toUpperCase()) {
    case 'TEXT':
      return 'TEXT';
    case 'JSON':
      return 'JSON';
    default:
      return null;
  }
}

export class LoadOptionsBuilder {
  private options: { -readonly [K in keyof LoadOptions]: LoadOptions[K] } = { ...DEFAULT_LOAD_OPTIONS };

  static create(): LoadOptionsBuilder {
    return new LoadOptionsBuilder();
  }

  setOpType(opType: LoadOpType): this {
    this.options.opType = opType;
    return this;
  }

  setPartialListing(partialListing: boolean): this {
    this.options.partialListing = partialListing;
    return this;
  }

  setVerify(verify: boolean): this {
    this.options.verify = verify;
    return this;
  }

  setBandwidth(bandwidth: number): this {
    this.options.bandwidth = bandwidth;
    return this;
  }

  setVerbose(verbose: boolean): this {
    this.options.verbose = verbose;
    return this;
  }

  setLoadMetadataOnly(loadMetadataOnly: boolean): this {
    this.options.loadMetadataOnly = loadMetadataOnly;
    return this;
  }

  setSkipIfExists(skipIfExists: boolean): this {
    this.options.skipIfExists = skipIfExists;
    return this;
  }

  setFileFilterPattern(pattern: string): this {
    this.options.fileFilterPattern = pattern;
    return this;
  }

  setProgressFormat(format: ProgressFormat): this {
    this.options.progressFormat = format;
    return this;
  }

  build(): LoadOptions {
    return Object.freeze({ ...this.options });
  }
}
