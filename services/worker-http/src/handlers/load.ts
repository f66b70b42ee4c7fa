import { BackendIOError, MalformedRequestError, describeError } from '../errors';
import type { RequestDescriptor } from '../http/requestUri';
import { ResponseContext } from '../http/responseContext';
import { LoadOptionsBuilder, parseLoadOpType, parseProgressFormat } from '../load/options';
import type { LoadOptions } from '../load/types';
import { optionalParameter, parseNonNegativeInteger, requirePathParameter } from './params';
import type { HandlerDependencies, OperationHandler } from './types';

function parseFlag(value: string): boolean {
  return value.trim().toLowerCase() === 'true';
}

function assertValidPattern(pattern: string): void {
  try {
    new RegExp(pattern);
  } catch (err) {
    throw new MalformedRequestError('fileFilterRegx is not a valid regular expression', {
      fileFilterRegx: pattern,
      reason: describeError(err)
    });
  }
}

/** Applies whichever load parameters are present; absent ones keep the defaults. */
export function buildLoadOptions(descriptor: RequestDescriptor): LoadOptions {
  const builder = LoadOptionsBuilder.create();
  const param = (name: string) => optionalParameter(descriptor, name);

  const opType = param('opType');
  if (opType !== null) {
    const parsed = parseLoadOpType(opType);
    if (!parsed) {
      throw new MalformedRequestError(`Unknown opType ${opType}`, { opType });
    }
    builder.setOpType(parsed);
  }

  const partialListing = param('partialListing');
  if (partialListing !== null) {
    builder.setPartialListing(parseFlag(partialListing));
  }
  const verify = param('verify');
  if (verify !== null) {
    builder.setVerify(parseFlag(verify));
  }
  const bandwidth = param('bandwidth');
  if (bandwidth !== null) {
    builder.setBandwidth(parseNonNegativeInteger(bandwidth, 'bandwidth'));
  }
  const verbose = param('verbose');
  if (verbose !== null) {
    builder.setVerbose(parseFlag(verbose));
  }
  const loadMetadataOnly = param('loadMetadataOnly');
  if (loadMetadataOnly !== null) {
    builder.setLoadMetadataOnly(parseFlag(loadMetadataOnly));
  }
  const skipIfExists = param('skipIfExists');
  if (skipIfExists !== null) {
    builder.setSkipIfExists(parseFlag(skipIfExists));
  }
  const fileFilter = param('fileFilterRegx');
  if (fileFilter !== null) {
    assertValidPattern(fileFilter);
    builder.setFileFilterPattern(fileFilter);
  }
  const progressFormat = param('progressFormat');
  if (progressFormat !== null) {
    const parsed = parseProgressFormat(progressFormat);
    if (!parsed) {
      throw new MalformedRequestError(`Unknown progressFormat ${progressFormat}`, { progressFormat });
    }
    builder.setProgressFormat(parsed);
  }

  return builder.build();
}

export function createLoadHandler(deps: HandlerDependencies): OperationHandler {
  return async ({ descriptor }) => {
    const options = buildLoadOptions(descriptor);
    const path = requirePathParameter(descriptor);

    let result: string;
    try {
      result = await deps.loadService.load(path, options);
    } catch (err) {
      deps.logger.error({ err, path, opType: options.opType }, 'load request failed');
      throw new BackendIOError(`Failed to handle load request for ${path}`, { path, reason: describeError(err) });
    }
    return ResponseContext.text(200, result);
  };
}
