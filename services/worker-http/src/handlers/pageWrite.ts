import { MissingBodyError, describeError } from '../errors';
import { ResponseContext } from '../http/responseContext';
import { parsePageAddress } from './params';
import type { HandlerDependencies, OperationHandler } from './types';

export type WriteOutcome = {
  success: boolean;
  message: string;
};

function requireBody(body: Buffer | null): Buffer {
  if (!body || body.length === 0) {
    throw new MissingBodyError();
  }
  return body;
}

/**
 * Page writes always answer 200: failures, including a missing body, are
 * reported in the `{ success, message }` outcome.
 */
export function createPageWriteHandler(deps: HandlerDependencies): OperationHandler {
  return async ({ descriptor, body }) => {
    const { fileId, pageIndex } = parsePageAddress(descriptor.remainingSegments);

    let outcome: WriteOutcome;
    try {
      const success = await deps.pagedCache.writePage(fileId, pageIndex, requireBody(body));
      outcome = {
        success,
        message: success ? 'Page written successfully' : 'Failed to write page'
      };
    } catch (err) {
      if (err instanceof MissingBodyError) {
        outcome = { success: false, message: err.message };
      } else {
        deps.logger.error({ err, fileId, pageIndex }, 'failed to write page');
        outcome = { success: false, message: `Failed to write page: ${describeError(err)}` };
      }
    }

    return ResponseContext.json(200, outcome);
  };
}
