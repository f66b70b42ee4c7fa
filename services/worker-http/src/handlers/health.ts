import { ResponseContext } from '../http/responseContext';
import type { OperationHandler } from './types';

export const HEALTH_MESSAGE = 'worker is active';

export function createHealthHandler(): OperationHandler {
  return async () => ResponseContext.text(200, HEALTH_MESSAGE);
}
