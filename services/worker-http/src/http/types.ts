import type { IncomingHttpHeaders } from 'node:http';
import type { ResponseContext } from './responseContext';

/** A fully received request as handed over by the HTTP decoder. */
export type InboundRequest = {
  method: string;
  uri: string;
  httpVersion: string;
  headers: IncomingHttpHeaders;
  body: Buffer | null;
};

export type DispatchResult = {
  response: ResponseContext;
  /** Mapping path used as the route label in metrics, `unmatched` when no route applied. */
  route: string;
};

export interface Dispatcher {
  dispatch(request: InboundRequest): Promise<DispatchResult>;
}
