/**
 * conduit - Response finalizers
 *
 * Finalizers run after the pipeline chain has produced a response, also
 * when routing failed or a fault was converted into an error response.
 * They run in reverse registration order; each may return a replacement
 * response or nothing.
 */

import { State } from '../../domain/state';
import { ConduitRequest, ConduitResponse, withHeaders } from '../../infrastructure/platform';

/**
 * What a finalizer receives
 */
export interface FinalizerContext {
  state: State;
  request: ConduitRequest;
  requestId: string;
  response: ConduitResponse;

  /** The fault converted into `response`, when there was one */
  error?: Error;
}

export type FinalizerResult = ConduitResponse | void;

export type Finalizer = (
  ctx: FinalizerContext,
) => FinalizerResult | Promise<FinalizerResult>;

/**
 * Echo the request id in the `X-Request-ID` response header
 */
export const requestIdFinalizer: Finalizer = ({ response, requestId }) =>
  withHeaders(response, { 'X-Request-ID': requestId });

/**
 * Changes a response with a given status
 */
export type ResponseExtender = Finalizer;

/**
 * Finalizer applying `extender` to responses with `status`
 *
 * @example
 * ```typescript
 * extendStatus(404, ({ response }) => ({
 *   ...response,
 *   headers: { 'Content-Type': 'text/html' },
 *   body: '<h1>Nothing here</h1>',
 * }));
 * ```
 */
export function extendStatus(status: number, extender: ResponseExtender): Finalizer {
  return (ctx) => (ctx.response.status === status ? extender(ctx) : undefined);
}

/**
 * Collects one extender per status into a single finalizer. Adding a
 * second extender for a status replaces the first.
 */
export class ResponseFinalizerBuilder {
  private readonly extenders = new Map<number, ResponseExtender>();

  add(status: number, extender: ResponseExtender): this {
    this.extenders.set(status, extender);
    return this;
  }

  finalize(): Finalizer {
    const extenders = new Map(this.extenders);
    return (ctx) => {
      const extender = extenders.get(ctx.response.status);
      return extender ? extender(ctx) : undefined;
    };
  }
}
