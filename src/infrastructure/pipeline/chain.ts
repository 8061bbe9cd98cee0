/**
 * conduit - Onion chain execution
 *
 * ```
 * MW1 enter  →  MW2 enter  →  MW3 enter  →  terminal
 *                                              ↓
 * MW1 exit   ←  MW2 exit   ←  MW3 exit   ←  response
 * ```
 *
 * Cancellation is checked at every stage transition: before a middleware
 * or the terminal is entered, and before a response is handed back to the
 * stage that awaited it. Once the signal is aborted no further stage runs
 * and every pending `next()` rejects with {@link RequestCancelledException}.
 * The signal checked is the one of the context each stage runs with, so a
 * middleware handing `next` a context with its own signal can stop the
 * stages below it.
 */

import {
  ConduitError,
  RequestCancelledException,
} from '../../domain/exceptions';
import {
  IConduitMiddleware,
  MiddlewareContext,
  NextFunction,
} from '../platform/middleware';
import { ConduitResponse } from '../platform/types';

/**
 * Raised when a middleware invokes its continuation a second time
 */
export class NextCalledTwiceError extends ConduitError {
  constructor(position: number) {
    super(`next() called more than once by middleware #${position}`);
    this.name = 'NextCalledTwiceError';
  }
}

function assertNotCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new RequestCancelledException();
  }
}

/**
 * Run `middlewares` in order around `terminal`.
 *
 * A middleware that returns without awaiting `next` short-circuits: no
 * later middleware and no terminal run for this request.
 */
export async function runChain(
  middlewares: ReadonlyArray<IConduitMiddleware>,
  ctx: MiddlewareContext,
  terminal: NextFunction,
): Promise<ConduitResponse> {
  const dispatch = async (index: number, stage: MiddlewareContext): Promise<ConduitResponse> => {
    assertNotCancelled(stage.signal);

    if (index >= middlewares.length) {
      return terminal(stage);
    }

    const middleware = middlewares[index];
    let called = false;

    const next: NextFunction = async (override) => {
      if (called) {
        throw new NextCalledTwiceError(index);
      }
      called = true;

      const downstream = await dispatch(index + 1, override ?? stage);
      assertNotCancelled(stage.signal);
      return downstream;
    };

    return middleware.invoke(stage, next);
  };

  return dispatch(0, ctx);
}

/**
 * Settle with `work`, or reject with {@link RequestCancelledException} as
 * soon as `signal` aborts, whichever comes first.
 */
export function raceCancellation<T>(
  work: Promise<T>,
  signal: AbortSignal,
): Promise<T> {
  let onAbort: (() => void) | undefined;
  const cancelled = new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(new RequestCancelledException());
      return;
    }
    onAbort = () => reject(new RequestCancelledException());
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return Promise.race([cancelled, work]).finally(() => {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  });
}
