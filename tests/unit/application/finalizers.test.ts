/**
 * @file Finalizer Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  ConduitResponse,
  Dispatcher,
  FinalizerContext,
  ResponseFinalizerBuilder,
  State,
  buildSimpleRouter,
  createRequest,
  extendStatus,
  requestIdFinalizer,
  silentLogger,
} from '../../../src/index';

function contextFor(response: ConduitResponse): FinalizerContext {
  return {
    state: new State(),
    request: createRequest('GET', '/'),
    requestId: 'req-1',
    response,
  };
}

const notFoundPage = (ctx: FinalizerContext): ConduitResponse => ({
  ...ctx.response,
  headers: { 'Content-Type': 'text/html' },
  body: '<h1>Nothing here</h1>',
});

describe('Finalizers', () => {
  describe('requestIdFinalizer', () => {
    it('should add X-Request-ID and keep other headers', async () => {
      const result = await requestIdFinalizer(
        contextFor({ status: 200, headers: { 'Cache-Control': 'no-store' }, body: 'ok' }),
      );

      expect(result).toEqual({
        status: 200,
        headers: { 'Cache-Control': 'no-store', 'X-Request-ID': 'req-1' },
        body: 'ok',
      });
    });
  });

  describe('extendStatus', () => {
    const finalizer = extendStatus(404, notFoundPage);

    it('should replace a response with the given status', async () => {
      const result = await finalizer(contextFor({ status: 404, headers: {} }));

      expect(result).toEqual({
        status: 404,
        headers: { 'Content-Type': 'text/html' },
        body: '<h1>Nothing here</h1>',
      });
    });

    it('should leave other responses alone', async () => {
      expect(await finalizer(contextFor({ status: 200, headers: {} }))).toBeUndefined();
    });
  });

  describe('ResponseFinalizerBuilder', () => {
    it('should keep the last extender added for a status', async () => {
      const finalizer = new ResponseFinalizerBuilder()
        .add(404, () => ({ status: 404, headers: {}, body: 'first' }))
        .add(500, () => ({ status: 500, headers: {}, body: 'oops' }))
        .add(404, () => ({ status: 404, headers: {}, body: 'second' }))
        .finalize();

      expect(await finalizer(contextFor({ status: 404, headers: {} }))).toEqual({
        status: 404,
        headers: {},
        body: 'second',
      });
      expect(await finalizer(contextFor({ status: 500, headers: {} }))).toEqual({
        status: 500,
        headers: {},
        body: 'oops',
      });
      expect(await finalizer(contextFor({ status: 200, headers: {} }))).toBeUndefined();
    });

    it('should not see extenders added after finalize', async () => {
      const builder = new ResponseFinalizerBuilder();
      const finalizer = builder.finalize();
      builder.add(404, notFoundPage);

      expect(await finalizer(contextFor({ status: 404, headers: {} }))).toBeUndefined();
    });

    it('should replace routing failures in a dispatcher', async () => {
      const router = buildSimpleRouter((route) => route.get('/').to(() => ({ status: 200, headers: {} })), {
        logger: silentLogger,
      });
      const dispatcher = new Dispatcher(router, {
        logger: silentLogger,
        finalizers: [new ResponseFinalizerBuilder().add(404, notFoundPage).finalize()],
      });

      const response = await dispatcher.dispatch(createRequest('GET', '/missing'));

      expect(response).toEqual({
        status: 404,
        headers: { 'Content-Type': 'text/html' },
        body: '<h1>Nothing here</h1>',
      });
    });
  });
});
