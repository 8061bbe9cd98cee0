/**
 * @file TestClient Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  ClientAddress,
  ConduitApp,
  ConduitResponse,
  Dispatcher,
  TestClient,
  buildSimpleRouter,
  silentLogger,
} from '../../../src/index';

const router = buildSimpleRouter(
  (route) => {
    route.post('/echo').to(({ request }) => ({ status: 201, headers: {}, body: request.body }));
    route.get('/headers').to(({ request }) => ({ status: 200, headers: {}, body: request.headers }));
    route.get('/cookies').to(() => ({
      status: 200,
      headers: { 'Set-Cookie': ['a=1', 'b=2'] },
    }));
    route.get('/bytes').to(() => ({ status: 200, headers: {}, body: Buffer.from('hi') }));
    route.get('/empty').to(() => ({ status: 204, headers: {} }));
    route.get('/client').to(({ state }) => ({
      status: 200,
      headers: {},
      body: state.tryBorrow(ClientAddress),
    }));
    route.get('/slow').to(() => new Promise<ConduitResponse>(() => undefined));
  },
  { logger: silentLogger },
);

describe('TestClient', () => {
  const client = new TestClient(ConduitApp.create(router, { logger: silentLogger }));

  it('should send a body and read the response', async () => {
    const res = await client.post('/echo', { name: 'widget' });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ name: 'widget' });
    expect(res.text()).toBe('{"name":"widget"}');
  });

  it('should lower-case request header names', async () => {
    const res = await client.get('/headers', { headers: { 'X-Tenant': 'acme' } });

    expect(res.body).toEqual({ 'x-tenant': 'acme' });
  });

  it('should read response headers without regard to case', async () => {
    const res = await client.get('/empty', { headers: { 'X-Request-ID': 'req-3' } });

    expect(res.header('x-request-id')).toBe('req-3');
    expect(res.header('X-REQUEST-ID')).toBe('req-3');
    expect(res.header('x-missing')).toBeUndefined();
  });

  it('should join repeated response headers', async () => {
    const res = await client.get('/cookies');

    expect(res.header('set-cookie')).toBe('a=1, b=2');
    expect(res.raw().headers['Set-Cookie']).toEqual(['a=1', 'b=2']);
  });

  it('should render bodies as text', async () => {
    expect((await client.get('/bytes')).text()).toBe('hi');
    expect((await client.get('/empty')).text()).toBe('');
  });

  it('should pass the client address', async () => {
    const res = await client.get('/client', { remoteAddress: '10.0.0.1' });

    expect(res.body).toBe('10.0.0.1');
  });

  it('should send any method', async () => {
    const res = await client.request('PUT', '/echo', 'x');

    expect(res.status).toBe(405);
    expect(res.header('allow')).toBe('POST');
  });

  it('should cancel with the given signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const res = await client.get('/slow', { signal: controller.signal });

    expect(res.status).toBe(499);
  });

  it('should talk to a dispatcher', async () => {
    const direct = new TestClient(new Dispatcher(router, { logger: silentLogger }));

    const res = await direct.get('/missing');

    expect(res.status).toBe(404);
    expect(res.header('x-request-id')).toBeUndefined();
  });
});
