/**
 * Router Tests
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { NOT_FOUND_BODY, Router } from '../../framework/router/router.ts';
import { Route } from '../../framework/router/route.ts';
import { RouteConfigurationError } from '../../framework/http/errors.ts';
import { SpurRequest } from '../../framework/http/request.ts';
import { SpurResponse } from '../../framework/http/response.ts';
import type { Handler } from '../../framework/http/types.ts';
import { MemorySink } from '../helpers/memory.ts';

const noop: Handler = () => {};

function request(method: string, uri: string): SpurRequest {
  return new SpurRequest({ method, uri });
}

test('Router - registering GET adds an implicit HEAD first', () => {
  const router = new Router();
  router.addRoute('GET', '/a', noop);

  const routes = router.getRoutes();
  assert.deepEqual(
    routes.map((route) => [route.method, route.address.raw]),
    [['HEAD', '/a'], ['GET', '/a']]
  );
});

test('Router - explicit HEAD gets no sibling', () => {
  const router = new Router();
  router.addRoute('HEAD', '/c', noop);

  assert.deepEqual(router.list(), [{ address: '/c', method: 'HEAD' }]);
});

test('Router - every non-HEAD route gets its own HEAD', () => {
  const router = new Router();
  router.addRoute('GET', '/x', noop);
  router.addRoute('POST', '/x', noop);

  assert.deepEqual(
    router.getRoutes().map((route) => [route.method, route.address.raw]),
    [['HEAD', '/x'], ['GET', '/x'], ['HEAD', '/x'], ['POST', '/x']]
  );
  assert.deepEqual(router.list(), [
    { address: '/x', method: 'HEAD' },
    { address: '/x', method: 'HEAD' },
    { address: '/x', method: 'GET' },
    { address: '/x', method: 'POST' },
  ]);
});

test('Router - malformed pattern is rejected at registration', () => {
  const router = new Router();

  assert.throws(() => router.addRoute('GET', '/{broken', noop), RouteConfigurationError);
  assert.deepEqual(router.getRoutes(), []);
});

test('Router - first matching route wins', async () => {
  const router = new Router();
  const calls: string[] = [];
  router.addRoute('GET', '/ping', () => {
    calls.push('ping');
  });
  router.addRoute('GET', '/{name}', () => {
    calls.push('name');
  });

  await router.handle(request('GET', '/ping'), new SpurResponse(new MemorySink()));
  await router.handle(request('GET', '/bob'), new SpurResponse(new MemorySink()));

  assert.deepEqual(calls, ['ping', 'name']);
});

test('Router - match returns the route or null', () => {
  const router = new Router();
  const route = new Route('GET', '/users/{id:[0-9]+}', noop);
  router.register(route);

  assert.equal(router.match(request('GET', '/users/5')), route);
  assert.equal(router.match(request('GET', '/users/x')), null);
  assert.equal(router.match(request('DELETE', '/users/5')), null);
});

test('Router - no match sends the 404 body', async () => {
  const router = new Router();
  const sink = new MemorySink();

  const outcome = await router.handle(request('GET', '/missing'), new SpurResponse(sink));

  assert.deepEqual(outcome, { ok: true });
  assert.equal(sink.last.status, 404);
  assert.equal(sink.last.headers['content-type'], 'application/json; charset=utf-8');
  assert.equal(sink.last.headers['content-length'], '74');
  assert.deepEqual(sink.json(), NOT_FOUND_BODY);
});

test('Router - wrong method on a known path is a 404', async () => {
  const router = new Router();
  router.addRoute('GET', '/a', noop);
  const sink = new MemorySink();

  await router.handle(request('DELETE', '/a'), new SpurResponse(sink));

  assert.equal(sink.last.status, 404);
});

test('Router - implicit HEAD answers 200 with no body', async () => {
  const router = new Router();
  router.addRoute('GET', '/ping', (_req, res) => {
    res.text('pong!').end();
  });
  const sink = new MemorySink();

  const outcome = await router.handle(request('HEAD', '/ping'), new SpurResponse(sink));

  assert.deepEqual(outcome, { ok: true });
  assert.deepEqual(sink.last, { status: 200, headers: {}, body: null });
});

test('Router - handler failure is returned as an outcome', async () => {
  const router = new Router();
  router.addRoute('GET', '/', () => {
    throw new Error('foo');
  });

  const outcome = await router.handle(request('GET', '/'), new SpurResponse(new MemorySink()));

  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.equal(outcome.error.status, 500);
    assert.equal(outcome.error.message, 'foo');
  }
});

test('Router - list sorts by address, verb precedence, then verb name', () => {
  const expected = [
    { address: '/a', method: 'HEAD' },
    { address: '/a', method: 'HEAD' },
    { address: '/a', method: 'HEAD' },
    { address: '/a', method: 'HEAD' },
    { address: '/a', method: 'HEAD' },
    { address: '/a', method: 'HEAD' },
    { address: '/a', method: 'GET' },
    { address: '/a', method: 'POST' },
    { address: '/a', method: 'PATCH' },
    { address: '/a', method: 'DELETE' },
    { address: '/a', method: 'OPTIONS' },
    { address: '/a', method: 'PROPFIND' },
    { address: '/b', method: 'HEAD' },
    { address: '/b', method: 'PUT' },
    { address: '/c', method: 'HEAD' },
  ];
  const registrations: Array<[string, string]> = [
    ['PUT', '/b'],
    ['OPTIONS', '/a'],
    ['GET', '/a'],
    ['PATCH', '/a'],
    ['DELETE', '/a'],
    ['POST', '/a'],
    ['HEAD', '/c'],
    ['PROPFIND', '/a'],
  ];

  const forward = new Router();
  for (const [method, address] of registrations) {
    forward.addRoute(method, address, noop);
  }

  const reversed = new Router();
  for (const [method, address] of [...registrations].reverse()) {
    reversed.addRoute(method, address, noop);
  }

  assert.deepEqual(forward.list(), expected);
  assert.deepEqual(reversed.list(), expected);
});

test('Router - list orders addresses by code unit', () => {
  const router = new Router();
  router.addRoute('GET', '/{name}', noop);
  router.addRoute('GET', '/Z', noop);
  router.addRoute('GET', '/a', noop);

  assert.deepEqual(
    router.list().filter((summary) => summary.method === 'GET').map((summary) => summary.address),
    ['/Z', '/a', '/{name}']
  );
});
