import test from 'node:test';
import assert from 'node:assert/strict';
import { PageNotFoundError, UnmatchedRouteError } from '../src/errors';
import { HEALTH_MESSAGE } from '../src/handlers/health';
import type { OperationHandler } from '../src/handlers/types';
import { ResponseContext } from '../src/http/responseContext';
import { ROUTE_TABLE, Router, renderError, type OperationName } from '../src/http/router';
import type { InboundRequest } from '../src/http/types';
import { createSilentLogger, createTestDependencies } from './helpers';

function request(method: string, uri: string, body: Buffer | null = null): InboundRequest {
  return { method, uri, httpVersion: '1.1', headers: {}, body };
}

function bodyJson(response: ResponseContext): unknown {
  return JSON.parse((response.body ?? Buffer.alloc(0)).toString('utf8'));
}

function respondsWithName(name: OperationName): OperationHandler {
  return async () => ResponseContext.text(200, name);
}

function namedHandlers(): Record<OperationName, OperationHandler> {
  return {
    pageRead: respondsWithName('pageRead'),
    pageWrite: respondsWithName('pageWrite'),
    listFiles: respondsWithName('listFiles'),
    fileStatus: respondsWithName('fileStatus'),
    load: respondsWithName('load'),
    health: respondsWithName('health')
  };
}

test('route table maps every method and path to one operation', async () => {
  const router = new Router(namedHandlers(), createSilentLogger());
  const cases: Array<[string, string, string]> = [
    ['GET', '/file/abc/page/0', 'pageRead'],
    ['POST', '/file/abc/page/0', 'pageWrite'],
    ['PUT', '/file/abc/page/0', 'pageWrite'],
    ['GET', '/files?path=%2F', 'listFiles'],
    ['GET', '/info?path=%2F', 'fileStatus'],
    ['GET', '/load?path=%2F', 'load'],
    ['GET', '/health', 'health']
  ];

  for (const [method, uri, expected] of cases) {
    const result = await router.dispatch(request(method, uri));
    assert.equal(result.response.body?.toString('utf8'), expected, `${method} ${uri}`);
  }
});

test('resolve accepts lower-case methods', () => {
  const router = new Router(namedHandlers(), createSilentLogger());
  assert.equal(typeof router.resolve('get', 'health'), 'function');
});

test('route table lists the accepted methods per path', () => {
  assert.deepEqual(Object.keys(ROUTE_TABLE.file), ['GET', 'POST', 'PUT']);
  assert.deepEqual(Object.keys(ROUTE_TABLE.health), ['GET']);
});

test('unknown mapping path renders a 404 error envelope', async () => {
  const router = new Router(namedHandlers(), createSilentLogger());
  const result = await router.dispatch(request('GET', '/nope/1'));

  assert.equal(result.route, 'unmatched');
  assert.equal(result.response.status, 404);
  assert.equal(result.response.headers['content-type'], 'application/json');
  assert.deepEqual(bodyJson(result.response), {
    error: {
      code: 'UNMATCHED_ROUTE',
      message: 'No route for GET /nope',
      details: { method: 'GET', mappingPath: 'nope' }
    }
  });
});

test('known path with an unsupported method renders 405 with an allow header', async () => {
  const router = new Router(namedHandlers(), createSilentLogger());
  const result = await router.dispatch(request('DELETE', '/file/abc/page/0'));

  assert.equal(result.response.status, 405);
  assert.equal(result.response.headers.allow, 'GET, POST, PUT');
  assert.equal(result.route, 'unmatched');
});

test('malformed URI becomes a 400 response instead of a fault', async () => {
  const router = new Router(namedHandlers(), createSilentLogger());
  const result = await router.dispatch(request('GET', '/'));

  assert.equal(result.response.status, 400);
  const body = bodyJson(result.response);
  assert.deepEqual(body, {
    error: { code: 'MALFORMED_REQUEST', message: 'Request URI has no mapping path', details: { uri: '/' } }
  });
});

test('handler errors of the worker taxonomy are rendered with the route label', async () => {
  const handlers = namedHandlers();
  handlers.pageRead = async () => {
    throw new PageNotFoundError('abc', 3);
  };
  const router = new Router(handlers, createSilentLogger());
  const result = await router.dispatch(request('GET', '/file/abc/page/3'));

  assert.equal(result.route, 'file');
  assert.equal(result.response.status, 404);
  assert.deepEqual(bodyJson(result.response), {
    error: {
      code: 'PAGE_NOT_FOUND',
      message: 'page not found: fileId abc, pageIndex 3',
      details: { fileId: 'abc', pageIndex: 3, reason: null }
    }
  });
});

test('unexpected handler faults propagate to the caller', async () => {
  const handlers = namedHandlers();
  handlers.health = async () => {
    throw new TypeError('boom');
  };
  const router = new Router(handlers, createSilentLogger());

  await assert.rejects(router.dispatch(request('GET', '/health')), TypeError);
});

test('router built from dependencies serves the health check', async () => {
  const router = Router.create(createTestDependencies());
  const result = await router.dispatch(request('GET', '/health'));

  assert.equal(result.response.status, 200);
  assert.equal(result.response.headers['content-type'], 'text/plain');
  assert.equal(result.response.body?.toString('utf8'), HEALTH_MESSAGE);
});

test('renderError omits the allow header for plain 404s', () => {
  const rendered = renderError(new UnmatchedRouteError('GET', 'x'));
  assert.equal(rendered.headers.allow, undefined);
  assert.equal(rendered.status, 404);
});
