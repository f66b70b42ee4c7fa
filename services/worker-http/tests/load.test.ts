import test from 'node:test';
import assert from 'node:assert/strict';
import { BackendIOError, MalformedRequestError } from '../src/errors';
import { buildLoadOptions, createLoadHandler } from '../src/handlers/load';
import { parseRequestUri } from '../src/http/requestUri';
import { DEFAULT_LOAD_OPTIONS, LoadOptionsBuilder } from '../src/load/options';
import { createTestDependencies } from './helpers';

function get(uri: string) {
  return { method: 'GET', descriptor: parseRequestUri(uri), body: null };
}

test('passes the decoded path and options to the load service and returns its reply verbatim', async () => {
  const deps = createTestDependencies();
  const response = await createLoadHandler(deps)(get('/load?path=%2Ftmp%2Fdata&verify=true&bandwidth=1000'));

  assert.equal(response.status, 200);
  assert.equal(response.headers['content-type'], 'text/plain');
  assert.equal(response.body?.toString('utf8'), 'Load job submitted');
  assert.equal(deps.loadService.calls.length, 1);
  assert.deepEqual(deps.loadService.calls[0], {
    path: '/tmp/data',
    options: { ...DEFAULT_LOAD_OPTIONS, verify: true, bandwidth: 1000 }
  });
});

test('applies every recognised load parameter', () => {
  const options = buildLoadOptions(
    parseRequestUri(
      '/load?path=%2Fa&opType=PROGRESS&partialListing=TRUE&verify=yes&bandwidth=0&verbose=true' +
        '&loadMetadataOnly=true&skipIfExists=true&fileFilterRegx=.*%5C.csv&progressFormat=json'
    )
  );

  assert.deepEqual(options, {
    opType: 'progress',
    partialListing: true,
    verify: false,
    bandwidth: 0,
    verbose: true,
    loadMetadataOnly: true,
    skipIfExists: true,
    fileFilterPattern: '.*%5C.csv',
    progressFormat: 'JSON'
  });
  assert.ok(Object.isFrozen(options));
});

test('empty parameters keep their defaults', () => {
  const options = buildLoadOptions(parseRequestUri('/load?path=%2Fa&verify=&bandwidth=&opType='));
  assert.deepEqual(options, DEFAULT_LOAD_OPTIONS);
});

test('rejects invalid load parameters', () => {
  const cases = [
    '/load?path=%2Fa&opType=restart',
    '/load?path=%2Fa&progressFormat=xml',
    '/load?path=%2Fa&bandwidth=-5',
    '/load?path=%2Fa&bandwidth=fast',
    '/load?path=%2Fa&fileFilterRegx=(unclosed'
  ];
  for (const uri of cases) {
    assert.throws(() => buildLoadOptions(parseRequestUri(uri)), MalformedRequestError, uri);
  }
});

test('requires a path', async () => {
  const deps = createTestDependencies();
  await assert.rejects(createLoadHandler(deps)(get('/load?verify=true')), MalformedRequestError);
  assert.equal(deps.loadService.calls.length, 0);
});

test('load service failures become backend errors', async () => {
  const deps = createTestDependencies();
  deps.loadService.failure = new Error('queue unavailable');

  await assert.rejects(createLoadHandler(deps)(get('/load?path=%2Fdata')), (err: unknown) => {
    assert.ok(err instanceof BackendIOError);
    assert.deepEqual(err.details, { path: '/data', reason: 'queue unavailable' });
    return true;
  });
});

test('builder returns independent frozen snapshots', () => {
  const builder = LoadOptionsBuilder.create().setVerify(true);
  const first = builder.build();
  const second = builder.setVerbose(true).build();

  assert.equal(first.verbose, false);
  assert.equal(second.verbose, true);
  assert.equal(second.verify, true);
  assert.ok(Object.isFrozen(first));
});
