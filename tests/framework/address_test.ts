/**
 * Route Address Tests
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { RouteAddress } from '../../framework/router/address.ts';
import { RouteConfigurationError } from '../../framework/http/errors.ts';

test('RouteAddress - literal pattern matches only the exact path', () => {
  const address = RouteAddress.compile('/users/active');

  assert.equal(address.matches('/users/active'), true);
  assert.equal(address.matches('/users'), false);
  assert.equal(address.matches('/users/active/1'), false);
  assert.deepEqual(address.variableNames, []);
});

test('RouteAddress - root pattern matches root path', () => {
  const address = RouteAddress.compile('/');

  assert.equal(address.matches('/'), true);
  assert.equal(address.matches('/ping'), false);
});

test('RouteAddress - empty segments are ignored', () => {
  const address = RouteAddress.compile('//a///b/');

  assert.equal(address.matches('/a/b'), true);
  assert.equal(address.raw, '//a///b/');
});

test('RouteAddress - literal segments are matched verbatim', () => {
  const address = RouteAddress.compile('/sitemap.json');

  assert.equal(address.matches('/sitemap.json'), true);
  assert.equal(address.matches('/sitemapXjson'), false);
});

test('RouteAddress - catch-all matches any path', () => {
  const address = RouteAddress.compile('*');

  assert.equal(address.matches('/'), true);
  assert.equal(address.matches('/files/path/to/file.txt'), true);
  assert.deepEqual(address.variableNames, []);
  assert.deepEqual(address.extract('/anything'), {});
});

test('RouteAddress - free capture extracts the segment', () => {
  const address = RouteAddress.compile('/{name}');

  assert.deepEqual(address.variableNames, ['name']);
  assert.deepEqual(address.extract('/alice'), { name: 'alice' });
});

test('RouteAddress - free capture is unbounded', () => {
  const address = RouteAddress.compile('/{name}');

  assert.deepEqual(address.extract('/a/b'), { name: 'a/b' });
});

test('RouteAddress - constrained capture', () => {
  const address = RouteAddress.compile('/{id:[0-9]+}');

  assert.equal(address.matches('/abc'), false);
  assert.equal(address.matches('/42'), true);
  assert.deepEqual(address.extract('/42'), { id: '42' });
  assert.equal(address.extract('/abc'), null);
});

test('RouteAddress - constrained capture with quantifier braces', () => {
  const address = RouteAddress.compile('/years/{year:[0-9]{4}}');

  assert.deepEqual(address.extract('/years/2024'), { year: '2024' });
  assert.equal(address.matches('/years/24'), false);
});

test('RouteAddress - empty constraint falls back to any characters', () => {
  const address = RouteAddress.compile('/{slug:}');

  assert.deepEqual(address.extract('/hello-world'), { slug: 'hello-world' });
});

test('RouteAddress - variable names keep left-to-right order', () => {
  const address = RouteAddress.compile('/users/{userId}/posts/{postId:[0-9]+}');

  assert.deepEqual(address.variableNames, ['userId', 'postId']);
  assert.deepEqual(address.extract('/users/123/posts/456'), {
    userId: '123',
    postId: '456',
  });
});

test('RouteAddress - compiling twice yields the same matcher', () => {
  const first = RouteAddress.compile('/users/{id:[0-9]+}/{rest}');
  const second = RouteAddress.compile('/users/{id:[0-9]+}/{rest}');

  assert.equal(first.matcher.source, second.matcher.source);
  assert.deepEqual(first.variableNames, second.variableNames);
});

test('RouteAddress - is immutable', () => {
  const address = RouteAddress.compile('/{name}');

  assert.ok(Object.isFrozen(address));
  assert.ok(Object.isFrozen(address.variableNames));
});

test('RouteAddress - unmatched brace fails at compile time', () => {
  assert.throws(() => RouteAddress.compile('/{name'), RouteConfigurationError);
  assert.throws(() => RouteAddress.compile('/name}'), RouteConfigurationError);
});

test('RouteAddress - invalid constraint fails at compile time', () => {
  assert.throws(() => RouteAddress.compile('/{id:[0-9}'), RouteConfigurationError);
});

test('RouteAddress - duplicate variable fails at compile time', () => {
  assert.throws(
    () => RouteAddress.compile('/{id}/{id}'),
    (error: unknown) =>
      error instanceof RouteConfigurationError &&
      error.pattern === '/{id}/{id}' &&
      error.message === 'Invalid route pattern "/{id}/{id}": variable "id" declared twice'
  );
});
