/**
 * HTTP Error Tests
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import {
  HttpException,
  isHttpException,
  ResponseFinalizedError,
  RouteConfigurationError,
  toHttpException,
} from '../../framework/http/errors.ts';

test('HttpException - envelope carries status, code, message and details', () => {
  const error = new HttpException(422, 'invalid input', { field: 'email' });

  assert.equal(error.code, 'http_error_422');
  assert.deepEqual(error.toEnvelope(), {
    status: 422,
    error: {
      code: 'http_error_422',
      message: 'invalid input',
      details: { field: 'email' },
    },
  });
});

test('HttpException - defaults to empty details and headers', () => {
  const error = new HttpException(400, 'bad');

  assert.deepEqual(error.details, {});
  assert.deepEqual(error.headers, {});
  assert.ok(error instanceof Error);
  assert.equal(error.name, 'HttpException');
});

test('HttpException - details and headers are copied and frozen', () => {
  const details: Record<string, unknown> = { a: 1 };
  const error = new HttpException(429, 'slow down', details, { 'retry-after': '30' });
  details.a = 2;

  assert.deepEqual(error.details, { a: 1 });
  assert.ok(Object.isFrozen(error.details));
  assert.ok(Object.isFrozen(error.headers));
  assert.equal(error.headers['retry-after'], '30');
});

test('HttpException - unsupported media type', () => {
  const error = HttpException.unsupportedMediaType('image/png', ['application/json']);

  assert.equal(error.status, 415);
  assert.equal(error.message, 'Unsupported content type: image/png');
  assert.deepEqual(error.details, { allowed_content_types: ['application/json'] });
});

test('HttpException - unsupported media type without a content type', () => {
  const error = HttpException.unsupportedMediaType('');

  assert.equal(error.message, 'No content type given');
  assert.deepEqual(error.details, { allowed_content_types: [] });
});

test('toHttpException - keeps HTTP failures and wraps everything else', () => {
  const http = new HttpException(404, 'gone');

  assert.equal(toHttpException(http), http);
  assert.equal(isHttpException(http), true);
  assert.equal(isHttpException(new Error('x')), false);

  const wrapped = toHttpException(new TypeError('boom'));
  assert.equal(wrapped.status, 500);
  assert.equal(wrapped.message, 'boom');

  const fromString = toHttpException('plain');
  assert.equal(fromString.status, 500);
  assert.equal(fromString.message, 'plain');
});

test('RouteConfigurationError - names the pattern', () => {
  const error = new RouteConfigurationError('/{x', 'unclosed');

  assert.equal(error.message, 'Invalid route pattern "/{x": unclosed');
  assert.equal(error.pattern, '/{x');
  assert.equal(error.name, 'RouteConfigurationError');
});

test('ResponseFinalizedError - names the operation', () => {
  assert.equal(new ResponseFinalizedError('end').message, 'Cannot end: response already sent');
});
