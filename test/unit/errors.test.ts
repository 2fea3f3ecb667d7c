/**
 * Error Response Utilities Tests
 *
 * Each helper is mounted on a tiny Hono app so the real Response is checked.
 */

import { test, expect, vi, afterEach } from 'vitest';
import { Hono, type Handler } from 'hono';
import {
  badRequestError,
  internalServerError,
  validationError,
  invalidJsonError,
  handleApiError,
  ApiError,
  ErrorType,
  createNotFoundError,
} from '../../src/utils/errors.js';

afterEach(() => {
  vi.restoreAllMocks();
});

async function call(handler: Handler): Promise<{ status: number; body: unknown }> {
  const app = new Hono();
  app.get('/', handler);
  const res = await app.request('/');
  return { status: res.status, body: await res.json() };
}

test('badRequestError creates 400 error', async () => {
  const { status, body } = await call((c) => badRequestError(c, 'Invalid input'));
  expect(status).toBe(400);
  expect(body).toEqual({ error: 'Invalid input' });
});

test('badRequestError with default message', async () => {
  const { status, body } = await call((c) => badRequestError(c));
  expect(status).toBe(400);
  expect(body).toEqual({ error: 'Bad request' });
});

test('validationError lists field errors', async () => {
  const details = [{ field: 'theme', message: 'Theme is required' }];
  const { status, body } = await call((c) => validationError(c, details));
  expect(status).toBe(400);
  expect(body).toEqual({ error: 'Validation failed', details });
});

test('invalidJsonError points at the body', async () => {
  const { status, body } = await call((c) => invalidJsonError(c));
  expect(status).toBe(400);
  expect(body).toEqual({
    error: 'Invalid JSON',
    details: [{ field: 'body', message: 'Request body contains invalid JSON' }],
  });
});

test('internalServerError hides the cause by default', async () => {
  const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const cause = new Error('connection reset');

  const { status, body } = await call((c) => internalServerError(c, 'Database failure', cause));

  expect(status).toBe(500);
  expect(body).toEqual({
    error: 'Database failure',
    details: 'An unexpected error occurred. Please try again later.',
  });
  expect(consoleSpy).toHaveBeenCalledWith('Database failure:', cause);
});

test('internalServerError exposes the cause in debug mode', async () => {
  vi.spyOn(console, 'error').mockImplementation(() => {});

  const { body } = await call((c) => internalServerError(c, 'Database failure', new Error('connection reset'), true));

  expect(body).toEqual({ error: 'Database failure', details: 'connection reset' });
});

test('handleApiError keeps the status of an ApiError', async () => {
  const { status, body } = await call((c) => handleApiError(c, createNotFoundError('Story', 'id 42')));
  expect(status).toBe(404);
  expect(body).toEqual({ error: 'Story with id 42 not found', details: 'id 42' });
});

test('handleApiError turns other errors into 500', async () => {
  vi.spyOn(console, 'error').mockImplementation(() => {});

  const { status, body } = await call((c) => handleApiError(c, new Error('boom'), 'Request failed'));

  expect(status).toBe(500);
  expect(body).toEqual({
    error: 'Request failed',
    details: 'An unexpected error occurred. Please try again later.',
  });
});

test('createNotFoundError builds a 404 ApiError', () => {
  const error = createNotFoundError('Job', 'id 01abc');

  expect(error).toBeInstanceOf(ApiError);
  expect(error.name).toBe('ApiError');
  expect(error.type).toBe(ErrorType.NOT_FOUND);
  expect(error.message).toBe('Job with id 01abc not found');
  expect(error.details).toBe('id 01abc');
});

test('createNotFoundError without identifier', () => {
  expect(createNotFoundError('Story').message).toBe('Story not found');
});
