import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import express from 'express';
import { z } from 'zod';
import { errorHandler, toErrorResponse } from '../errorHandler.js';
import {
  AuthenticationError,
  DuplicateIdentityError,
  NotFoundError,
  UnauthorizedError,
} from '../../../../application/errors.js';

describe('toErrorResponse', () => {
  it('should map validation errors to 400 with issues', () => {
    const result = z.object({ email: z.string().email() }).safeParse({ email: 'nope' });
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    expect(toErrorResponse(result.error)).toEqual({
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: { issues: [{ path: 'email', message: 'Invalid email' }] },
      },
    });
  });

  it.each([
    [new DuplicateIdentityError(), 400, 'DUPLICATE_IDENTITY', 'An account with this email already exists'],
    [new AuthenticationError(), 401, 'INVALID_CREDENTIALS', 'Invalid email or password'],
    [new UnauthorizedError('No session'), 401, 'UNAUTHORIZED', 'No session'],
    [new NotFoundError('Missing'), 404, 'NOT_FOUND', 'Missing'],
  ])('should map %s', (error, status, code, message) => {
    expect(toErrorResponse(error)).toEqual({ status, body: { code, message } });
  });

  it('should keep client statuses raised by Express middleware', () => {
    const error = Object.assign(new Error('request entity too large'), { status: 413 });

    expect(toErrorResponse(error)).toEqual({
      status: 413,
      body: { code: 'BAD_REQUEST', message: 'request entity too large' },
    });
  });

  it('should hide the message of unexpected errors', () => {
    expect(toErrorResponse(new Error('password=test-secret leaked'))).toEqual({
      status: 500,
      body: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });
});

describe('errorHandler', () => {
  let app: express.Express;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    app = express();
    app.get('/missing', () => {
      throw new NotFoundError('No such thing');
    });
    app.get('/boom', () => {
      throw new Error('kaboom');
    });
    app.use(errorHandler);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should answer JSON by default', async () => {
    const res = await request(app).get('/missing');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ code: 'NOT_FOUND', message: 'No such thing' });
    expect(console.warn).toHaveBeenCalledWith('404 NOT_FOUND: No such thing');
  });

  it('should render an HTML page for browsers', async () => {
    const res = await request(app).get('/missing').set('Accept', 'text/html');

    expect(res.status).toBe(404);
    expect(res.headers['content-type']).toMatch(/^text\/html/);
    expect(res.text).toContain('<p>Error 404: No such thing</p>');
  });

  it('should log unexpected errors', async () => {
    const res = await request(app).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
