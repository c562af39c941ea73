import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

describe('GET /health', () => {
  it('returns a fixed OK text and echoes a request id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('OK');
      expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(typeof res.headers['x-request-id']).toBe('string');
    } finally {
      await close();
    }
  });

  it('reuses a well-formed incoming x-request-id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'trace-12345678' },
      });

      expect(res.headers['x-request-id']).toBe('trace-12345678');
    } finally {
      await close();
    }
  });

  it('allows cross-origin callers', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { origin: 'http://localhost:5173' },
      });

      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    } finally {
      await close();
    }
  });
});

describe('unknown routes', () => {
  it('return 404 in the error body shape', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toMatchObject({
        status: 404,
        error: 'Not Found',
        message: 'Route GET /nope not found',
      });
    } finally {
      await close();
    }
  });
});
