import { describe, it, expect } from 'vitest';

import { buildTestApp } from '../helpers/build-test-app';
import { createUser, ErrorResponseSchema } from '../helpers/user-api';

describe('request validation', () => {
  it('POST /users reports every invalid field', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users',
        payload: { name: 'J', email: 'not-an-email', password: 'short' },
      });

      expect(res.statusCode).toBe(400);
      const body = ErrorResponseSchema.parse(res.json());
      expect(body).toMatchObject({ status: 400, error: 'Bad Request', message: 'Validation failed' });
      expect(body.errors).toEqual({
        name: 'Name must be between 2 and 100 characters',
        email: 'Email must be a valid email address',
        password: 'Password must be at least 8 characters',
      });
    } finally {
      await close();
    }
  });

  it('POST /users with an empty object names the missing fields', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'POST', url: '/users', payload: {} });

      expect(res.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(res.json()).errors).toEqual({
        name: 'Name is required',
        email: 'Email is required',
        password: 'Password is required',
      });
    } finally {
      await close();
    }
  });

  it('malformed JSON is a 400 in the error body shape', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users',
        headers: { 'content-type': 'application/json' },
        payload: '{"name":',
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(res.json())).toMatchObject({
        status: 400,
        error: 'Bad Request',
      });
    } finally {
      await close();
    }
  });

  it('a non-numeric id is a 400 on errors.id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/users/abc' });

      expect(res.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(res.json()).errors).toEqual({ id: 'Id must be a number' });
    } finally {
      await close();
    }
  });

  it('a zero id is a 400', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'DELETE', url: '/users/0' });

      expect(res.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(res.json()).errors).toEqual({
        id: 'Id must be a positive integer',
      });
    } finally {
      await close();
    }
  });

  it('an id beyond the users.id range is a 400 rather than a lookup', async () => {
    const { app, close } = await buildTestApp();

    try {
      const big = await app.inject({ method: 'GET', url: '/users/99999999999999999999' });
      const justOver = await app.inject({ method: 'PATCH', url: '/users/2147483648/reactivate' });

      expect(big.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(big.json()).errors).toEqual({ id: 'Id is out of range' });
      expect(justOver.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(justOver.json()).errors).toEqual({
        id: 'Id is out of range',
      });
    } finally {
      await close();
    }
  });

  it('PUT /users/:id rejects a too-short name and a wrongly typed email', async () => {
    const { app, close } = await buildTestApp();

    try {
      await createUser(app, { name: 'Joe', email: 'joe@email.com', password: '12345678' });

      const res = await app.inject({
        method: 'PUT',
        url: '/users/1',
        payload: { name: 'J', email: 42 },
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(res.json()).errors).toEqual({
        name: 'Name must be between 2 and 100 characters',
        email: 'Email must be a string',
      });
    } finally {
      await close();
    }
  });

  it('excludeId must be a positive integer', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/users/email-exists/joe@email.com?excludeId=-3',
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(res.json()).errors).toEqual({
        excludeId: 'excludeId must be a positive integer',
      });
    } finally {
      await close();
    }
  });
});
