import { z } from 'zod';
import type { buildTestApp } from './build-test-app';

type TestApp = Awaited<ReturnType<typeof buildTestApp>>['app'];

export const UserResponseSchema = z
  .object({
    id: z.number().int().positive(),
    name: z.string(),
    email: z.string(),
    active: z.boolean(),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime().nullable(),
  })
  .strict(); // any extra key (e.g. passwordHash) fails the parse

export type UserResponseBody = z.infer<typeof UserResponseSchema>;

export const ErrorResponseSchema = z
  .object({
    timestamp: z.string().datetime(),
    status: z.number(),
    error: z.string(),
    message: z.string(),
    errors: z.record(z.string()).optional(),
  })
  .strict();

export type ErrorResponseBody = z.infer<typeof ErrorResponseSchema>;

export async function createUser(
  app: TestApp,
  body: { name: string; email: string; password: string },
): Promise<UserResponseBody> {
  const res = await app.inject({ method: 'POST', url: '/users', payload: body });
  if (res.statusCode !== 201) {
    throw new Error(`createUser failed with ${res.statusCode}: ${res.body}`);
  }
  return UserResponseSchema.parse(res.json());
}
