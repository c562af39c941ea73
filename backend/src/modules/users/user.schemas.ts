/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching the service.
 *
 * RULES:
 * - Use Zod for runtime validation (structure, format, length only).
 * - Name: 2-100 chars after trimming. Password: 8+ chars.
 * - Email normalized (trim + lowercase) in the service/mapper, not here.
 * - Update fields are optional; blank means "leave unchanged".
 */

import { z } from 'zod';

const NAME_MIN = 2;
const NAME_MAX = 100;
const PASSWORD_MIN = 8;
// users.id is a Postgres serial (int4).
const ID_MAX = 2_147_483_647;

const NAME_LENGTH_MESSAGE = `Name must be between ${NAME_MIN} and ${NAME_MAX} characters`;
const EMAIL_MESSAGE = 'Email must be a valid email address';

const isEmail = (value: string) => z.string().email().safeParse(value).success;

export const createUserSchema = z.object({
  name: z
    .string({ required_error: 'Name is required', invalid_type_error: 'Name must be a string' })
    .trim()
    .min(NAME_MIN, NAME_LENGTH_MESSAGE)
    .max(NAME_MAX, NAME_LENGTH_MESSAGE),
  email: z
    .string({ required_error: 'Email is required', invalid_type_error: 'Email must be a string' })
    .trim()
    .min(1, 'Email is required')
    .email(EMAIL_MESSAGE),
  password: z
    .string({
      required_error: 'Password is required',
      invalid_type_error: 'Password must be a string',
    })
    .min(PASSWORD_MIN, `Password must be at least ${PASSWORD_MIN} characters`),
});

export const updateUserSchema = z.object({
  name: z
    .string({ invalid_type_error: 'Name must be a string' })
    .trim()
    .refine((v) => v.length === 0 || (v.length >= NAME_MIN && v.length <= NAME_MAX), {
      message: NAME_LENGTH_MESSAGE,
    })
    .nullish(),
  email: z
    .string({ invalid_type_error: 'Email must be a string' })
    .trim()
    .refine((v) => v.length === 0 || isEmail(v), { message: EMAIL_MESSAGE })
    .nullish(),
});

export const userIdParamsSchema = z.object({
  id: z.coerce
    .number({ invalid_type_error: 'Id must be a number' })
    .int('Id must be an integer')
    .positive('Id must be a positive integer')
    .max(ID_MAX, 'Id is out of range'),
});

export const emailParamsSchema = z.object({
  email: z.string().trim().min(1, 'Email is required'),
});

export const emailExistsQuerySchema = z.object({
  excludeId: z.coerce
    .number({ invalid_type_error: 'excludeId must be a number' })
    .int('excludeId must be an integer')
    .positive('excludeId must be a positive integer')
    .max(ID_MAX, 'excludeId is out of range')
    .optional(),
});

export const searchQuerySchema = z.object({
  name: z
    .string({ required_error: 'Name fragment is required' })
    .trim()
    .min(1, 'Name fragment is required'),
});
