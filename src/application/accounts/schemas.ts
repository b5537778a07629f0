import { z, type ZodError } from 'zod';
import { ROLES } from '../../domain/auth/account.js';
import { ValidationError } from '../../domain/auth/errors.js';

export const MAX_USERNAME_LENGTH = 50;
export const MAX_EMAIL_LENGTH = 100;

export const usernameSchema = z
  .string()
  .trim()
  .min(1, 'Username is required')
  .max(MAX_USERNAME_LENGTH, `Username must be at most ${MAX_USERNAME_LENGTH} characters`);

export const emailSchema = z
  .string()
  .trim()
  .min(1, 'Email is required')
  .max(MAX_EMAIL_LENGTH, `Email must be at most ${MAX_EMAIL_LENGTH} characters`)
  .email('Email must be a valid address')
  .transform((email) => email.toLowerCase());

export const roleSchema = z.enum(ROLES, {
  errorMap: () => ({ message: "Role must be 'user' or 'admin'" }),
});

export function passwordSchema(minLength: number) {
  return z
    .string()
    .min(1, 'Password is required')
    .min(minLength, `Password must be at least ${minLength} characters`);
}

export function createAccountSchema(minPasswordLength: number) {
  return z.object({
    username: usernameSchema,
    email: emailSchema,
    password: passwordSchema(minPasswordLength),
    role: roleSchema.default('user'),
  });
}

export function updateAccountSchema(minPasswordLength: number) {
  return z.object({
    email: emailSchema.optional(),
    role: roleSchema.optional(),
    password: passwordSchema(minPasswordLength).optional(),
  });
}

function toValidationError(error: ZodError): ValidationError {
  return new ValidationError(
    error.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
    }))
  );
}

/**
 * Parse input against a schema, throwing ValidationError on failure.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
