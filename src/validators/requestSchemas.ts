import { z } from 'zod';
import { UnprocessableEntityError } from '../http/errors';

export const zPerson = z.object({
  full_name: z.string(),
  phone_number: z.string(),
});

// a repeated query parameter arrives as an array; the last occurrence wins
const queryValue = z.preprocess((value) => (Array.isArray(value) ? value[value.length - 1] : value), z.string());

export const zFullNameQuery = z.object({ full_name: queryValue });

export const zPhoneNumberQuery = z.object({ phone_number: queryValue });

export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new UnprocessableEntityError(
      'Validation failed',
      parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message, code: issue.code })),
    );
  }
  return parsed.data;
}
