import { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = schema.safeParse(input);
 * assertValidated(parsed);
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<I, T>(
  parsed: z.SafeParseReturnType<I, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}
