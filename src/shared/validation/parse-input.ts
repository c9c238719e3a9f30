import { z } from 'zod';
import { fail, ok, Result } from '../errors';

/**
 * Validate operation input against a zod schema, reporting violations as an
 * `InvalidArgument` failure instead of throwing.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const errors = result.error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
        return fail('InvalidArgument', errors.join(', '));
    }
    return ok(result.data);
}
