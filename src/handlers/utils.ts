import { z } from 'zod';
import { createGenericError } from '../types/errors.js';

/**
 * Validate raw tool arguments against a schema.
 * @throws NarrativeException INVALID_ARGUMENT listing every failing field
 */
export function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown, tool: string): T {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
        const reason = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '<args>'}: ${issue.message}`)
            .join('; ');
        throw createGenericError('INVALID_ARGUMENT', `Invalid arguments for ${tool}: ${reason}`, {
            tool,
        });
    }
    return parsed.data;
}
