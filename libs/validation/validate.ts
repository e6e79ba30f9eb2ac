import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { SnapshotConfigError } from '../errors/snapshotErrors.js';

/**
 * Fail-closed validation.
 * Returns the parsed value or throws SnapshotConfigError listing every issue.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Values are not logged: the env may carry storage credentials.
        logger.warn({ context, errors: issues }, "Configuration validation failure");

        throw new SnapshotConfigError(context, issues);
    }

    return result.data;
}
