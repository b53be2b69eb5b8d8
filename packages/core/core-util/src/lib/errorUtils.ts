/**
 * Error handling utilities.
 * Every catch block normalises what it caught with toError() before
 * inspecting, logging or rethrowing it.
 */

/**
 * Converts whatever was thrown into an Error instance.
 *
 * Pattern used throughout the codebase:
 * ```typescript
 * try {
 *     await riskyOperation();
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     console.error('[Component] Operation failed:', error.message);
 *     throw error;
 * }
 * ```
 *
 * Error instances are returned unchanged, error-like objects keep their
 * message, name and stack, other objects are stringified and primitives
 * become the message.
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (err !== null && typeof err === 'object') {
        if ('message' in err) {
            const error = new Error(String(err.message));
            if ('stack' in err && typeof err.stack === 'string') {
                error.stack = err.stack;
            }
            if ('name' in err && typeof err.name === 'string') {
                error.name = err.name;
            }
            return error;
        }

        // JSON.stringify throws on cycles; recursing into toError here could loop
        try {
            return new Error(`Non-Error object thrown: ${JSON.stringify(err)}`);
        } catch (stringifyErr: unknown) {
            void stringifyErr;
            return new Error('Non-Error object thrown (unable to stringify)');
        }
    }

    if (err === null || err === undefined) {
        return new Error('Null or undefined thrown');
    }
    return new Error(String(err));
}

/**
 * Name of the JSON node type of a parsed value, for error messages.
 * Returns one of: null, array, object, string, number, boolean, undefined.
 */
export function describeJsonValue(value: unknown): string {
    if (value === null) {
        return 'null';
    }
    if (Array.isArray(value)) {
        return 'array';
    }
    return typeof value;
}
