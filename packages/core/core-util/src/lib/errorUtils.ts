/**
 * Error normalisation for catch blocks.
 *
 * Every catch block in endpointkit funnels what it caught through toError()
 * before looking at it:
 * ```typescript
 * try {
 *     JSON.parse(text);
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     throw new FromHttpRequestError('Body', error.message, field, error);
 * }
 * ```
 */

/**
 * Converts whatever was thrown into an Error.
 *
 * Error instances come back untouched. Objects carrying a `message` keep their
 * message, name and stack. Other objects are stringified, primitives are
 * converted with String().
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

        return new Error(`Non-Error object thrown: ${describeObject(err)}`);
    }

    if (err === null || err === undefined) {
        return new Error('Null or undefined thrown');
    }
    return new Error(String(err));
}

function describeObject(value: object): string {
    // JSON.stringify throws on cycles and BigInt members
    try {
        return JSON.stringify(value);
    } catch (err: unknown) {
        //const error = toError(err);  recursion guard, see toError above
        void err;
        return '(unable to stringify)';
    }
}
