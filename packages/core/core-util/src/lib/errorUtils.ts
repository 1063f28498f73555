/**
 * Normalises whatever a catch block received into an Error.
 *
 * Every catch block in tollgate goes through this:
 * ```typescript
 * try {
 *     return await nextFilter.invoke(meta);
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     console.error(`[API-SVR-resp-FAIL] ${label} error=${error.message}`);
 *     throw error;
 * }
 * ```
 *
 * Error instances come back untouched. Error-like objects keep their message,
 * name and stack. Anything else is stringified into the message.
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

        try {
            const message = JSON.stringify(err);
            return new Error(`Non-Error object thrown: ${message}`);
        } catch (stringifyErr: unknown) {
            // no toError() here, this is the recovery path of toError itself
            void stringifyErr;
            return new Error('Non-Error object thrown (unable to stringify)');
        }
    }

    const message = err === null || err === undefined ? 'Null or undefined thrown' : String(err);
    return new Error(message);
}
