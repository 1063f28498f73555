import {
    HttpBadRequestError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpUserError,
} from './errors';
import { toError } from '@tollgate/core-util';

/**
 * LogApiCall - request/response logging around one outgoing API call.
 *
 * Log lines:
 * - [API-{type}-req] label request={...} headers={...}
 * - [API-{type}-resp-SUCCESS] label response={...}
 * - [API-{type}-resp-OTHER] label errorType=...   (user errors, see isUserError)
 * - [API-{type}-resp-FAIL] label errorType=... error=...
 *
 * The label names the call, e.g. `clientA GET http://localhost:8200/internal/a`.
 * Secured header values must already be masked by the caller (HeaderMethods).
 */
export class LogApiCall {
    public async execute<T>(
        type: string,
        label: string,
        requestDto: unknown,
        headers: Record<string, string>,
        method: () => Promise<T>,
    ): Promise<T> {
        console.log(
            `[API-${type}-req] ${label} request=${LogApiCall.stringify(requestDto)} headers=${JSON.stringify(headers)}`,
        );

        try {
            const response = await method();
            console.log(`[API-${type}-resp-SUCCESS] ${label} response=${LogApiCall.stringify(response)}`);
            return response;
        } catch (err: unknown) {
            const error = toError(err);
            const errorType = error.constructor.name;

            if (LogApiCall.isUserError(error)) {
                console.log(`[API-${type}-resp-OTHER] ${label} errorType=${errorType}`);
            } else {
                console.error(`[API-${type}-resp-FAIL] ${label} errorType=${errorType} error=${error.message}`);
            }
            throw error;
        }
    }

    /**
     * User errors are the caller's mistake, not a failure of the service:
     * 400, 401, 403, 404 and 266. They are logged as OTHER without alarm.
     */
    static isUserError(error: unknown): boolean {
        return (
            error instanceof HttpBadRequestError ||
            error instanceof HttpUnauthorizedError ||
            error instanceof HttpForbiddenError ||
            error instanceof HttpNotFoundError ||
            error instanceof HttpUserError
        );
    }

    private static stringify(value: unknown): string {
        return value === undefined ? 'undefined' : JSON.stringify(value);
    }
}
