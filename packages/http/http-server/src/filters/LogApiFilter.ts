import { inject, injectable, multiInject, optional } from 'inversify';
import { provideSingleton, MethodMeta } from '@tollgate/http-routing';
import { Filter, ResponseWrapper, Service } from '@tollgate/http-filters';
import { HEADER_TYPES, HeaderMethods, LogApiCall, PlatformHeader, PlatformHeadersExtension } from '@tollgate/http-api';
import { toError } from '@tollgate/core-util';

/**
 * LogApiFilter - structured logging of every request and response.
 * Priority: 1800 (below ContextFilter, above route filters so rejections are logged).
 *
 * - [API-SVR-req] 'Class.method METHOD path' request=... headers=...
 * - [API-SVR-resp-SUCCESS] 'Class.method METHOD path' status=... response=...
 * - [API-SVR-resp-OTHER] 'Class.method METHOD path' status=... (status >= 400 answered by a filter)
 * - [API-SVR-resp-OTHER] 'Class.method METHOD path' errorType=... (user errors: 400, 401, 403, 404, 266)
 * - [API-SVR-resp-FAIL] 'Class.method METHOD path' error=... (everything else)
 *
 * Secured platform header values are masked.
 */
@provideSingleton()
@injectable()
export class LogApiFilter extends Filter<MethodMeta, ResponseWrapper<unknown>> {
    private platformHeaders: PlatformHeader[];

    constructor(
        @multiInject(HEADER_TYPES.PlatformHeadersExtension)
        @optional()
        extensions: PlatformHeadersExtension[] = [],
        @inject(HeaderMethods) private headerMethods: HeaderMethods,
    ) {
        super();
        this.platformHeaders = PlatformHeadersExtension.flatten(extensions);
    }

    async filter(
        meta: MethodMeta,
        nextFilter: Service<MethodMeta, ResponseWrapper<unknown>>,
    ): Promise<ResponseWrapper<unknown>> {
        const label = `'${meta.routeMeta.controllerClassName ?? 'Unknown'}.${meta.methodName} ${meta.httpMethod} ${meta.path}'`;
        const headers = this.headerMethods.formatHeadersForLogging(meta.requestHeaders, this.platformHeaders);

        console.log(`[API-SVR-req] ${label} request=${JSON.stringify(meta.requestDto)} headers=${JSON.stringify(headers)}`);

        try {
            const response = await nextFilter.invoke(meta);
            this.logResponse(label, response);
            return response;
        } catch (err: unknown) {
            const error = toError(err);
            if (LogApiCall.isUserError(error)) {
                console.log(`[API-SVR-resp-OTHER] ${label} errorType=${error.constructor.name}`);
            } else {
                console.error(`[API-SVR-resp-FAIL] ${label} error=${error.message}`);
            }
            throw error;
        }
    }

    private logResponse(label: string, response: ResponseWrapper<unknown>): void {
        if (response.statusCode >= 400) {
            console.log(`[API-SVR-resp-OTHER] ${label} status=${response.statusCode} response=${JSON.stringify(response.response)}`);
        } else {
            console.log(`[API-SVR-resp-SUCCESS] ${label} status=${response.statusCode} response=${JSON.stringify(response.response)}`);
        }
    }
}
