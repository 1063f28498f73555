import { RouteMetadata, InboundHeaders } from '@tollgate/http-api';

/**
 * Metadata about the method being invoked, passed down the filter chain.
 *
 * MethodMeta is DTO-only: it never holds the Express req/res, so the same
 * chain serves Express requests and in-process dispatch alike.
 */
export class MethodMeta implements InboundHeaders {
    routeMeta: RouteMetadata;

    /**
     * Request headers, lowercase name -> values. HTTP allows a header to repeat,
     * so every entry is an array even though most hold one value.
     *
     * ContextFilter copies the platform headers into RequestContext; route
     * filters such as RequireHeaderFilter read any header from here.
     */
    requestHeaders: Map<string, string[]>;

    requestDto?: unknown;

    constructor(routeMeta: RouteMetadata, requestHeaders?: Map<string, string[]>, requestDto?: unknown) {
        this.routeMeta = routeMeta;
        this.requestHeaders = requestHeaders ?? new Map();
        this.requestDto = requestDto;
    }

    get httpMethod(): string {
        return this.routeMeta.httpMethod;
    }

    get path(): string {
        return this.routeMeta.path;
    }

    get methodName(): string {
        return this.routeMeta.methodName;
    }

    /**
     * Case-insensitive lookup. A repeated header comes back joined with ', ',
     * the way Node's HTTP parser joins it.
     */
    getHeaderString(name: string): string | undefined {
        const values = this.requestHeaders.get(name.toLowerCase());
        if (!values || values.length === 0) {
            return undefined;
        }
        return values.join(', ');
    }

    /**
     * Builds the header map from Node-style headers (Express req.headers or a
     * plain record).
     */
    static headersFrom(headers: Record<string, string | string[] | undefined>): Map<string, string[]> {
        const result = new Map<string, string[]>();
        for (const [name, value] of Object.entries(headers)) {
            if (value === undefined) {
                continue;
            }
            const key = name.toLowerCase();
            const values = Array.isArray(value) ? value : [value];
            result.set(key, [...(result.get(key) ?? []), ...values]);
        }
        return result;
    }
}
