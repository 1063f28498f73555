/**
 * ResponseWrapper - what travels back up the filter chain.
 *
 * A controller may return one directly to choose status and content type;
 * plain return values are wrapped with status 200 by the route builder.
 * The encoder writes `text/*` responses as strings and everything else as JSON.
 */
export class ResponseWrapper<TResult = unknown> {
    response?: TResult;
    statusCode: number;
    contentType?: string;
    headers: Map<string, string>;

    constructor(response?: TResult, statusCode: number = 200) {
        this.response = response;
        this.statusCode = statusCode;
        this.headers = new Map();
    }

    setHeader(name: string, value: string): ResponseWrapper<TResult> {
        this.headers.set(name.toLowerCase(), value);
        return this;
    }

    withContentType(contentType: string): ResponseWrapper<TResult> {
        this.contentType = contentType;
        return this;
    }
}
