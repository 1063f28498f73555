/**
 * Header - the minimal view of a header definition that core packages need.
 *
 * Lives in core-util so that core-context can key request-scoped header values
 * without depending on http-api, where PlatformHeader implements it.
 */
export interface Header {
    /**
     * HTTP header name, e.g. 'x-request-id'. Also the RequestContext key.
     */
    getHeaderName(): string;
}
