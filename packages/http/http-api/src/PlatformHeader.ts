import { Header } from '@tollgate/core-util';

/**
 * PlatformHeader - a header the platform knows how to carry between services.
 *
 * The header name doubles as the RequestContext key. Contributed to the server
 * through PlatformHeadersExtension bindings, consumed by ContextFilter (transfer
 * into the context), LogApiFilter and managed clients (masking, propagation).
 */
export class PlatformHeader implements Header {
    /**
     * Header name in canonical lowercase form, e.g. 'x-request-id'.
     */
    readonly headerName: string;

    /**
     * Copy the incoming value into RequestContext and on to downstream calls.
     */
    readonly isWantTransferred: boolean;

    /**
     * Mask the value in logs (tokens, API keys).
     */
    readonly isSecured: boolean;

    constructor(headerName: string, isWantTransferred: boolean = true, isSecured: boolean = false) {
        this.headerName = headerName.toLowerCase();
        this.isWantTransferred = isWantTransferred;
        this.isSecured = isSecured;
    }

    getHeaderName(): string {
        return this.headerName;
    }
}
