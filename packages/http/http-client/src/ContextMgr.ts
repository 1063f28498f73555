import { PlatformHeader, ContextReader } from '@tollgate/http-api';

/**
 * ContextMgr - which platform headers a client propagates, and where it reads them.
 *
 * ```typescript
 * // server side, reading the active RequestContext
 * new ContextMgr(new RequestContextReader(), platformHeaders);
 *
 * // scripts and tests, reading a fixed map
 * new ContextMgr(new StaticContextReader(new Map([['x-request-id', 'req-1']])), [CoreHeaders.REQUEST_ID]);
 * ```
 */
export class ContextMgr {
    constructor(
        public readonly contextReader: ContextReader,
        public readonly headerSet: PlatformHeader[],
    ) {}

    /**
     * Value of a transferable header in the set, or undefined when the header is
     * unknown, not transferable or empty.
     */
    read(headerName: string): string | undefined {
        const name = headerName.toLowerCase();
        const header = this.headerSet.find((h) => h.headerName === name);

        if (!header || !header.isWantTransferred) {
            return undefined;
        }

        const value = this.contextReader.read(header);
        return value ? value : undefined;
    }
}
