import { PlatformHeader, ContextReader } from '@tollgate/http-api';
import { RequestContext } from '@tollgate/core-context';

/**
 * RequestContextReader - reads platform headers from the active RequestContext.
 *
 * Server-side only: it depends on core-context's AsyncLocalStorage. Managed
 * clients created by the server use it to propagate transferable headers.
 */
export class RequestContextReader implements ContextReader {
    read(header: PlatformHeader): string | undefined {
        return RequestContext.getHeader(header);
    }
}
