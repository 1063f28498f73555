import { PlatformHeader } from '@tollgate/http-api';

/**
 * Headers every server carries, contributed by CoreModule.
 */
export class CoreHeaders {
    /**
     * Correlates log lines across services. Generated by ContextFilter when the
     * caller sends none, then propagated by managed clients.
     */
    static readonly REQUEST_ID = new PlatformHeader('x-request-id');

    static getAllHeaders(): PlatformHeader[] {
        return [CoreHeaders.REQUEST_ID];
    }
}
