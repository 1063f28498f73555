import { inject, injectable, multiInject, optional } from 'inversify';
import { provideSingleton, MethodMeta } from '@tollgate/http-routing';
import { RequestContext } from '@tollgate/core-context';
import { Filter, ResponseWrapper, Service } from '@tollgate/http-filters';
import { PlatformHeader, PlatformHeadersExtension, HeaderMethods, HEADER_TYPES } from '@tollgate/http-api';
import { CoreHeaders } from '../headers/CoreHeaders';

/**
 * ContextFilter - moves transferable platform headers into RequestContext.
 * Priority: 2000 (runs first).
 *
 * RequestContext lifecycle:
 * 1. ExpressWrapper (or InProcessConnector) opens RequestContext.run()
 * 2. ContextFilter copies the transferable platform headers into it
 * 3. Downstream filters, the controller and its managed clients read it
 * 4. The context ends with the run() callback
 */
@provideSingleton()
@injectable()
export class ContextFilter extends Filter<MethodMeta, ResponseWrapper<unknown>> {
    private transferHeaders: PlatformHeader[];

    constructor(
        @multiInject(HEADER_TYPES.PlatformHeadersExtension)
        @optional()
        extensions: PlatformHeadersExtension[] = [],
        @inject(HeaderMethods) headerMethods: HeaderMethods,
    ) {
        super();

        const allHeaders = PlatformHeadersExtension.flatten(extensions);
        this.transferHeaders = headerMethods.findTransferHeaders(allHeaders);

        console.log(
            `[ContextFilter] Collected ${allHeaders.length} platform headers from ${extensions.length} extensions`,
        );
    }

    async filter(
        meta: MethodMeta,
        nextFilter: Service<MethodMeta, ResponseWrapper<unknown>>,
    ): Promise<ResponseWrapper<unknown>> {
        for (const header of this.transferHeaders) {
            const value = meta.getHeaderString(header.headerName);
            if (value) {
                RequestContext.putHeader(header, value);
            }
        }

        if (!RequestContext.hasHeader(CoreHeaders.REQUEST_ID)) {
            RequestContext.putHeader(CoreHeaders.REQUEST_ID, ContextFilter.generateRequestId());
        }

        return nextFilter.invoke(meta);
    }

    /**
     * Format: svrGenReqId-{timestamp}-{random}
     */
    static generateRequestId(): string {
        return `svrGenReqId-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
    }
}
