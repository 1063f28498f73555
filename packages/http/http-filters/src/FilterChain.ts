import { Filter, Service } from './Filter';

/**
 * FilterChain - runs filters in list order, then the final service.
 *
 * The list is expected to be sorted already (highest priority first, see
 * FilterMatcher). Each filter receives the rest of the chain as a Service.
 */
export class FilterChain<REQ, RESP> {
    private filters: Filter<REQ, RESP>[];

    constructor(filters: Filter<REQ, RESP>[]) {
        this.filters = filters;
    }

    async execute(meta: REQ, finalService: Service<REQ, RESP>): Promise<RESP> {
        return this.toService(finalService).invoke(meta);
    }

    /**
     * The whole chain as one Service, built once and reused per request.
     */
    toService(finalService: Service<REQ, RESP>): Service<REQ, RESP> {
        const filters = this.filters;

        const createServiceForIndex = (currentIndex: number): Service<REQ, RESP> => {
            if (currentIndex >= filters.length) {
                return finalService;
            }
            const filter = filters[currentIndex];
            const nextService = createServiceForIndex(currentIndex + 1);
            return {
                invoke: (m: REQ): Promise<RESP> => filter.filter(m, nextService),
            };
        };

        return createServiceForIndex(0);
    }

    size(): number {
        return this.filters.length;
    }
}
