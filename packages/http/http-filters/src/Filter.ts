/**
 * Service - anything that turns a request into a response: a controller
 * invocation, or a filter wrapped around the rest of the chain.
 */
export interface Service<REQ, RESP> {
    invoke(meta: REQ): Promise<RESP>;
}

/**
 * Filter - wraps the execution of the filters after it and the controller.
 *
 * Filters are STATELESS and shared by every concurrent request. A filter may
 * answer on its own by returning without calling nextFilter.invoke() (see
 * RequireHeaderFilter).
 *
 * ```typescript
 * @injectable()
 * export class TimingFilter extends Filter<MethodMeta, ResponseWrapper<unknown>> {
 *     async filter(
 *         meta: MethodMeta,
 *         nextFilter: Service<MethodMeta, ResponseWrapper<unknown>>,
 *     ): Promise<ResponseWrapper<unknown>> {
 *         const start = Date.now();
 *         const response = await nextFilter.invoke(meta);
 *         console.log(`[TimingFilter] ${meta.path} took ${Date.now() - start}ms`);
 *         return response;
 *     }
 * }
 * ```
 */
export abstract class Filter<REQ, RESP> {
    // priority lives on the filter definition, not here

    abstract filter(meta: REQ, nextFilter: Service<REQ, RESP>): Promise<RESP>;

    /**
     * Composes this filter with the one after it.
     */
    chain(nextFilter: Filter<REQ, RESP>): Filter<REQ, RESP> {
        const outer = this;

        return new (class extends Filter<REQ, RESP> {
            async filter(meta: REQ, nextService: Service<REQ, RESP>): Promise<RESP> {
                return outer.filter(meta, {
                    invoke: (m: REQ) => nextFilter.filter(m, nextService),
                });
            }
        })();
    }

    /**
     * Terminates the chain with the final service (the controller).
     */
    chainService(svc: Service<REQ, RESP>): Service<REQ, RESP> {
        return {
            invoke: (meta: REQ) => this.filter(meta, svc),
        };
    }
}
