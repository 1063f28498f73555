import { MethodMeta } from '@tollgate/http-routing';
import { Filter, ResponseWrapper, Service } from '@tollgate/http-filters';
import { HeaderRule, validateHeader } from '@tollgate/http-api';

/**
 * RequireHeaderFilter - lets a request through only when it carries the rule's
 * header with exactly the rule's value. Otherwise answers 403 text/plain itself
 * and the controller never runs.
 *
 * Created per rule by HeaderRuleRoutes, not resolved from DI.
 */
export class RequireHeaderFilter extends Filter<MethodMeta, ResponseWrapper<unknown>> {
    constructor(readonly rule: HeaderRule) {
        super();
    }

    async filter(
        meta: MethodMeta,
        nextFilter: Service<MethodMeta, ResponseWrapper<unknown>>,
    ): Promise<ResponseWrapper<unknown>> {
        const mismatch = validateHeader(this.rule, meta);
        if (!mismatch) {
            return nextFilter.invoke(meta);
        }

        return new ResponseWrapper<unknown>(mismatch.message, mismatch.statusCode).withContentType(mismatch.contentType);
    }
}
