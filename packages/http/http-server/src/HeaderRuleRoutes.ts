import { HeaderRule } from '@tollgate/http-api';
import { RouteBuilder, RouteFilterDefinition, Routes } from '@tollgate/http-routing';
import { RequireHeaderFilter } from './filters/RequireHeaderFilter';

/**
 * Below ContextFilter (2000) and LogApiFilter (1800), so rejected requests still
 * get a request id and a log line.
 */
export const HEADER_RULE_PRIORITY = 1000;

class HeaderRuleEntry {
    constructor(
        readonly httpMethod: string,
        readonly path: string,
        readonly rule: HeaderRule,
        readonly priority: number,
    ) {}
}

/**
 * HeaderRuleRoutes - the table of which route requires which header.
 *
 * ```typescript
 * new HeaderRuleRoutes()
 *     .require('GET', '/internal/a', new HeaderRule('custom-header', 'a'))
 *     .require('GET', '/internal/b', new HeaderRule('custom-header', 'b'));
 * ```
 *
 * Every entry must name a registered route; the server refuses to start otherwise.
 */
export class HeaderRuleRoutes implements Routes {
    private entries: HeaderRuleEntry[] = [];

    require(httpMethod: string, path: string, rule: HeaderRule, priority: number = HEADER_RULE_PRIORITY): HeaderRuleRoutes {
        this.entries.push(new HeaderRuleEntry(httpMethod.toUpperCase(), path, rule, priority));
        return this;
    }

    configure(routeBuilder: RouteBuilder): void {
        for (const entry of this.entries) {
            routeBuilder.addRouteFilter(
                new RouteFilterDefinition(entry.priority, entry.httpMethod, entry.path, new RequireHeaderFilter(entry.rule)),
            );
        }
    }
}
