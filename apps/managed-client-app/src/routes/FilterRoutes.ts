import { Routes, RouteBuilder, FilterDefinition } from '@tollgate/http-routing';
import { ContextFilter, LogApiFilter } from '@tollgate/http-server';

/**
 * FilterRoutes - filters applied to every controller.
 *
 * Executed in priority order (higher numbers first):
 * - 2000: ContextFilter (platform headers into RequestContext, request id)
 * - 1800: LogApiFilter (API logging with secured headers masked)
 * - 1000: header rules from AppHeaderRules, on their routes only
 */
export class FilterRoutes implements Routes {
    configure(routeBuilder: RouteBuilder): void {
        routeBuilder.addFilter(new FilterDefinition(2000, ContextFilter, '*'));
        routeBuilder.addFilter(new FilterDefinition(1800, LogApiFilter, '*'));
    }
}
