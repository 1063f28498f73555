import { minimatch } from 'minimatch';
import { Filter, ResponseWrapper } from '@tollgate/http-filters';
import { MethodMeta } from './MethodMeta';
import { FilterDefinition, RouteFilterDefinition } from './WebAppMeta';

/**
 * Type alias for HTTP filters that work with MethodMeta and ResponseWrapper.
 */
export type HttpFilter = Filter<MethodMeta, ResponseWrapper<unknown>>;

/**
 * FilterMatcher - picks the filters that apply to one route.
 *
 * 1. Class filters whose filepath glob matches the controller source file
 * 2. Route filters registered for the route's METHOD:path
 *
 * The result is sorted by priority, highest first. Equal priorities keep
 * registration order, class filters before route filters.
 */
export class FilterMatcher {
    static findMatchingFilters(
        controllerFilepath: string | undefined,
        allFilters: Array<FilterDefinition>,
        routeKey?: string,
        routeFilters: Array<RouteFilterDefinition> = [],
    ): HttpFilter[] {
        const matchingFilters: Array<{ filter: HttpFilter; priority: number }> = [];

        for (const definition of allFilters) {
            const filter = definition.filter;
            if (!filter) {
                continue;
            }
            if (FilterMatcher.matchesFilepath(controllerFilepath, definition.filepathPattern)) {
                matchingFilters.push({ filter, priority: definition.priority });
            }
        }

        if (routeKey) {
            for (const definition of routeFilters) {
                if (definition.routeKey === routeKey) {
                    matchingFilters.push({ filter: definition.filter, priority: definition.priority });
                }
            }
        }

        matchingFilters.sort((a, b) => b.priority - a.priority);

        return matchingFilters.map((item) => item.filter);
    }

    private static matchesFilepath(controllerFilepath: string | undefined, pattern: string): boolean {
        // '*' matches all controllers (global filter)
        if (pattern === '*') {
            return true;
        }

        // without a filepath only the explicit catch-all matches
        if (!controllerFilepath) {
            return pattern === '**/*';
        }

        return minimatch(FilterMatcher.normalizeFilepath(controllerFilepath), pattern);
    }

    /**
     * Forward slashes only, no leading './'.
     */
    static normalizeFilepath(filepath: string): string {
        return filepath.replace(/\\/g, '/').replace(/^\.\//, '');
    }
}
