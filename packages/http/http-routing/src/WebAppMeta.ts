import { ContainerModule } from 'inversify';
import { RouteMetadata } from '@tollgate/http-api';
import { ManagedClientDefinition } from '@tollgate/http-client';
import type { HttpFilter } from './FilterMatcher';

/**
 * A block of route configuration registered with the server.
 */
export interface Routes {
    configure(routeBuilder: RouteBuilder): void;
}

/**
 * Builder that Routes register into. Implemented by RouteBuilderImpl.
 */
export interface RouteBuilder {
    addRoute(route: RouteDefinition): void;

    /**
     * A filter class resolved from DI and matched to controllers by filepath glob.
     */
    addFilter(filter: FilterDefinition): void;

    /**
     * A filter instance attached to exactly one METHOD:path.
     */
    addRouteFilter(filter: RouteFilterDefinition): void;
}

/**
 * Concrete controller class, as the DI container resolves it.
 */
export type ControllerClass = new (...args: any[]) => object;

/**
 * Definition of a single route.
 */
export class RouteDefinition {
    constructor(
        public routeMeta: RouteMetadata,
        public controllerClass: ControllerClass,
        public controllerFilepath?: string,
    ) {}
}

/**
 * Definition of a filter class with priority (higher runs first).
 *
 * filepathPattern scopes the filter to controllers:
 *   - '*' - every controller
 *   - 'src/controllers/admin/**' + '/*.ts' - all admin controllers
 *   - '**' + '/InternalController.ts' - one controller file
 */
export class FilterDefinition {
    priority: number;
    filterClass: new (...args: any[]) => HttpFilter;
    filepathPattern: string;

    /**
     * Resolved instance, set by RouteBuilderImpl.addFilter().
     */
    filter?: HttpFilter;

    constructor(priority: number, filterClass: new (...args: any[]) => HttpFilter, filepathPattern: string) {
        this.priority = priority;
        this.filterClass = filterClass;
        this.filepathPattern = filepathPattern;
    }
}

/**
 * Definition of a filter instance bound to one route (see HeaderRuleRoutes).
 */
export class RouteFilterDefinition {
    constructor(
        public priority: number,
        public httpMethod: string,
        public path: string,
        public filter: HttpFilter,
    ) {}

    get routeKey(): string {
        return `${this.httpMethod.toUpperCase()}:${this.path}`;
    }
}

/**
 * Entry point the server calls to configure an application.
 */
export interface WebAppMeta {
    getDIModules(): ContainerModule[];

    getRoutes(): Routes[];

    /**
     * Named outbound clients, registered with the ManagedClientRegistry before routes
     * are configured so controllers can look them up.
     */
    getManagedClients(): ManagedClientDefinition[];
}

/**
 * DI token for WebAppMeta injection.
 */
export const WEBAPP_META_TOKEN = Symbol.for('WebAppMeta');
