import { Container, injectable } from 'inversify';
import { Request, Response, NextFunction } from 'express';
import { InvalidArgumentError, RouteMetadata } from '@tollgate/http-api';
import { FilterChain, ResponseWrapper, Service } from '@tollgate/http-filters';
import { RouteBuilder, RouteDefinition, FilterDefinition, RouteFilterDefinition } from './WebAppMeta';
import { provideSingleton } from './decorators';
import { RouteHandler, RouteHandlerImpl } from './RouteHandler';
import { MethodMeta } from './MethodMeta';
import { FilterMatcher, HttpFilter } from './FilterMatcher';

/**
 * Express route handler function type.
 */
export type ExpressRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * RouteHandlerWithMeta - a route handler paired with its definition.
 */
export class RouteHandlerWithMeta {
    constructor(
        public invokeControllerHandler: RouteHandler<unknown>,
        public definition: RouteDefinition,
    ) {}

    get routeKey(): string {
        return RouteBuilderImpl.createRouteKey(this.definition.routeMeta.httpMethod, this.definition.routeMeta.path);
    }
}

/**
 * RouteService - a route's metadata with its ready-to-invoke chain.
 */
export class RouteService {
    constructor(
        public routeMeta: RouteMetadata,
        public service: Service<MethodMeta, ResponseWrapper<unknown>>,
    ) {}
}

/**
 * RouteBuilderImpl - the route table and the filter chains built over it.
 *
 * Registered in the framework container via @provideSingleton(), but controllers
 * and filter classes live in the application container, which is handed over
 * through setContainer() once it exists.
 */
@provideSingleton()
@injectable()
export class RouteBuilderImpl implements RouteBuilder {
    private routes: RouteHandlerWithMeta[] = [];
    private routeMap: Map<string, RouteHandlerWithMeta> = new Map();
    private lookupMap: Map<string, RouteHandlerWithMeta> = new Map();
    private filterRegistry: FilterDefinition[] = [];
    private routeFilters: RouteFilterDefinition[] = [];
    private serviceCache: Map<string, Service<MethodMeta, ResponseWrapper<unknown>>> = new Map();
    private container?: Container;

    /**
     * Key format: "${METHOD}:${path}", e.g. "GET:/internal/a".
     */
    static createRouteKey(method: string, path: string): string {
        return `${method.toUpperCase()}:${path}`;
    }

    /**
     * Key for request lookup. Express routes without regard to case or a
     * trailing slash, so "/Internal/A/" finds "GET:/internal/a".
     */
    static createLookupKey(method: string, path: string): string {
        const trimmed = path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
        return RouteBuilderImpl.createRouteKey(method, trimmed.toLowerCase());
    }

    setContainer(container: Container): void {
        this.container = container;
    }

    /**
     * Resolves the controller from DI once; every request reuses the instance.
     */
    addRoute(route: RouteDefinition): void {
        const container = this.requireContainer('routes');
        const routeMeta = route.routeMeta;
        const key = RouteBuilderImpl.createRouteKey(routeMeta.httpMethod, routeMeta.path);

        if (this.routeMap.has(key)) {
            throw new InvalidArgumentError(`Route ${key} is registered twice`);
        }

        const controller = container.get(route.controllerClass);
        const method: unknown = Reflect.get(controller, routeMeta.methodName);
        if (typeof method !== 'function') {
            throw new Error(`Method ${routeMeta.methodName} not found on controller ${route.controllerClass.name || 'Unknown'}`);
        }

        const routeWithMeta = new RouteHandlerWithMeta(new RouteHandlerImpl(controller, method), route);
        this.routes.push(routeWithMeta);
        this.routeMap.set(key, routeWithMeta);
        this.lookupMap.set(RouteBuilderImpl.createLookupKey(routeMeta.httpMethod, routeMeta.path), routeWithMeta);
    }

    /**
     * Resolves the filter class from DI; controllers are matched against its glob later.
     */
    addFilter(filterDef: FilterDefinition): void {
        const container = this.requireContainer('filters');
        filterDef.filter = container.get(filterDef.filterClass);
        this.filterRegistry.push(filterDef);
    }

    addRouteFilter(filterDef: RouteFilterDefinition): void {
        this.routeFilters.push(filterDef);
    }

    /**
     * Fails when a route filter names a METHOD:path no route registered. Called
     * after every Routes block has been configured.
     */
    validateRouteFilters(): void {
        for (const filterDef of this.routeFilters) {
            if (!this.routeMap.has(filterDef.routeKey)) {
                throw new InvalidArgumentError(`Route filter registered for unknown route ${filterDef.routeKey}`);
            }
        }
    }

    getRoutes(): RouteHandlerWithMeta[] {
        return this.routes;
    }

    /**
     * The filter chain plus controller for one route, built once and cached.
     */
    createRouteHandler(routeWithMeta: RouteHandlerWithMeta): Service<MethodMeta, ResponseWrapper<unknown>> {
        const key = routeWithMeta.routeKey;
        const cached = this.serviceCache.get(key);
        if (cached) {
            return cached;
        }

        const route = routeWithMeta.definition;
        const routeMeta = route.routeMeta;

        const matchingFilters: HttpFilter[] = FilterMatcher.findMatchingFilters(
            route.controllerFilepath,
            this.filterRegistry,
            key,
            this.routeFilters,
        );

        console.log(
            `[RouteBuilder] Setting up route: ${routeMeta.httpMethod} ${routeMeta.path} with ${matchingFilters.length} filters`,
        );

        const controllerService: Service<MethodMeta, ResponseWrapper<unknown>> = {
            invoke: async (meta: MethodMeta): Promise<ResponseWrapper<unknown>> => {
                const result = await routeWithMeta.invokeControllerHandler.execute(meta);
                const wrapper = result instanceof ResponseWrapper ? result : new ResponseWrapper<unknown>(result);
                if (!wrapper.contentType && routeMeta.produces) {
                    wrapper.withContentType(routeMeta.produces);
                }
                return wrapper;
            },
        };

        const service = new FilterChain(matchingFilters).toService(controllerService);
        this.serviceCache.set(key, service);
        return service;
    }

    /**
     * Route metadata and service for METHOD:path, or undefined when no route
     * serves it. Used for in-process dispatch; matches as createLookupKey does.
     */
    findRouteService(method: string, path: string): RouteService | undefined {
        const routeWithMeta = this.lookupMap.get(RouteBuilderImpl.createLookupKey(method, path));
        if (!routeWithMeta) {
            return undefined;
        }
        return new RouteService(routeWithMeta.definition.routeMeta, this.createRouteHandler(routeWithMeta));
    }

    private requireContainer(what: string): Container {
        if (!this.container) {
            throw new Error(`Container not set. Call setContainer() before registering ${what}.`);
        }
        return this.container;
    }
}
