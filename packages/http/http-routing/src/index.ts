// Server-side routing decorators and utilities
export { Controller, isController, SourceFile, provideSingleton, ROUTING_METADATA_KEYS } from './decorators';

export { RESTApiRoutes } from './RESTApiRoutes';
export type { ClassType } from './RESTApiRoutes';

export {
    RouteDefinition,
    FilterDefinition,
    RouteFilterDefinition,
    WEBAPP_META_TOKEN,
} from './WebAppMeta';
export type { WebAppMeta, Routes, RouteBuilder, ControllerClass } from './WebAppMeta';

export { ServerConfig, SERVER_CONFIG_TOKEN } from './ServerConfig';

// Method metadata and route handler
export { MethodMeta } from './MethodMeta';
export { RouteHandler, RouteHandlerImpl } from './RouteHandler';

export { RouteBuilderImpl, RouteHandlerWithMeta, RouteService } from './RouteBuilderImpl';
export type { ExpressRouteHandler } from './RouteBuilderImpl';

export { FilterMatcher } from './FilterMatcher';
export type { HttpFilter } from './FilterMatcher';

export { RequestContextReader } from './RequestContextReader';
