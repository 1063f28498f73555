import { getRoutes, isApiInterface, RouteMetadata } from '@tollgate/http-api';
import { Routes, RouteBuilder, RouteDefinition } from './WebAppMeta';
import { ROUTING_METADATA_KEYS, isController } from './decorators';

/**
 * A class constructor, abstract or concrete.
 */
export type ClassType<T> = Function & { prototype: T };

/**
 * RESTApiRoutes - wires an @ApiInterface prototype to its controller.
 *
 * ```typescript
 * getRoutes(): Routes[] {
 *     return [new RESTApiRoutes(InternalApiPrototype, InternalController)];
 * }
 * ```
 *
 * Every decorated method of the API must exist on the controller, and must carry
 * both an HTTP method decorator and @Path.
 */
export class RESTApiRoutes<TApi extends object, TController extends TApi> implements Routes {
    private apiMetaClass: ClassType<TApi>;
    private controllerClass: new (...args: any[]) => TController;

    constructor(apiMetaClass: ClassType<TApi>, controllerClass: new (...args: any[]) => TController) {
        this.apiMetaClass = apiMetaClass;
        this.controllerClass = controllerClass;

        if (!isApiInterface(apiMetaClass)) {
            throw new Error(`Class ${apiMetaClass.name || 'Unknown'} must be decorated with @ApiInterface()`);
        }

        if (!isController(controllerClass)) {
            throw new Error(`Class ${controllerClass.name || 'Unknown'} must be decorated with @Controller()`);
        }

        this.validateControllerImplementsApi();
    }

    private validateControllerImplementsApi(): void {
        const controllerPrototype: object = this.controllerClass.prototype;

        for (const route of getRoutes(this.apiMetaClass)) {
            if (typeof Reflect.get(controllerPrototype, route.methodName) !== 'function') {
                throw new Error(
                    `Controller ${this.controllerClass.name || 'Unknown'} must implement method ${route.methodName} from API ${this.apiMetaClass.name || 'Unknown'}`,
                );
            }
        }
    }

    configure(routeBuilder: RouteBuilder): void {
        for (const route of getRoutes(this.apiMetaClass)) {
            this.registerRoute(routeBuilder, route);
        }
    }

    private registerRoute(routeBuilder: RouteBuilder, route: RouteMetadata): void {
        if (!route.httpMethod || !route.path) {
            throw new Error(
                `Method ${route.methodName} in ${this.apiMetaClass.name || 'Unknown'} must have both @HttpMethod and @Path decorators`,
            );
        }

        // routes are shared metadata on the API class; each controller gets its own copy
        const routeMeta = route.copy();
        routeMeta.controllerClassName = this.controllerClass.name;

        routeBuilder.addRoute(new RouteDefinition(routeMeta, this.controllerClass, this.getControllerFilepath()));
    }

    /**
     * TypeScript keeps no source paths at runtime, so without @SourceFile the
     * class name stands in for the file name.
     */
    private getControllerFilepath(): string | undefined {
        const filepath: unknown = Reflect.getMetadata(ROUTING_METADATA_KEYS.SOURCE_FILEPATH, this.controllerClass);
        if (typeof filepath === 'string') {
            return filepath;
        }

        const className = this.controllerClass.name;
        return className ? `**/${className}.ts` : undefined;
    }
}
