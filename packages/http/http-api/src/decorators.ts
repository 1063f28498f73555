import 'reflect-metadata';

/**
 * Metadata keys shared by server-side routing and client-side tooling.
 */
export const METADATA_KEYS = {
    API_INTERFACE: 'tollgate:api-interface',
    ROUTES: 'tollgate:routes',
};

/**
 * Route metadata collected from the decorators of one API method.
 */
export class RouteMetadata {
    httpMethod: string;
    path: string;
    methodName: string;
    parameterTypes?: unknown[];

    /**
     * Media type the route answers with. Routes without one answer JSON.
     */
    produces?: string;

    /**
     * Filled in by RESTApiRoutes so logs can say which controller ran.
     */
    controllerClassName?: string;

    constructor(httpMethod: string, path: string, methodName: string, parameterTypes?: unknown[]) {
        this.httpMethod = httpMethod;
        this.path = path;
        this.methodName = methodName;
        this.parameterTypes = parameterTypes;
    }

    copy(): RouteMetadata {
        const copy = new RouteMetadata(this.httpMethod, this.path, this.methodName, this.parameterTypes);
        copy.produces = this.produces;
        copy.controllerClassName = this.controllerClassName;
        return copy;
    }
}

/**
 * Marks an abstract class as an API contract.
 *
 * ```typescript
 * @ApiInterface()
 * export abstract class InternalApiPrototype implements InternalApi {
 *     @Get()
 *     @Path('/internal/a')
 *     @Produces(MediaType.TEXT_PLAIN)
 *     getA(): Promise<string> {
 *         throw new Error('Method getA() must be implemented by subclass');
 *     }
 * }
 * ```
 */
export function ApiInterface(): ClassDecorator {
    return (target) => {
        Reflect.defineMetadata(METADATA_KEYS.API_INTERFACE, true, target);

        if (!Reflect.hasMetadata(METADATA_KEYS.ROUTES, target)) {
            Reflect.defineMetadata(METADATA_KEYS.ROUTES, [], target);
        }
    };
}

/**
 * Finds (or creates) the RouteMetadata for a method and stores the list back.
 * For static methods target is the constructor, for instance methods the prototype.
 */
function updateRouteMetadata(
    target: Object,
    propertyKey: string | symbol,
    update: (routeMetadata: RouteMetadata) => void,
): void {
    const metadataTarget = typeof target === 'function' ? target : target.constructor;
    const existing: RouteMetadata[] = Reflect.getMetadata(METADATA_KEYS.ROUTES, metadataTarget) ?? [];
    const methodName = String(propertyKey);

    let routeMetadata = existing.find((r) => r.methodName === methodName);
    if (!routeMetadata) {
        routeMetadata = new RouteMetadata('', '', methodName);
        existing.push(routeMetadata);
    }

    update(routeMetadata);

    Reflect.defineMetadata(METADATA_KEYS.ROUTES, existing, metadataTarget);
}

function httpMethod(method: string): MethodDecorator {
    return (target, propertyKey) => {
        updateRouteMetadata(target, propertyKey, (routeMetadata) => {
            routeMetadata.httpMethod = method;

            const paramTypes: unknown[] | undefined = Reflect.getMetadata('design:paramtypes', target, propertyKey);
            if (paramTypes) {
                routeMetadata.parameterTypes = paramTypes;
            }
        });
    };
}

export function Get(): MethodDecorator {
    return httpMethod('GET');
}

export function Post(): MethodDecorator {
    return httpMethod('POST');
}

export function Put(): MethodDecorator {
    return httpMethod('PUT');
}

export function Delete(): MethodDecorator {
    return httpMethod('DELETE');
}

export function Patch(): MethodDecorator {
    return httpMethod('PATCH');
}

/**
 * Route path, e.g. `@Path('/internal/a')`.
 */
export function Path(path: string): MethodDecorator {
    return (target, propertyKey) => {
        updateRouteMetadata(target, propertyKey, (routeMetadata) => {
            routeMetadata.path = path;
        });
    };
}

/**
 * Media type of the response, e.g. `@Produces(MediaType.TEXT_PLAIN)`.
 * text/* routes are written as strings, everything else as JSON.
 */
export function Produces(mediaType: string): MethodDecorator {
    return (target, propertyKey) => {
        updateRouteMetadata(target, propertyKey, (routeMetadata) => {
            routeMetadata.produces = mediaType;
        });
    };
}

/**
 * All routes declared on an API class. Used by RESTApiRoutes.
 */
export function getRoutes(apiClass: Function): RouteMetadata[] {
    const routes: RouteMetadata[] | undefined = Reflect.getMetadata(METADATA_KEYS.ROUTES, apiClass);
    return routes ?? [];
}

export function isApiInterface(apiClass: Function): boolean {
    return Reflect.getMetadata(METADATA_KEYS.API_INTERFACE, apiClass) === true;
}
