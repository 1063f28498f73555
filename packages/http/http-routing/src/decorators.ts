import 'reflect-metadata';
import { provide } from '@inversifyjs/binding-decorators';

/**
 * Metadata keys for server-side routing.
 */
export const ROUTING_METADATA_KEYS = {
    CONTROLLER: 'tollgate:controller',
    SOURCE_FILEPATH: 'tollgate:source-filepath',
};

/**
 * Marks a class as a controller.
 *
 * ```typescript
 * @provideSingleton()
 * @Controller()
 * export class InternalController extends InternalApiPrototype implements InternalApi {
 * }
 * ```
 */
export function Controller(): ClassDecorator {
    return (target) => {
        Reflect.defineMetadata(ROUTING_METADATA_KEYS.CONTROLLER, true, target);
    };
}

/**
 * Own metadata only: a subclass of a controller is not a controller until decorated.
 */
export function isController(controllerClass: Function): boolean {
    return Reflect.getOwnMetadata(ROUTING_METADATA_KEYS.CONTROLLER, controllerClass) === true;
}

/**
 * Sets the source filepath that filter globs are matched against. Without it
 * RESTApiRoutes falls back to `**` + `/<ClassName>.ts`.
 *
 * ```typescript
 * @SourceFile('src/controllers/admin/UserController.ts')
 * @Controller()
 * export class UserController implements UserApi
 * ```
 */
export function SourceFile(filepath: string): ClassDecorator {
    return (target) => {
        Reflect.defineMetadata(ROUTING_METADATA_KEYS.SOURCE_FILEPATH, filepath, target);
    };
}

/**
 * Binds the decorated class to itself in singleton scope. Picked up when the
 * container loads buildProviderModule().
 */
export function provideSingleton() {
    return (target: new (...args: any[]) => unknown): void => {
        provide(target, (bind) => {
            bind.inSingletonScope();
        })(target);
    };
}
