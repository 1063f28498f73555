import { MethodMeta } from './MethodMeta';

/**
 * Invokes one controller method. A class instead of a function type so it shows
 * up by name in stack traces.
 */
export abstract class RouteHandler<TResult = unknown> {
    abstract execute(meta: MethodMeta): Promise<TResult>;
}

/**
 * RouteHandlerImpl - calls a controller resolved once from DI, passing the request DTO.
 */
export class RouteHandlerImpl extends RouteHandler<unknown> {
    constructor(
        private controller: object,
        private method: Function,
    ) {
        super();
    }

    async execute(meta: MethodMeta): Promise<unknown> {
        const result: unknown = await this.method.call(this.controller, meta.requestDto);
        return result;
    }
}
