import { ApiInterface, Get, MediaType, Path, Produces } from '@tollgate/http-api';

/**
 * InternalApi - routes meant to be called only by this server's own managed
 * clients. Each is guarded by a header rule (see AppHeaderRules).
 */
export interface InternalApi {
    getA(): Promise<string>;
    getB(): Promise<string>;
}

@ApiInterface()
export abstract class InternalApiPrototype implements InternalApi {
    @Get()
    @Path('/internal/a')
    @Produces(MediaType.TEXT_PLAIN)
    getA(): Promise<string> {
        throw new Error('Method getA() must be implemented by subclass');
    }

    @Get()
    @Path('/internal/b')
    @Produces(MediaType.TEXT_PLAIN)
    getB(): Promise<string> {
        throw new Error('Method getB() must be implemented by subclass');
    }
}
