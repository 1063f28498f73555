import { ApiInterface, Get, MediaType, Path, Produces } from '@tollgate/http-api';
import { ResponseWrapper } from '@tollgate/http-filters';

/**
 * PublicApi - open routes that reach the internal ones through managed clients.
 */
export interface PublicApi {
    /**
     * Body of /internal/a fetched with clientA. A failed call surfaces as the
     * translated HttpError.
     */
    getTargetA(): Promise<string>;

    /**
     * Status and body of /internal/b fetched with clientB, passed through as-is.
     */
    getTargetB(): Promise<ResponseWrapper<string>>;
}

@ApiInterface()
export abstract class PublicApiPrototype implements PublicApi {
    @Get()
    @Path('/public/a')
    @Produces(MediaType.TEXT_PLAIN)
    getTargetA(): Promise<string> {
        throw new Error('Method getTargetA() must be implemented by subclass');
    }

    @Get()
    @Path('/public/b')
    @Produces(MediaType.TEXT_PLAIN)
    getTargetB(): Promise<ResponseWrapper<string>> {
        throw new Error('Method getTargetB() must be implemented by subclass');
    }
}
