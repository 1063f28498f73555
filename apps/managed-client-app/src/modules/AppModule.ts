import { ContainerModule } from 'inversify';
import { PlatformHeader, PlatformHeadersExtension, HEADER_TYPES } from '@tollgate/http-api';

/**
 * Headers this application adds to the platform set.
 */
export class AppHeaders {
    /**
     * Caller's API key. Transferred to downstream calls, masked in logs.
     */
    static readonly API_KEY = new PlatformHeader('x-api-key', true, true);

    static getAllHeaders(): PlatformHeader[] {
        return [AppHeaders.API_KEY];
    }
}

/**
 * AppModule - application bindings, loaded after the framework's CoreModule.
 * Controllers and filters are registered by @provideSingleton() and need no
 * binding here.
 */
export const AppModule = new ContainerModule((options) => {
    const { bind } = options;

    const appExtension = new PlatformHeadersExtension(AppHeaders.getAllHeaders());
    bind<PlatformHeadersExtension>(HEADER_TYPES.PlatformHeadersExtension).toConstantValue(appExtension);

    console.log(`[AppModule] Registered application platform headers extension with ${appExtension.headers.length} headers`);
});
