import { ContainerModule } from 'inversify';
import { HEADER_TYPES, PlatformHeadersExtension, HeaderMethods } from '@tollgate/http-api';
import { CoreHeaders } from '../headers/CoreHeaders';

/**
 * CoreModule - framework-level bindings, loaded into the application container
 * before the application's own modules.
 *
 * Platform headers are collected from every PlatformHeadersExtension binding,
 * so each module contributes its own:
 * 1. CoreModule (x-request-id) ← here
 * 2. application modules (e.g. x-api-key)
 */
export const CoreModule = new ContainerModule((options) => {
    const { bind } = options;

    bind<HeaderMethods>(HeaderMethods).toSelf().inSingletonScope();

    const coreExtension = new PlatformHeadersExtension(CoreHeaders.getAllHeaders());
    bind<PlatformHeadersExtension>(HEADER_TYPES.PlatformHeadersExtension).toConstantValue(coreExtension);
});
