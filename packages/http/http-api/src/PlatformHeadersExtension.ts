import { PlatformHeader } from './PlatformHeader';

/**
 * PlatformHeadersExtension - a module's contribution of platform headers.
 *
 * Any number of modules bind one of these to HEADER_TYPES.PlatformHeadersExtension;
 * the framework collects them all with @multiInject:
 * ```typescript
 * export const AppModule = new ContainerModule((options) => {
 *     const { bind } = options;
 *     bind<PlatformHeadersExtension>(HEADER_TYPES.PlatformHeadersExtension)
 *         .toConstantValue(new PlatformHeadersExtension(AppHeaders.getAllHeaders()));
 * });
 * ```
 */
export class PlatformHeadersExtension {
    readonly headers: PlatformHeader[];

    constructor(headers: PlatformHeader[]) {
        this.headers = headers;
    }

    getHeaders(): PlatformHeader[] {
        return this.headers;
    }

    /**
     * Flattens several extensions into one header list, in binding order.
     */
    static flatten(extensions: PlatformHeadersExtension[]): PlatformHeader[] {
        const all: PlatformHeader[] = [];
        for (const extension of extensions) {
            all.push(...extension.getHeaders());
        }
        return all;
    }
}
