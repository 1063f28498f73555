import { HeaderMethods, InvalidArgumentError, LogApiCall } from '@tollgate/http-api';
import { ClientConfig, ManagedClientDefinition } from './ClientConfig';
import { ClientRequestFilter } from './ClientRequestFilter';
import { ContextMgr } from './ContextMgr';
import { FetchConnector, HttpConnector } from './HttpConnector';
import { ManagedClient, ClientTarget, joinPath } from './ManagedClient';

const ABSOLUTE_URI = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * ManagedClientRegistry - named outbound clients, each with its own base URI
 * and filter list.
 *
 * ```typescript
 * registry.register('clientA', new ClientConfig('internal').register(new InjectHeaderFilter(requireA)));
 * const body = await registry.target('clientA', 'a').request(MediaType.TEXT_PLAIN).getText();
 * ```
 *
 * Base URIs resolve at call time, so a default base URL set after the server
 * binds its port applies to every client.
 */
export class ManagedClientRegistry {
    private configs: Map<string, ClientConfig> = new Map();
    private logApiCall = new LogApiCall();
    private headerMethods = new HeaderMethods();

    constructor(
        private defaultBaseUrl: string,
        private defaultConnector: HttpConnector = new FetchConnector(),
        private properties: Map<string, string> = new Map(),
        private contextMgr?: ContextMgr,
    ) {}

    /**
     * Stores a copy of the config; later changes to the caller's config do not apply.
     *
     * @throws InvalidArgumentError on an empty or duplicate name
     */
    register(name: string, config: ClientConfig): void {
        if (!name) {
            throw new InvalidArgumentError('Managed client name must not be empty.');
        }
        if (this.configs.has(name)) {
            throw new InvalidArgumentError(`Managed client '${name}' is already registered`);
        }
        this.configs.set(name, config.copy());
        console.log(
            `[ManagedClientRegistry] Registered client ${name} baseUrl=${config.baseUrl ?? '<server>'} filters=${config.filters.length}`,
        );
    }

    registerDefinition(definition: ManagedClientDefinition): void {
        this.register(definition.name, definition.config);
    }

    /**
     * Appends a filter to one client only.
     */
    registerOutboundFilter(name: string, filter: ClientRequestFilter): void {
        this.requireConfig(name).register(filter);
    }

    has(name: string): boolean {
        return this.configs.has(name);
    }

    names(): string[] {
        return [...this.configs.keys()];
    }

    client(name: string): ManagedClient {
        const config = this.requireConfig(name);
        return new ManagedClient(
            name,
            this.resolveBaseUri(name),
            [...config.filters],
            config.connector ?? this.defaultConnector,
            this.logApiCall,
            this.headerMethods,
            config.contextMgr ?? this.contextMgr,
        );
    }

    target(name: string, relativePath?: string): ClientTarget {
        return this.client(name).target(relativePath);
    }

    /**
     * An unfiltered client aimed at the default base URL.
     */
    self(): ManagedClient {
        return new ManagedClient(
            'self',
            this.defaultBaseUrl,
            [],
            this.defaultConnector,
            this.logApiCall,
            this.headerMethods,
            this.contextMgr,
        );
    }

    /**
     * Property `<name>.baseUri`, then the config's baseUrl, then the default
     * base URL. Relative values are joined onto the default base URL.
     */
    resolveBaseUri(name: string): string {
        const config = this.requireConfig(name);
        const configured = this.properties.get(`${name}.baseUri`) ?? config.baseUrl;

        if (!configured) {
            return this.defaultBaseUrl;
        }
        if (ABSOLUTE_URI.test(configured)) {
            return configured;
        }
        return joinPath(this.defaultBaseUrl, configured);
    }

    setDefaultBaseUrl(url: string): void {
        this.defaultBaseUrl = url;
    }

    getDefaultBaseUrl(): string {
        return this.defaultBaseUrl;
    }

    setContextMgr(contextMgr: ContextMgr): void {
        this.contextMgr = contextMgr;
    }

    private requireConfig(name: string): ClientConfig {
        const config = this.configs.get(name);
        if (!config) {
            throw new InvalidArgumentError(`No managed client registered under name '${name}'`);
        }
        return config;
    }
}
