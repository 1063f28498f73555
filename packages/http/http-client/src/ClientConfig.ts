import { ContextMgr } from './ContextMgr';
import { ClientRequestFilter } from './ClientRequestFilter';
import { HttpConnector } from './HttpConnector';

/**
 * ClientConfig - how one managed client reaches its target.
 *
 * ```typescript
 * new ClientConfig('internal')
 *     .register(new InjectHeaderFilter(new HeaderRule('custom-header', 'a')));
 * ```
 */
export class ClientConfig {
    /**
     * Absolute URL, or a path joined onto the server's base URL. Without one
     * the client targets the server itself.
     */
    baseUrl?: string;

    /**
     * Platform header propagation. Falls back to the registry's ContextMgr.
     */
    contextMgr?: ContextMgr;

    /**
     * Outbound filters, run in registration order on every request.
     */
    filters: ClientRequestFilter[] = [];

    /**
     * Transport for this client only. Falls back to the registry's connector.
     */
    connector?: HttpConnector;

    constructor(baseUrl?: string, contextMgr?: ContextMgr) {
        this.baseUrl = baseUrl;
        this.contextMgr = contextMgr;
    }

    register(filter: ClientRequestFilter): this {
        this.filters.push(filter);
        return this;
    }

    withConnector(connector: HttpConnector): this {
        this.connector = connector;
        return this;
    }

    /**
     * Copy with its own filter list.
     */
    copy(): ClientConfig {
        const copy = new ClientConfig(this.baseUrl, this.contextMgr);
        copy.filters = [...this.filters];
        copy.connector = this.connector;
        return copy;
    }
}

/**
 * ManagedClientDefinition - one registry entry, declared by WebAppMeta.getManagedClients().
 */
export class ManagedClientDefinition {
    constructor(
        readonly name: string,
        readonly config: ClientConfig,
    ) {}
}
