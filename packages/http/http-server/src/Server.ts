import { Container } from 'inversify';
import { ClientTarget, ManagedClientRegistry } from '@tollgate/http-client';

/**
 * Server - the running application, created by ServerFactory.create().
 *
 * ```typescript
 * const server = await ServerFactory.create(new ProdServerMeta(), ServerConfig.fromEnv(process.env));
 * await server.start();
 * ```
 */
export interface Server {
    /**
     * Starts listening. Resolves with the bound port, which differs from the
     * requested one when 0 was asked for. In test mode nothing listens and
     * requests go through the InProcessConnector.
     */
    start(port?: number): Promise<number>;

    stop(): Promise<void>;

    /**
     * The application container (child of the framework container).
     */
    getContainer(): Container;

    getManagedClients(): ManagedClientRegistry;

    /**
     * Unfiltered client aimed at this server, e.g. `server.target('/internal/a')`.
     */
    target(path?: string): ClientTarget;
}
