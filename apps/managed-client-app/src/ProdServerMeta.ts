import { ContainerModule } from 'inversify';
import { RESTApiRoutes, Routes, WebAppMeta } from '@tollgate/http-routing';
import { ManagedClientDefinition } from '@tollgate/http-client';
import { AppModule } from './modules/AppModule';
import { FilterRoutes } from './routes/FilterRoutes';
import { AppHeaderRules } from './routes/AppHeaderRules';
import { AppClients } from './clients/AppClients';
import { InternalApiPrototype } from './api/InternalApi';
import { InternalController } from './controllers/InternalController';
import { PublicApiPrototype } from './api/PublicApi';
import { PublicController } from './controllers/PublicController';

/**
 * ProdServerMeta - what the server runs: modules, routes and managed clients.
 *
 * ```typescript
 * const server = await ServerFactory.create(new ProdServerMeta(), ServerConfig.fromEnv(process.env));
 * await server.start();
 * ```
 */
export class ProdServerMeta implements WebAppMeta {
    /**
     * The framework's CoreModule (x-request-id) is loaded before these.
     */
    getDIModules(): ContainerModule[] {
        return [AppModule];
    }

    getRoutes(): Routes[] {
        return [
            new FilterRoutes(),
            new RESTApiRoutes(InternalApiPrototype, InternalController),
            new RESTApiRoutes(PublicApiPrototype, PublicController),
            AppHeaderRules.routes(),
        ];
    }

    getManagedClients(): ManagedClientDefinition[] {
        return AppClients.definitions();
    }
}
