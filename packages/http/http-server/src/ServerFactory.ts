import { Container, ContainerModule } from 'inversify';
import { buildProviderModule } from '@inversifyjs/binding-decorators';
import { ServerConfig, SERVER_CONFIG_TOKEN, WebAppMeta, WEBAPP_META_TOKEN } from '@tollgate/http-routing';
import { Server } from './Server';
import { ServerImpl } from './ServerImpl';

/**
 * ServerFactory - builds the framework container and an initialized Server.
 *
 * ```typescript
 * // production
 * const server = await ServerFactory.create(new ProdServerMeta(), ServerConfig.fromEnv(process.env));
 * await server.start();
 *
 * // tests: no Express, managed clients dispatch in-process
 * const server = await ServerFactory.create(new ProdServerMeta(), new ServerConfig(), overrides, true);
 * ```
 */
export class ServerFactory {
    static async create(
        meta: WebAppMeta,
        config: ServerConfig = new ServerConfig(),
        overrides?: ContainerModule,
        testMode: boolean = false,
    ): Promise<Server> {
        const frameworkContainer = new Container();

        frameworkContainer.bind<WebAppMeta>(WEBAPP_META_TOKEN).toConstantValue(meta);
        frameworkContainer.bind<ServerConfig>(SERVER_CONFIG_TOKEN).toConstantValue(config);

        await frameworkContainer.load(buildProviderModule());

        const server = frameworkContainer.get(ServerImpl);
        await server.initialize(frameworkContainer, overrides, testMode);

        return server;
    }
}
