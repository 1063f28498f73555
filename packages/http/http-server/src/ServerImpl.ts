import express, { Express } from 'express';
import { Container, ContainerModule, inject, injectable } from 'inversify';
import { buildProviderModule } from '@inversifyjs/binding-decorators';
import {
    ExpressRouteHandler,
    provideSingleton,
    RequestContextReader,
    RouteBuilderImpl,
    ServerConfig,
    SERVER_CONFIG_TOKEN,
    WebAppMeta,
    WEBAPP_META_TOKEN,
} from '@tollgate/http-routing';
import { HEADER_TYPES, PlatformHeader, PlatformHeadersExtension } from '@tollgate/http-api';
import {
    ClientTarget,
    ContextMgr,
    FetchConnector,
    HttpConnector,
    ManagedClientRegistry,
} from '@tollgate/http-client';
import { Server } from './Server';
import { ServerMiddleware } from './ServerMiddleware';
import { ResponseEncoder } from './ResponseEncoder';
import { InProcessConnector } from './InProcessConnector';
import { CoreModule } from './modules/CoreModule';

/**
 * ServerImpl - two containers, one route table, optionally one Express app.
 *
 * 1. frameworkContainer: framework singletons, WebAppMeta, ServerConfig and
 *    the ManagedClientRegistry
 * 2. appContainer: child of frameworkContainer, holding CoreModule, the
 *    application's modules and test overrides (loaded last)
 *
 * Resolved from the framework container by ServerFactory, which then calls
 * initialize().
 */
@provideSingleton()
@injectable()
export class ServerImpl implements Server {
    private appContainer?: Container;
    private registry?: ManagedClientRegistry;
    private testMode = false;
    private server?: ReturnType<Express['listen']>;

    constructor(
        @inject(RouteBuilderImpl) private routeBuilder: RouteBuilderImpl,
        @inject(ServerMiddleware) private middleware: ServerMiddleware,
        @inject(ResponseEncoder) private encoder: ResponseEncoder,
        @inject(WEBAPP_META_TOKEN) private meta: WebAppMeta,
        @inject(SERVER_CONFIG_TOKEN) private config: ServerConfig,
    ) {}

    /**
     * Loads modules, registers managed clients, then routes and route filters.
     * Clients come before routes so controllers resolved during addRoute can use them.
     *
     * @param overrides - loaded after the application's modules, so its bindings win
     * @param testMode - no Express; managed clients dispatch in-process
     */
    async initialize(frameworkContainer: Container, overrides?: ContainerModule, testMode: boolean = false): Promise<void> {
        if (this.appContainer) {
            return;
        }

        this.testMode = testMode;

        const appContainer = new Container({ parent: frameworkContainer });
        this.appContainer = appContainer;
        this.routeBuilder.setContainer(appContainer);

        const connector: HttpConnector = testMode
            ? new InProcessConnector(this.routeBuilder, this.encoder)
            : new FetchConnector();
        const defaultBaseUrl = this.config.baseUrl ?? `http://127.0.0.1:${this.config.port}`;
        frameworkContainer
            .bind<ManagedClientRegistry>(ManagedClientRegistry)
            .toConstantValue(new ManagedClientRegistry(defaultBaseUrl, connector, this.config.properties));

        await this.loadDIModules(appContainer, overrides);

        // an override module may have bound its own registry
        const registry = appContainer.get<ManagedClientRegistry>(ManagedClientRegistry);
        registry.setContextMgr(new ContextMgr(new RequestContextReader(), this.collectPlatformHeaders(appContainer)));
        for (const definition of this.meta.getManagedClients()) {
            registry.registerDefinition(definition);
        }
        this.registry = registry;

        for (const routes of this.meta.getRoutes()) {
            routes.configure(this.routeBuilder);
        }
        this.routeBuilder.validateRouteFilters();
    }

    private async loadDIModules(appContainer: Container, overrides?: ContainerModule): Promise<void> {
        // @provideSingleton classes, controllers included
        await appContainer.load(buildProviderModule());
        await appContainer.load(CoreModule);

        for (const module of this.meta.getDIModules()) {
            await appContainer.load(module);
        }

        if (overrides) {
            await appContainer.load(overrides);
        }
    }

    private collectPlatformHeaders(appContainer: Container): PlatformHeader[] {
        if (!appContainer.isBound(HEADER_TYPES.PlatformHeadersExtension)) {
            return [];
        }
        const extensions = appContainer.getAll<PlatformHeadersExtension>(HEADER_TYPES.PlatformHeadersExtension);
        return PlatformHeadersExtension.flatten(extensions);
    }

    async start(port?: number): Promise<number> {
        const registry = this.requireRegistry();
        const listenPort = port ?? this.config.port;

        if (this.testMode) {
            console.log('[Server] Test mode, requests are dispatched in-process');
            return listenPort;
        }

        const app = express();

        // Layer 1: outermost safety net
        app.use(this.middleware.globalErrorHandler.bind(this.middleware));
        // Layer 2: request trace
        app.use(this.middleware.logNextLayer.bind(this.middleware));

        const routeCount = this.registerExpressRoutes(app);

        const server = await new Promise<ReturnType<Express['listen']>>((resolve, reject) => {
            const listening = app.listen(listenPort, (error?: Error) => {
                if (error) {
                    console.error('[Server] Failed to start server:', error);
                    reject(error);
                    return;
                }
                resolve(listening);
            });
        });
        this.server = server;

        const address = server.address();
        const boundPort = address !== null && typeof address === 'object' ? address.port : listenPort;
        if (!this.config.baseUrl) {
            registry.setDefaultBaseUrl(`http://127.0.0.1:${boundPort}`);
        }

        console.log(`[Server] Listening on http://localhost:${boundPort}`);
        console.log(`[Server] Registered ${routeCount} routes`);
        return boundPort;
    }

    /**
     * For each route: filter chain, then ExpressWrapper, then the Express handler.
     */
    private registerExpressRoutes(app: Express): number {
        let count = 0;

        for (const routeWithMeta of this.routeBuilder.getRoutes()) {
            const service = this.routeBuilder.createRouteHandler(routeWithMeta);
            const routeMeta = routeWithMeta.definition.routeMeta;

            const wrapper = this.middleware.createExpressWrapper(service, routeMeta, this.encoder);
            this.registerHandler(app, routeMeta.httpMethod, routeMeta.path, wrapper.execute.bind(wrapper));
            count++;
        }

        return count;
    }

    private registerHandler(app: Express, httpMethod: string, path: string, expressHandler: ExpressRouteHandler): void {
        switch (httpMethod.toLowerCase()) {
            case 'get':
                app.get(path, expressHandler);
                break;
            case 'post':
                app.post(path, expressHandler);
                break;
            case 'put':
                app.put(path, expressHandler);
                break;
            case 'delete':
                app.delete(path, expressHandler);
                break;
            case 'patch':
                app.patch(path, expressHandler);
                break;
            default:
                console.warn(`[Server] Unknown HTTP method: ${httpMethod}`);
        }
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }
        this.server = undefined;

        return new Promise<void>((resolve, reject) => {
            server.close((err?: Error) => {
                if (err) {
                    console.error('[Server] Error stopping server:', err);
                    reject(err);
                    return;
                }
                console.log('[Server] Server stopped');
                resolve();
            });
        });
    }

    getContainer(): Container {
        if (!this.appContainer) {
            throw new Error('Server not initialized. Call initialize() first.');
        }
        return this.appContainer;
    }

    getManagedClients(): ManagedClientRegistry {
        return this.requireRegistry();
    }

    target(path: string = ''): ClientTarget {
        return this.requireRegistry().self().target(path);
    }

    private requireRegistry(): ManagedClientRegistry {
        if (!this.registry) {
            throw new Error('Server not initialized. Call initialize() first.');
        }
        return this.registry;
    }
}
