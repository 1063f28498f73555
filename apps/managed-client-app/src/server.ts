import 'reflect-metadata';
import { ServerConfig } from '@tollgate/http-routing';
import { ServerFactory } from '@tollgate/http-server';
import { ProdServerMeta } from './ProdServerMeta';

/**
 * Starts the server on PORT (default 8200) and runs until SIGTERM or SIGINT.
 */
async function main(): Promise<void> {
    const config = ServerConfig.fromEnv(process.env);

    console.log('[Server] Starting managed-client-app...');
    const server = await ServerFactory.create(new ProdServerMeta(), config);
    await server.start();

    await new Promise<void>((resolve) => {
        process.on('SIGTERM', () => {
            console.log('[Server] Received SIGTERM signal, shutting down...');
            resolve();
        });
        process.on('SIGINT', () => {
            console.log('[Server] Received SIGINT signal, shutting down...');
            resolve();
        });
    });

    await server.stop();
}

main().catch((error: unknown) => {
    console.error('[Server] Error during startup:', error);
    process.exit(1);
});

export { main };
