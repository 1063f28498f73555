import 'reflect-metadata';
import { HttpForbiddenError, MediaType } from '@tollgate/http-api';
import { ManagedClientRegistry } from '@tollgate/http-client';
import { ServerConfig } from '@tollgate/http-routing';
import { Server, ServerFactory } from '@tollgate/http-server';
import { ProdServerMeta } from '../src/ProdServerMeta';
import { AppClients } from '../src/clients/AppClients';

const MISSING_A = "Expected header 'custom-header' not present or value not equal to 'a'";
const MISSING_B = "Expected header 'custom-header' not present or value not equal to 'b'";

/**
 * Full stack in test mode: filters, header rules, controllers and managed
 * clients, dispatched in-process through InProcessConnector.
 */
describe('Managed clients and header rules', () => {
    let server: Server;
    let clients: ManagedClientRegistry;
    let logSpy: jest.SpyInstance;

    beforeEach(async () => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);

        server = await ServerFactory.create(new ProdServerMeta(), new ServerConfig(), undefined, true);
        await server.start();
        clients = server.getManagedClients();
    });

    afterEach(async () => {
        await server.stop();
        jest.restoreAllMocks();
    });

    function serverRequestLog(label: string): string {
        const line = logSpy.mock.calls
            .map((call: unknown[]) => String(call[0]))
            .find((message: string) => message.startsWith(`[API-SVR-req] '${label}'`));
        if (!line) {
            throw new Error(`no server request log for ${label}`);
        }
        return line;
    }

    describe('scenario 1: matching rule', () => {
        it('clientA reaches /internal/a', async () => {
            const response = await clients.target(AppClients.CLIENT_A, 'a').request(MediaType.TEXT_PLAIN).get();

            expect(response.status).toBe(200);
            expect(response.readText()).toBe('a');
        });

        it('clientB reaches /internal/b', async () => {
            const body = await clients.target(AppClients.CLIENT_B, 'internal/b').request(MediaType.TEXT_PLAIN).getText();

            expect(body).toBe('b');
        });
    });

    describe('scenario 2: omitted header', () => {
        it('answers 403 naming the header and the expected value', async () => {
            const response = await server.target('/internal/a').request(MediaType.TEXT_PLAIN).get();

            expect(response.status).toBe(403);
            expect(response.contentType).toBe('text/plain');
            expect(response.readText()).toBe(MISSING_A);
        });

        it('rejects getText with the translated HttpForbiddenError', async () => {
            const call = server.target('/internal/b').request(MediaType.TEXT_PLAIN).getText();

            await expect(call).rejects.toBeInstanceOf(HttpForbiddenError);
            await expect(server.target('/internal/b').request(MediaType.TEXT_PLAIN).getText()).rejects.toThrow(MISSING_B);
        });

        it('rejects a value in the wrong case', async () => {
            const response = await server.target('/internal/a').request().header('custom-header', 'A').get();

            expect(response.status).toBe(403);
        });
    });

    describe('scenario 3: swapped clients', () => {
        it('clientB cannot reach /internal/a', async () => {
            const response = await clients.target(AppClients.CLIENT_B, 'internal/a').request(MediaType.TEXT_PLAIN).get();

            expect(response.status).toBe(403);
            expect(response.readText()).toBe(MISSING_A);
        });

        it('clientA cannot reach /internal/b', async () => {
            const response = await clients.target(AppClients.CLIENT_A, 'b').request(MediaType.TEXT_PLAIN).get();

            expect(response.status).toBe(403);
            expect(response.readText()).toBe(MISSING_B);
        });
    });

    describe('public routes calling through managed clients', () => {
        it('/public/a answers the body of /internal/a', async () => {
            const response = await server.target('/public/a').request(MediaType.TEXT_PLAIN).get();

            expect(response.status).toBe(200);
            expect(response.readText()).toBe('a');
        });

        it('/public/b passes status and body of /internal/b through', async () => {
            const response = await server.target('/public/b').request(MediaType.TEXT_PLAIN).get();

            expect(response.status).toBe(200);
            expect(response.contentType).toBe('text/plain');
            expect(response.readText()).toBe('b');
        });

        it('propagates the request id to the internal call', async () => {
            await server.target('/public/a').request(MediaType.TEXT_PLAIN).header('x-request-id', 'req-777').get();

            expect(serverRequestLog('InternalController.getA GET /internal/a')).toContain('"x-request-id":"req-777"');
        });

        it('propagates the API key and masks it in the logs', async () => {
            await server
                .target('/public/a')
                .request(MediaType.TEXT_PLAIN)
                .header('x-api-key', 'test-secret-key-value')
                .get();

            const line = serverRequestLog('InternalController.getA GET /internal/a');
            expect(line).toContain('"x-api-key":"tes...lue"');
            expect(line).not.toContain('test-secret-key-value');
        });
    });

    describe('base URIs', () => {
        it('joins the relative base of clientA onto the server base URL', () => {
            expect(clients.resolveBaseUri(AppClients.CLIENT_A)).toBe('http://127.0.0.1:8200/internal');
            expect(clients.resolveBaseUri(AppClients.CLIENT_B)).toBe('http://127.0.0.1:8200');
        });

        it('lets the <name>.baseUri property override the config', async () => {
            const config = new ServerConfig().property('clientA.baseUri', 'http://internal.example:9000/v2');
            const overridden = await ServerFactory.create(new ProdServerMeta(), config, undefined, true);

            expect(overridden.getManagedClients().resolveBaseUri(AppClients.CLIENT_A)).toBe('http://internal.example:9000/v2');
        });
    });
});
