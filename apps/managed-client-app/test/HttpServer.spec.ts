import 'reflect-metadata';
import { MediaType } from '@tollgate/http-api';
import { ServerConfig } from '@tollgate/http-routing';
import { Server, ServerFactory } from '@tollgate/http-server';
import { ProdServerMeta } from '../src/ProdServerMeta';
import { AppClients } from '../src/clients/AppClients';

/**
 * Express on an ephemeral loopback port; managed clients go over real HTTP
 * through FetchConnector.
 */
describe('HTTP server', () => {
    let server: Server;
    let baseUrl: string;

    beforeAll(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);

        server = await ServerFactory.create(new ProdServerMeta(), new ServerConfig(0));
        const port = await server.start();
        baseUrl = `http://127.0.0.1:${port}`;
    });

    afterAll(async () => {
        await server.stop();
        jest.restoreAllMocks();
    });

    it('points managed clients at the bound port', () => {
        expect(server.getManagedClients().getDefaultBaseUrl()).toBe(baseUrl);
    });

    it('serves /public/a through clientA', async () => {
        const response = await fetch(`${baseUrl}/public/a`);

        expect(response.status).toBe(200);
        expect(response.headers.get('content-type')).toContain('text/plain');
        expect(await response.text()).toBe('a');
    });

    it('serves /public/b through clientB', async () => {
        const response = await fetch(`${baseUrl}/public/b`);

        expect(response.status).toBe(200);
        expect(await response.text()).toBe('b');
    });

    it('answers 403 to a direct call without the header', async () => {
        const response = await fetch(`${baseUrl}/internal/a`);

        expect(response.status).toBe(403);
        expect(await response.text()).toBe("Expected header 'custom-header' not present or value not equal to 'a'");
    });

    it('lets a direct call with the header through', async () => {
        const response = await fetch(`${baseUrl}/internal/b`, { headers: { 'custom-header': 'b' } });

        expect(response.status).toBe(200);
        expect(await response.text()).toBe('b');
    });

    it('sends managed client calls over HTTP', async () => {
        const body = await server.getManagedClients().target(AppClients.CLIENT_A, 'a').request(MediaType.TEXT_PLAIN).getText();

        expect(body).toBe('a');
    });
});
