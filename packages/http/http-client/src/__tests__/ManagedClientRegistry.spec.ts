import { HeaderRule, HttpForbiddenError, InvalidArgumentError, PlatformHeader } from '@tollgate/http-api';
import { ManagedClientRegistry } from '../ManagedClientRegistry';
import { ClientConfig } from '../ClientConfig';
import { InjectHeaderFilter, ClientRequestFilter } from '../ClientRequestFilter';
import { ClientRequestContext } from '../ClientRequestContext';
import { ClientResponse } from '../ClientResponse';
import { ConnectorRequest, HttpConnector } from '../HttpConnector';
import { ContextMgr } from '../ContextMgr';
import { StaticContextReader } from '../ContextReader';

const BASE_URL = 'http://127.0.0.1:8200';

/**
 * Records every request and answers with a fixed response.
 */
class RecordingConnector implements HttpConnector {
    readonly requests: ConnectorRequest[] = [];

    constructor(private response: ClientResponse = new ClientResponse(200, new Map([['content-type', 'text/plain']]), 'ok')) {}

    async execute(request: ConnectorRequest): Promise<ClientResponse> {
        this.requests.push(request);
        return this.response;
    }

    lastRequest(): ConnectorRequest {
        const last = this.requests[this.requests.length - 1];
        if (!last) {
            throw new Error('no request was sent');
        }
        return last;
    }
}

describe('ManagedClientRegistry', () => {
    const requireA = new HeaderRule('custom-header', 'a');
    const requireB = new HeaderRule('custom-header', 'b');
    let connector: RecordingConnector;
    let registry: ManagedClientRegistry;

    beforeEach(() => {
        connector = new RecordingConnector();
        registry = new ManagedClientRegistry(BASE_URL, connector);
    });

    describe('register', () => {
        it('rejects a duplicate name', () => {
            registry.register('clientA', new ClientConfig());

            expect(() => registry.register('clientA', new ClientConfig())).toThrow(InvalidArgumentError);
        });

        it('rejects an empty name', () => {
            expect(() => registry.register('', new ClientConfig())).toThrow(InvalidArgumentError);
        });

        it('lists registered names', () => {
            registry.register('clientA', new ClientConfig());
            registry.register('clientB', new ClientConfig());

            expect(registry.names()).toEqual(['clientA', 'clientB']);
            expect(registry.has('clientA')).toBe(true);
            expect(registry.has('clientC')).toBe(false);
        });

        it('stores a copy of the config', async () => {
            const config = new ClientConfig();
            registry.register('clientA', config);
            config.register(new InjectHeaderFilter(requireA));

            await registry.target('clientA', 'internal/a').request().get();

            expect(connector.lastRequest().headers.get('custom-header')).toBeUndefined();
        });

        it('fails lookups of unknown names', () => {
            expect(() => registry.client('missing')).toThrow("No managed client registered under name 'missing'");
            expect(() => registry.registerOutboundFilter('missing', new InjectHeaderFilter(requireA))).toThrow(
                InvalidArgumentError,
            );
        });
    });

    describe('resolveBaseUri', () => {
        it('joins a relative base onto the default base URL', () => {
            registry.register('clientA', new ClientConfig('internal'));

            expect(registry.resolveBaseUri('clientA')).toBe('http://127.0.0.1:8200/internal');
            expect(registry.target('clientA', 'a').getUri()).toBe('http://127.0.0.1:8200/internal/a');
        });

        it('uses the default base URL when none is configured', () => {
            registry.register('clientB', new ClientConfig());

            expect(registry.target('clientB', 'internal/b').getUri()).toBe('http://127.0.0.1:8200/internal/b');
        });

        it('keeps an absolute base URL', () => {
            registry.register('remote', new ClientConfig('https://remote.test/api/'));

            expect(registry.target('remote', '/items').getUri()).toBe('https://remote.test/api/items');
        });

        it('prefers the <name>.baseUri property', () => {
            const properties = new Map([['clientA', 'ignored'], ['clientA.baseUri', 'http://override.test']]);
            registry = new ManagedClientRegistry(BASE_URL, connector, properties);
            registry.register('clientA', new ClientConfig('internal'));

            expect(registry.resolveBaseUri('clientA')).toBe('http://override.test');
        });

        it('follows a default base URL changed after registration', () => {
            registry.register('clientA', new ClientConfig('internal'));

            registry.setDefaultBaseUrl('http://127.0.0.1:45678');

            expect(registry.target('clientA', 'a').getUri()).toBe('http://127.0.0.1:45678/internal/a');
            expect(registry.self().target('/public/a').getUri()).toBe('http://127.0.0.1:45678/public/a');
        });
    });

    describe('outbound filters', () => {
        beforeEach(() => {
            registry.register('clientA', new ClientConfig('internal').register(new InjectHeaderFilter(requireA)));
            registry.register('clientB', new ClientConfig().register(new InjectHeaderFilter(requireB)));
        });

        it('applies a client only its own rule', async () => {
            await registry.target('clientA', 'a').request().get();
            expect(connector.lastRequest().headers.get('custom-header')).toEqual(['a']);

            await registry.target('clientB', 'internal/b').request().get();
            expect(connector.lastRequest().headers.get('custom-header')).toEqual(['b']);
        });

        it('lets a filter overwrite an invocation header', async () => {
            await registry.target('clientA', 'a').request().header('Custom-Header', 'b').get();

            expect(connector.lastRequest().headers.get('custom-header')).toEqual(['a']);
        });

        it('appends registerOutboundFilter to one client only', async () => {
            const seen: string[] = [];
            const recordingFilter: ClientRequestFilter = {
                filter: (request: ClientRequestContext) => {
                    seen.push(request.uri);
                },
            };
            registry.registerOutboundFilter('clientB', recordingFilter);

            await registry.target('clientA', 'a').request().get();
            await registry.target('clientB', 'internal/b').request().get();

            expect(seen).toEqual(['http://127.0.0.1:8200/internal/b']);
        });

        it('runs filters in registration order', async () => {
            registry.registerOutboundFilter('clientA', new InjectHeaderFilter(requireB));

            await registry.target('clientA', 'a').request().get();

            expect(connector.lastRequest().headers.get('custom-header')).toEqual(['b']);
        });
    });

    describe('invocations', () => {
        it('sets Accept and the method', async () => {
            registry.register('clientA', new ClientConfig('internal'));

            await registry.target('clientA', 'a').request('text/plain').get();

            const request = connector.lastRequest();
            expect(request.method).toBe('GET');
            expect(request.uri).toBe('http://127.0.0.1:8200/internal/a');
            expect(request.headers.get('accept')).toEqual(['text/plain']);
        });

        it('resolves templates with URI encoding', () => {
            registry.register('clientA', new ClientConfig('internal'));

            const target = registry.target('clientA', 'items/{id}').resolveTemplate('id', 'a b/c');

            expect(target.getUri()).toBe('http://127.0.0.1:8200/internal/items/a%20b%2Fc');
        });

        it('fails before sending when a template is unresolved', async () => {
            registry.register('clientA', new ClientConfig('internal'));

            await expect(registry.target('clientA', 'items/{id}').request().get()).rejects.toThrow(InvalidArgumentError);
            expect(connector.requests).toHaveLength(0);
        });

        it('resolves get() with error responses and rejects getText()', async () => {
            const forbidden = new ClientResponse(403, new Map([['content-type', 'text/plain']]), 'denied');
            registry = new ManagedClientRegistry(BASE_URL, new RecordingConnector(forbidden));
            registry.register('clientA', new ClientConfig('internal'));

            const response = await registry.target('clientA', 'a').request().get();
            expect(response.status).toBe(403);
            expect(response.readText()).toBe('denied');

            await expect(registry.target('clientA', 'a').request().getText()).rejects.toBeInstanceOf(HttpForbiddenError);
        });

        it('parses JSON bodies', async () => {
            const json = new ClientResponse(200, new Map([['content-type', 'application/json']]), '{"value":"a"}');
            registry = new ManagedClientRegistry(BASE_URL, new RecordingConnector(json));
            registry.register('clientA', new ClientConfig('internal'));

            expect(await registry.target('clientA', 'a').request().getJson<{ value: string }>()).toEqual({ value: 'a' });
        });

        it('uses a per-client connector when configured', async () => {
            const own = new RecordingConnector();
            registry.register('clientA', new ClientConfig('internal').withConnector(own));

            await registry.target('clientA', 'a').request().get();

            expect(own.requests).toHaveLength(1);
            expect(connector.requests).toHaveLength(0);
        });
    });

    describe('platform headers', () => {
        const requestId = new PlatformHeader('x-request-id');
        const apiKey = new PlatformHeader('x-api-key', true, true);
        const localOnly = new PlatformHeader('x-debug', false);

        it('copies transferable context headers onto the request', async () => {
            const reader = new StaticContextReader(
                new Map([
                    ['x-request-id', 'req-1'],
                    ['x-api-key', 'test-secret'],
                    ['x-debug', 'on'],
                ]),
            );
            registry.setContextMgr(new ContextMgr(reader, [requestId, apiKey, localOnly]));
            registry.register('clientA', new ClientConfig('internal'));

            await registry.target('clientA', 'a').request().get();

            expect(connector.lastRequest().headerRecord()).toEqual({
                'x-request-id': 'req-1',
                'x-api-key': 'test-secret',
            });
        });
    });
});
