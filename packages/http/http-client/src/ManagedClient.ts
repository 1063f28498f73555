import { HeaderMethods, InvalidArgumentError, LogApiCall, MediaType } from '@tollgate/http-api';
import { ClientRequestContext } from './ClientRequestContext';
import { ClientRequestFilter } from './ClientRequestFilter';
import { ClientResponse } from './ClientResponse';
import { ConnectorRequest, HttpConnector } from './HttpConnector';
import { ClientErrorTranslator } from './ClientErrorTranslator';
import { ContextMgr } from './ContextMgr';

const UNRESOLVED_TEMPLATE = /\{[^}/]+\}/;

/**
 * Joins two URI parts with exactly one '/'. An empty part returns the other.
 */
export function joinPath(base: string, segment: string): string {
    if (!segment) {
        return base;
    }
    if (!base) {
        return segment;
    }
    return `${base.replace(/\/+$/, '')}/${segment.replace(/^\/+/, '')}`;
}

/**
 * One outgoing call as built by InvocationBuilder.
 */
export class Invocation {
    constructor(
        readonly method: string,
        readonly uri: string,
        readonly accept: string | undefined,
        readonly headers: Array<[string, string]>,
        readonly body?: string,
    ) {}
}

/**
 * ManagedClient - a registry entry resolved for use: base URI, own filter list,
 * connector. Obtained from ManagedClientRegistry.client(name).
 */
export class ManagedClient {
    constructor(
        readonly name: string,
        readonly baseUri: string,
        private filters: ClientRequestFilter[],
        private connector: HttpConnector,
        private logApiCall: LogApiCall,
        private headerMethods: HeaderMethods,
        private contextMgr?: ContextMgr,
    ) {}

    target(path: string = ''): ClientTarget {
        return new ClientTarget(this, joinPath(this.baseUri, path));
    }

    /**
     * Sends one request:
     * 1. Accept, when given
     * 2. transferable platform headers from the ContextMgr
     * 3. headers set on the invocation
     * 4. this client's filters, in order
     * 5. the connector, logged through LogApiCall
     *
     * @param throwOnError - reject non-2xx responses with the translated HttpError
     */
    async send(invocation: Invocation, throwOnError: boolean): Promise<ClientResponse> {
        if (UNRESOLVED_TEMPLATE.test(invocation.uri)) {
            throw new InvalidArgumentError(`Unresolved template parameter in ${invocation.uri}`);
        }

        const request = new ClientRequestContext(invocation.method, invocation.uri, invocation.body);

        if (invocation.accept) {
            request.putSingle('accept', invocation.accept);
        }

        const platformHeaders = this.contextMgr?.headerSet ?? [];
        if (this.contextMgr) {
            for (const header of platformHeaders) {
                const value = this.contextMgr.read(header.headerName);
                if (value) {
                    request.putSingle(header.headerName, value);
                }
            }
        }

        for (const [name, value] of invocation.headers) {
            request.add(name, value);
        }

        for (const filter of this.filters) {
            await filter.filter(request);
        }

        const connectorRequest = new ConnectorRequest(request.method, request.uri, request.headerMap(), request.body);
        const headersForLogging = this.headerMethods.formatHeadersForLogging(request.headerMap(), platformHeaders);

        return this.logApiCall.execute(
            'CLIENT',
            `${this.name} ${request.method} ${request.uri}`,
            request.body,
            headersForLogging,
            async (): Promise<ClientResponse> => {
                const response = await this.connector.execute(connectorRequest);
                if (throwOnError && !response.ok) {
                    throw ClientErrorTranslator.translate(response);
                }
                return response;
            },
        );
    }
}

/**
 * ClientTarget - an immutable URI on a managed client. Every method returns a
 * new target.
 */
export class ClientTarget {
    constructor(
        private client: ManagedClient,
        private uri: string,
    ) {}

    path(segment: string): ClientTarget {
        return new ClientTarget(this.client, joinPath(this.uri, segment));
    }

    /**
     * Replaces every `{name}` with the URI-encoded value.
     */
    resolveTemplate(name: string, value: string): ClientTarget {
        return new ClientTarget(this.client, this.uri.split(`{${name}}`).join(encodeURIComponent(value)));
    }

    getUri(): string {
        return this.uri;
    }

    request(accept?: string): InvocationBuilder {
        return new InvocationBuilder(this.client, this.uri, accept);
    }
}

/**
 * InvocationBuilder - headers for one call, then the call itself.
 */
export class InvocationBuilder {
    private headers: Array<[string, string]> = [];

    constructor(
        private client: ManagedClient,
        private uri: string,
        private accept?: string,
    ) {}

    header(name: string, value: string): InvocationBuilder {
        this.headers.push([name, value]);
        return this;
    }

    /**
     * GET resolving with the response of any status.
     */
    get(): Promise<ClientResponse> {
        return this.client.send(this.invocation('GET'), false);
    }

    /**
     * GET resolving with the body, or rejecting with the translated HttpError.
     */
    async getText(): Promise<string> {
        const response = await this.client.send(this.invocation('GET'), true);
        return response.readText();
    }

    async getJson<T>(): Promise<T> {
        const response = await this.client.send(this.invocation('GET'), true);
        return response.readJson<T>();
    }

    /**
     * POST with a JSON body, resolving with the response of any status.
     */
    post(entity: unknown): Promise<ClientResponse> {
        return this.client.send(this.invocation('POST', JSON.stringify(entity)), false);
    }

    private invocation(method: string, body?: string): Invocation {
        const headers: Array<[string, string]> = [...this.headers];
        if (body !== undefined) {
            headers.push(['content-type', MediaType.APPLICATION_JSON]);
        }
        return new Invocation(method, this.uri, this.accept, headers, body);
    }
}
