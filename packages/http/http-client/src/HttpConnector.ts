import { ClientResponse } from './ClientResponse';

/**
 * ConnectorRequest - what a connector sends: the request after every client
 * filter has run.
 */
export class ConnectorRequest {
    constructor(
        readonly method: string,
        readonly uri: string,
        /**
         * Lowercase header name -> values.
         */
        readonly headers: Map<string, string[]>,
        readonly body?: string,
    ) {}

    /**
     * One string per header, repeated values joined with ', '.
     */
    headerRecord(): Record<string, string> {
        const record: Record<string, string> = {};
        for (const [name, values] of this.headers) {
            record[name] = values.join(', ');
        }
        return record;
    }
}

/**
 * HttpConnector - the transport under managed clients.
 *
 * - FetchConnector: real HTTP through the global fetch
 * - InProcessConnector (http-server): straight into the route table, no sockets
 */
export interface HttpConnector {
    execute(request: ConnectorRequest): Promise<ClientResponse>;
}

/**
 * FetchConnector - sends requests with the fetch built into Node.js.
 */
export class FetchConnector implements HttpConnector {
    async execute(request: ConnectorRequest): Promise<ClientResponse> {
        const response = await fetch(request.uri, {
            method: request.method,
            headers: request.headerRecord(),
            body: request.body,
        });

        const headers = new Map<string, string>();
        response.headers.forEach((value, name) => {
            headers.set(name.toLowerCase(), value);
        });

        const body = await response.text();
        return new ClientResponse(response.status, headers, body);
    }
}
