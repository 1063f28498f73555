import { RequestContext } from '@tollgate/core-context';
import { EndpointNotFoundError } from '@tollgate/http-api';
import { ClientResponse, ConnectorRequest, HttpConnector } from '@tollgate/http-client';
import { MethodMeta, RouteBuilderImpl } from '@tollgate/http-routing';
import { EncodedResponse, ResponseEncoder, decodeRequestBody } from './ResponseEncoder';

/**
 * InProcessConnector - sends managed client requests straight into the route
 * table: same filters, same controllers, same encoding as over HTTP, no sockets.
 *
 * Repeated headers arrive collapsed into one value and paths match without
 * regard to case or a trailing slash, as Express routes them.
 *
 * Each request gets its own RequestContext, as ExpressWrapper gives it, so a
 * controller calling another route in-process does not share its context.
 */
export class InProcessConnector implements HttpConnector {
    constructor(
        private routeBuilder: RouteBuilderImpl,
        private encoder: ResponseEncoder,
    ) {}

    async execute(request: ConnectorRequest): Promise<ClientResponse> {
        const path = new URL(request.uri, 'http://127.0.0.1').pathname;

        const encoded = await RequestContext.run(() => this.dispatch(request, path));

        return new ClientResponse(encoded.statusCode, encoded.headerMap(), encoded.body);
    }

    private async dispatch(request: ConnectorRequest, path: string): Promise<EncodedResponse> {
        const routeService = this.routeBuilder.findRouteService(request.method, path);
        if (!routeService) {
            return this.encoder.encodeError(new EndpointNotFoundError(`No route for ${request.method} ${path}`));
        }

        try {
            const requestDto = decodeRequestBody(request.method, request.body);
            const meta = new MethodMeta(routeService.routeMeta, MethodMeta.headersFrom(request.headerRecord()), requestDto);
            const wrapper = await routeService.service.invoke(meta);
            return this.encoder.encode(wrapper);
        } catch (err: unknown) {
            return this.encoder.encodeError(err);
        }
    }
}
