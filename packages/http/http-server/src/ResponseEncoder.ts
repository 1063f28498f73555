import { injectable } from 'inversify';
import { provideSingleton } from '@tollgate/http-routing';
import { ResponseWrapper } from '@tollgate/http-filters';
import {
    ProtocolError,
    HttpError,
    HttpBadRequestError,
    HttpVendorError,
    HttpUserError,
    HttpNotFoundError,
    HttpTimeoutError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpInternalServerError,
    HttpBadGatewayError,
    HttpGatewayTimeoutError,
    MediaType,
    isTextMediaType,
} from '@tollgate/http-api';
import { toError } from '@tollgate/core-util';

/**
 * EncodedResponse - a response ready for the wire (Express) or for a
 * ClientResponse (in-process dispatch).
 */
export class EncodedResponse {
    constructor(
        readonly statusCode: number,
        readonly contentType: string,
        readonly body: string,
        readonly headers: Map<string, string> = new Map(),
    ) {}

    /**
     * Response headers including content-type.
     */
    headerMap(): Map<string, string> {
        const all = new Map(this.headers);
        all.set('content-type', this.contentType);
        return all;
    }
}

/**
 * ResponseEncoder - turns what the filter chain returns, or throws, into an
 * EncodedResponse. Shared by ExpressWrapper and InProcessConnector so both
 * paths encode status, headers and body the same way.
 */
@provideSingleton()
@injectable()
export class ResponseEncoder {
    /**
     * text/* bodies are written as strings, everything else as JSON.
     * Routes without a content type answer application/json.
     */
    encode(wrapper: ResponseWrapper<unknown>): EncodedResponse {
        const contentType = wrapper.contentType ?? MediaType.APPLICATION_JSON;
        const value = wrapper.response;

        let body: string;
        if (value === undefined || value === null) {
            body = '';
        } else if (isTextMediaType(contentType)) {
            body = typeof value === 'string' ? value : JSON.stringify(value);
        } else {
            body = JSON.stringify(value);
        }

        return new EncodedResponse(wrapper.statusCode, contentType, body, new Map(wrapper.headers));
    }

    /**
     * Maps HttpError types to their status and a ProtocolError body
     * (must match ClientErrorTranslator):
     * - HttpUserError → 266 (with errorCode)
     * - HttpBadRequestError → 400 (with field, guiAlertMessage)
     * - HttpUnauthorizedError → 401
     * - HttpForbiddenError → 403
     * - HttpNotFoundError → 404
     * - HttpTimeoutError → 408
     * - HttpInternalServerError → 500
     * - HttpBadGatewayError → 502
     * - HttpGatewayTimeoutError → 504
     * - HttpVendorError → 598 (with waitSeconds)
     * - anything else → 500 'Internal Server Error'
     */
    encodeError(error: unknown): EncodedResponse {
        const protocolError = new ProtocolError();

        if (!(error instanceof HttpError)) {
            const err = toError(error);
            console.error('[ResponseEncoder] Unexpected error:', err);
            protocolError.message = 'Internal Server Error';
            return this.json(500, protocolError);
        }

        protocolError.message = error.message;
        protocolError.subType = error.subType;
        protocolError.name = error.name;

        if (error instanceof HttpUserError) {
            console.log('[ResponseEncoder] User Error:', error.message);
            protocolError.errorCode = error.errorCode;
        } else if (error instanceof HttpBadRequestError) {
            console.log('[ResponseEncoder] Bad Request:', error.message);
            protocolError.field = error.field;
            protocolError.guiAlertMessage = error.guiMessage;
        } else if (error instanceof HttpNotFoundError) {
            console.log('[ResponseEncoder] Not Found:', error.message);
        } else if (error instanceof HttpTimeoutError) {
            console.error('[ResponseEncoder] Timeout Error:', error.message);
        } else if (error instanceof HttpVendorError) {
            console.error('[ResponseEncoder] Vendor Error:', error.message);
            protocolError.waitSeconds = error.waitSeconds;
        } else if (error instanceof HttpUnauthorizedError) {
            console.log('[ResponseEncoder] Unauthorized:', error.message);
        } else if (error instanceof HttpForbiddenError) {
            console.log('[ResponseEncoder] Forbidden:', error.message);
        } else if (error instanceof HttpInternalServerError) {
            console.error('[ResponseEncoder] Internal Server Error:', error.message);
        } else if (error instanceof HttpBadGatewayError) {
            console.error('[ResponseEncoder] Bad Gateway:', error.message);
        } else if (error instanceof HttpGatewayTimeoutError) {
            console.error('[ResponseEncoder] Gateway Timeout:', error.message);
        } else {
            console.log('[ResponseEncoder] Generic HttpError:', error.message);
        }

        return this.json(error.code, protocolError);
    }

    private json(statusCode: number, protocolError: ProtocolError): EncodedResponse {
        return new EncodedResponse(statusCode, MediaType.APPLICATION_JSON, JSON.stringify(protocolError));
    }
}

/**
 * Request body as the controller receives it: parsed JSON for POST, PUT and
 * PATCH (an empty body is `{}`), nothing for other methods.
 *
 * @throws HttpBadRequestError on a body that is not JSON
 */
export function decodeRequestBody(httpMethod: string, bodyText: string | undefined): unknown {
    if (!['POST', 'PUT', 'PATCH'].includes(httpMethod.toUpperCase())) {
        return undefined;
    }
    if (!bodyText) {
        return {};
    }
    try {
        return JSON.parse(bodyText);
    } catch (err: unknown) {
        const error = toError(err);
        throw new HttpBadRequestError(`Request body is not valid JSON: ${error.message}`);
    }
}
