import {
    ProtocolError,
    HttpError,
    HttpBadRequestError,
    HttpUserError,
    HttpVendorError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpTimeoutError,
    HttpInternalServerError,
    HttpBadGatewayError,
    HttpGatewayTimeoutError,
    isJsonMediaType,
} from '@tollgate/http-api';
import { toError } from '@tollgate/core-util';
import { ClientResponse } from './ClientResponse';

/**
 * ClientErrorTranslator - rebuilds a typed HttpError from an error response.
 *
 * The client-side reverse of ResponseEncoder.encodeError():
 * - Server: HttpError → ResponseEncoder → ProtocolError JSON
 * - Client: ProtocolError JSON → ClientErrorTranslator → HttpError
 *
 * Routes that answer text/plain themselves (a header rule mismatch) have no
 * ProtocolError; their body becomes the message.
 */
export class ClientErrorTranslator {
    /**
     * Maps status codes to error types (symmetric with the server):
     * - 400 → HttpBadRequestError (with field, guiAlertMessage)
     * - 266 → HttpUserError (with errorCode)
     * - 401 → HttpUnauthorizedError
     * - 403 → HttpForbiddenError
     * - 404 → HttpNotFoundError
     * - 408 → HttpTimeoutError
     * - 500 → HttpInternalServerError
     * - 502 → HttpBadGatewayError
     * - 504 → HttpGatewayTimeoutError
     * - 598 → HttpVendorError (with waitSeconds)
     * - other → HttpError carrying the status
     */
    static translate(response: ClientResponse): HttpError {
        const protocolError = ClientErrorTranslator.readProtocolError(response);
        const statusCode = response.status;
        const message = protocolError.message || `HTTP ${statusCode}`;
        const subType = protocolError.subType;

        switch (statusCode) {
            case 400:
                return new HttpBadRequestError(message, protocolError.field, protocolError.guiAlertMessage);

            case 266:
                return new HttpUserError(message, protocolError.errorCode);

            case 401:
                return new HttpUnauthorizedError(message, subType);

            case 403:
                return new HttpForbiddenError(message);

            case 404:
                return new HttpNotFoundError(message);

            case 408:
                return new HttpTimeoutError(message);

            case 500:
                return new HttpInternalServerError(message);

            case 502:
                return new HttpBadGatewayError(message);

            case 504:
                return new HttpGatewayTimeoutError(message);

            case 598:
                return new HttpVendorError(message, protocolError.waitSeconds);

            default:
                return new HttpError(message, statusCode, subType);
        }
    }

    /**
     * ProtocolError from a JSON body; for any other body the text is the message.
     */
    static readProtocolError(response: ClientResponse): ProtocolError {
        const protocolError = new ProtocolError();
        const body = response.readText();

        if (!isJsonMediaType(response.contentType)) {
            protocolError.message = body || undefined;
            return protocolError;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch (err: unknown) {
            const error = toError(err);
            console.log(`[ClientErrorTranslator] Error body is not valid JSON: ${error.message}`);
            protocolError.message = body || undefined;
            return protocolError;
        }

        if (typeof parsed !== 'object' || parsed === null) {
            protocolError.message = body || undefined;
            return protocolError;
        }

        protocolError.message = readString(parsed, 'message');
        protocolError.subType = readString(parsed, 'subType');
        protocolError.field = readString(parsed, 'field');
        protocolError.name = readString(parsed, 'name');
        protocolError.guiAlertMessage = readString(parsed, 'guiAlertMessage');
        protocolError.errorCode = readString(parsed, 'errorCode');
        const waitSeconds: unknown = Reflect.get(parsed, 'waitSeconds');
        protocolError.waitSeconds = typeof waitSeconds === 'number' ? waitSeconds : undefined;
        return protocolError;
    }
}

function readString(source: object, key: string): string | undefined {
    const value: unknown = Reflect.get(source, key);
    return typeof value === 'string' ? value : undefined;
}
