/**
 * @tollgate/http-api
 *
 * The contract both sides share:
 * ```
 * http-api (contract, errors, header rules)
 *    ↑
 *    ├── http-routing / http-server (server: contract → controllers)
 *    └── http-client (managed clients: named targets → HTTP requests)
 * ```
 */

// API definition decorators
export {
    ApiInterface,
    Get,
    Post,
    Put,
    Delete,
    Patch,
    Path,
    Produces,
    getRoutes,
    isApiInterface,
    RouteMetadata,
    METADATA_KEYS,
} from './decorators';

export type { ValidateImplementation } from './validators';

export { MediaType, isTextMediaType, isJsonMediaType } from './MediaType';

// Header rules
export { HeaderRule, HeaderMismatch, injectHeader, validateHeader } from './HeaderRule';
export type { InboundHeaders, OutboundHeaders } from './HeaderRule';

// Platform headers
export { PlatformHeader } from './PlatformHeader';
export { PlatformHeadersExtension } from './PlatformHeadersExtension';
export { HEADER_TYPES } from './HeaderTypes';
export { HeaderMethods } from './HeaderMethods';
export type { ContextReader } from './ContextReader';
export { LogApiCall } from './LogApiCall';

// HTTP errors
export {
    ProtocolError,
    InvalidArgumentError,
    HttpError,
    HttpNotFoundError,
    EndpointNotFoundError,
    HttpBadRequestError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpTimeoutError,
    HttpBadGatewayError,
    HttpGatewayTimeoutError,
    HttpInternalServerError,
    HttpVendorError,
    HttpUserError,
    ENTITY_NOT_FOUND,
} from './errors';
