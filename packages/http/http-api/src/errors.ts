/**
 * Error types shared by the server (ResponseEncoder) and the client
 * (ClientErrorTranslator). The two sides map status codes symmetrically:
 * the server turns an HttpError into a ProtocolError JSON body and the
 * client rebuilds the same HttpError subclass from it.
 */

/**
 * ProtocolError - JSON body of every error response.
 */
export class ProtocolError {
    public message?: string;
    public subType?: string;
    public field?: string;
    public waitSeconds?: number;
    public name?: string;
    public guiAlertMessage?: string;
    public errorCode?: string;
}

/**
 * InvalidArgumentError - malformed configuration detected at construction time
 * (an empty header rule, a bad port, a duplicate client name). Never produced
 * mid-request, so it is not an HttpError.
 */
export class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgument';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpError - base class carrying the HTTP status code.
 */
export class HttpError extends Error {
    public code: number;
    public subType?: string;
    public readonly httpCause?: Error;

    constructor(message: string, code: number, subType?: string, cause?: Error) {
        super(message);
        this.code = code;
        this.subType = subType;
        this.httpCause = cause;
        this.name = 'HttpError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export const ENTITY_NOT_FOUND = 'EntityNotFoundError';

/**
 * HttpNotFoundError - 404.
 */
export class HttpNotFoundError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 404, undefined, cause);
        this.name = ENTITY_NOT_FOUND;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * EndpointNotFoundError - 404 for a METHOD:path that no route serves.
 */
export class EndpointNotFoundError extends HttpNotFoundError {
    constructor(message: string, cause?: Error) {
        super(message, cause);
        this.name = 'EndpointNotFoundError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpBadRequestError - 400, optionally naming the offending field.
 */
export class HttpBadRequestError extends HttpError {
    public field?: string;
    public guiMessage?: string;

    constructor(message: string, field?: string, guiMessage?: string, cause?: Error) {
        super(message, 400, undefined, cause);
        this.name = 'BadRequest';
        this.field = field;
        this.guiMessage = guiMessage;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpUnauthorizedError - 401.
 */
export class HttpUnauthorizedError extends HttpError {
    constructor(message: string, subType?: string, cause?: Error) {
        super(message, 401, subType, cause);
        this.name = 'Unauthorized';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpForbiddenError - 403. A managed client raises it when a downstream
 * route rejected the request, e.g. on a header rule mismatch.
 */
export class HttpForbiddenError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 403, undefined, cause);
        this.name = 'Forbidden';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpTimeoutError - 408.
 */
export class HttpTimeoutError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 408, undefined, cause);
        this.name = 'Timeout';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpInternalServerError - 500.
 */
export class HttpInternalServerError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 500, undefined, cause);
        this.name = 'InternalServerError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpBadGatewayError - 502.
 */
export class HttpBadGatewayError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 502, undefined, cause);
        this.name = 'HttpBadGatewayError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpGatewayTimeoutError - 504. Load balancers answer 504 without a
 * ProtocolError body, so servers should not throw this themselves.
 */
export class HttpGatewayTimeoutError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 504, undefined, cause);
        this.name = 'HttpGatewayTimeoutError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpVendorError - 598, a downstream vendor failed; waitSeconds is a retry hint.
 */
export class HttpVendorError extends HttpError {
    constructor(
        message: string,
        public waitSeconds = 30,
        cause?: Error,
    ) {
        super(message, 598, undefined, cause);
        this.name = 'VendorError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpUserError - 266. A 2xx code on purpose: the user made a mistake, the
 * server did not fail, and monitoring should not count it as an error.
 */
export class HttpUserError extends HttpError {
    public errorCode?: string;

    constructor(message: string, errorCode?: string, cause?: Error) {
        super(message, 266, 'USER_ERROR', cause);
        this.name = 'UserError';
        this.errorCode = errorCode;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
