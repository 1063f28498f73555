import { InvalidArgumentError } from './errors';
import { MediaType } from './MediaType';

/**
 * Read side of a request: header lookup by name, case-insensitive.
 * Implemented by MethodMeta on the server.
 */
export interface InboundHeaders {
    getHeaderString(name: string): string | undefined;
}

/**
 * Write side of an outgoing request. putSingle replaces every existing value
 * of the header, whatever case it was set with.
 * Implemented by ClientRequestContext on the client.
 */
export interface OutboundHeaders {
    putSingle(name: string, value: string): void;
}

function isPresent(value: string | null | undefined): value is string {
    return typeof value === 'string' && value.length > 0;
}

/**
 * HeaderRule - an immutable (name, value) pair.
 *
 * The same rule is injected by a managed client (InjectHeaderFilter) and
 * validated by the route it calls (RequireHeaderFilter):
 * ```typescript
 * const requireA = new HeaderRule('custom-header', 'a');
 * new HeaderRuleRoutes().require('GET', '/internal/a', requireA);
 * new ClientConfig('internal').register(new InjectHeaderFilter(requireA));
 * ```
 */
export class HeaderRule {
    readonly headerName: string;
    readonly headerValue: string;

    /**
     * @throws InvalidArgumentError when either part is null, undefined or empty
     */
    constructor(headerName: string | null | undefined, headerValue: string | null | undefined) {
        if (!isPresent(headerName) || !isPresent(headerValue)) {
            throw new InvalidArgumentError('Header name and value must not be null or empty.');
        }
        this.headerName = headerName;
        this.headerValue = headerValue;
        Object.freeze(this);
    }

    toString(): string {
        return `${this.headerName}: ${this.headerValue}`;
    }
}

/**
 * HeaderMismatch - the terminal 403 a failed validation turns into.
 * A value, not an exception: the inbound pipeline answers with it instead of
 * running the route.
 */
export class HeaderMismatch {
    readonly statusCode = 403;
    readonly contentType = MediaType.TEXT_PLAIN;

    constructor(
        readonly rule: HeaderRule,
        readonly actualValue: string | undefined,
    ) {}

    get message(): string {
        return `Expected header '${this.rule.headerName}' not present or value not equal to '${this.rule.headerValue}'`;
    }
}

/**
 * Sets the rule's header on an outgoing request, overwriting any previous value.
 * Applying it twice leaves exactly one entry.
 */
export function injectHeader(rule: HeaderRule, headers: OutboundHeaders): void {
    headers.putSingle(rule.headerName, rule.headerValue);
}

/**
 * Checks an incoming request against the rule. The value must match exactly:
 * case-sensitive, no trimming. Returns undefined when the request may proceed.
 */
export function validateHeader(rule: HeaderRule, headers: InboundHeaders): HeaderMismatch | undefined {
    const actual = headers.getHeaderString(rule.headerName);
    if (actual === rule.headerValue) {
        return undefined;
    }
    return new HeaderMismatch(rule, actual);
}
