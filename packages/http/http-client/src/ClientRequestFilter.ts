import { HeaderRule, injectHeader } from '@tollgate/http-api';
import { ClientRequestContext } from './ClientRequestContext';

/**
 * ClientRequestFilter - mutates an outgoing request before it is sent.
 * Registered per client on ClientConfig; filters run in registration order.
 */
export interface ClientRequestFilter {
    filter(request: ClientRequestContext): void | Promise<void>;
}

/**
 * InjectHeaderFilter - sets one header rule on every request of a client.
 * Holds only the immutable rule, so one instance can serve several clients.
 */
export class InjectHeaderFilter implements ClientRequestFilter {
    constructor(readonly rule: HeaderRule) {}

    filter(request: ClientRequestContext): void {
        injectHeader(this.rule, request);
    }
}
