/**
 * @tollgate/http-client
 *
 * Named managed clients: a registry maps name → (base URI, outbound filters),
 * route handlers look clients up by name and call relative paths on them.
 */

export { ClientConfig, ManagedClientDefinition } from './ClientConfig';
export { ManagedClientRegistry } from './ManagedClientRegistry';
export { ManagedClient, ClientTarget, InvocationBuilder, Invocation, joinPath } from './ManagedClient';
export { ClientRequestContext } from './ClientRequestContext';
export { InjectHeaderFilter } from './ClientRequestFilter';
export type { ClientRequestFilter } from './ClientRequestFilter';
export { ClientResponse } from './ClientResponse';
export { ConnectorRequest, FetchConnector } from './HttpConnector';
export type { HttpConnector } from './HttpConnector';
export { ClientErrorTranslator } from './ClientErrorTranslator';

// Context management for header propagation
export { StaticContextReader } from './ContextReader';
export { ContextMgr } from './ContextMgr';
