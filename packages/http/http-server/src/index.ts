export type { Server } from './Server';
export { ServerImpl } from './ServerImpl';
export { ServerFactory } from './ServerFactory';
export { ServerMiddleware, ExpressWrapper } from './ServerMiddleware';
export { ResponseEncoder, EncodedResponse, decodeRequestBody } from './ResponseEncoder';
export { InProcessConnector } from './InProcessConnector';
export { HeaderRuleRoutes, HEADER_RULE_PRIORITY } from './HeaderRuleRoutes';

// Filters
export { ContextFilter } from './filters/ContextFilter';
export { LogApiFilter } from './filters/LogApiFilter';
export { RequireHeaderFilter } from './filters/RequireHeaderFilter';

// Platform headers
export { CoreModule } from './modules/CoreModule';
export { CoreHeaders } from './headers/CoreHeaders';
