/**
 * @tollgate/core-context
 *
 * AsyncLocalStorage backed request context (Node.js only).
 */
export { RequestContext } from './RequestContext';
