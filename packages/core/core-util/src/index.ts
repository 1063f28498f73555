/**
 * @tollgate/core-util
 *
 * Dependency-free helpers shared by every other tollgate package.
 *
 * @packageDocumentation
 */

export { toError } from './lib/errorUtils';
export type { Header } from './Header';
