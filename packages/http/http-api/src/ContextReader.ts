import { PlatformHeader } from './PlatformHeader';

/**
 * ContextReader - where a managed client reads platform header values from.
 *
 * - RequestContextReader (http-routing): the active server RequestContext
 * - StaticContextReader (http-client): a fixed map, for scripts and tests
 *
 * Declared here so http-routing and http-client can both implement it without
 * depending on each other.
 */
export interface ContextReader {
    read(header: PlatformHeader): string | undefined;
}
