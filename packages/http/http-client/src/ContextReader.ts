import { PlatformHeader, ContextReader } from '@tollgate/http-api';

/**
 * StaticContextReader - header values from a fixed map keyed by lowercase name.
 * For scripts and tests that run outside a request.
 */
export class StaticContextReader implements ContextReader {
    constructor(private headers: Map<string, string>) {}

    read(header: PlatformHeader): string | undefined {
        return this.headers.get(header.headerName);
    }
}

