import { OutboundHeaders } from '@tollgate/http-api';

/**
 * ClientRequestContext - an outgoing request as client filters see it.
 *
 * Header names are case-insensitive and stored lowercase. A header may carry
 * several values; putSingle replaces them all.
 */
export class ClientRequestContext implements OutboundHeaders {
    private headers: Map<string, string[]> = new Map();

    constructor(
        readonly method: string,
        readonly uri: string,
        readonly body?: string,
    ) {}

    putSingle(name: string, value: string): void {
        this.headers.set(name.toLowerCase(), [value]);
    }

    add(name: string, value: string): void {
        const key = name.toLowerCase();
        this.headers.set(key, [...(this.headers.get(key) ?? []), value]);
    }

    /**
     * All values joined with ', ', or undefined when the header is not set.
     */
    getHeaderString(name: string): string | undefined {
        const values = this.headers.get(name.toLowerCase());
        return values && values.length > 0 ? values.join(', ') : undefined;
    }

    getHeaderValues(name: string): string[] {
        return [...(this.headers.get(name.toLowerCase()) ?? [])];
    }

    remove(name: string): void {
        this.headers.delete(name.toLowerCase());
    }

    headerNames(): string[] {
        return [...this.headers.keys()];
    }

    /**
     * Copy of the header map, name -> values.
     */
    headerMap(): Map<string, string[]> {
        const copy = new Map<string, string[]>();
        for (const [name, values] of this.headers) {
            copy.set(name, [...values]);
        }
        return copy;
    }

    /**
     * One string per header, repeated values joined with ', ' as on the wire.
     */
    toRecord(): Record<string, string> {
        const record: Record<string, string> = {};
        for (const [name, values] of this.headers) {
            record[name] = values.join(', ');
        }
        return record;
    }
}
