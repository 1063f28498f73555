import { AsyncLocalStorage } from 'async_hooks';
import type { Header } from '@tollgate/core-util';

const HEADER_PREFIX = 'HEADER_';

/**
 * Request-scoped storage on top of AsyncLocalStorage, in the spirit of a logging MDC.
 *
 * ExpressWrapper and InProcessConnector open a context per request with run().
 * Filters, controllers and managed clients read and write it from anywhere in
 * the async call chain of that request:
 * ```typescript
 * await RequestContext.run(async () => {
 *     RequestContext.putHeader(CoreHeaders.REQUEST_ID, 'req-1');
 *     await clients.target('clientA', 'a').request().get(); // x-request-id travels along
 * });
 * ```
 */
class RequestContextImpl {
    private storage = new AsyncLocalStorage<Map<string, unknown>>();

    /**
     * Run fn inside a fresh, empty context. Nested calls shadow the outer context
     * until fn settles.
     */
    run<T>(fn: () => T): T {
        return this.storage.run(new Map<string, unknown>(), fn);
    }

    put(key: string, value: unknown): void {
        const store = this.storage.getStore();
        if (!store) {
            throw new Error('No RequestContext available. Did you call RequestContext.run() first?');
        }
        store.set(key, value);
    }

    get(key: string): unknown {
        return this.storage.getStore()?.get(key);
    }

    has(key: string): boolean {
        return this.storage.getStore()?.has(key) ?? false;
    }

    remove(key: string): void {
        this.storage.getStore()?.delete(key);
    }

    clear(): void {
        this.storage.getStore()?.clear();
    }

    /**
     * True inside a run() block.
     */
    isActive(): boolean {
        return this.storage.getStore() !== undefined;
    }

    putHeader(header: Header, value: string): void {
        this.put(HEADER_PREFIX + header.getHeaderName(), value);
    }

    getHeader(header: Header): string | undefined {
        const value = this.get(HEADER_PREFIX + header.getHeaderName());
        return typeof value === 'string' ? value : undefined;
    }

    hasHeader(header: Header): boolean {
        return this.has(HEADER_PREFIX + header.getHeaderName());
    }

    /**
     * All headers stored through putHeader(), keyed by header name.
     */
    getAllHeaders(): Map<string, string> {
        const headers = new Map<string, string>();
        const store = this.storage.getStore();
        if (!store) {
            return headers;
        }

        for (const [key, value] of store.entries()) {
            if (key.startsWith(HEADER_PREFIX) && typeof value === 'string') {
                headers.set(key.substring(HEADER_PREFIX.length), value);
            }
        }
        return headers;
    }
}

export const RequestContext = new RequestContextImpl();
