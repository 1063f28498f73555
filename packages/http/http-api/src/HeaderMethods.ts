import { PlatformHeader } from './PlatformHeader';

/**
 * HeaderMethods - stateless helpers over platform header definitions.
 * Bound as a singleton on the server, instantiated directly by clients.
 */
export class HeaderMethods {
    /**
     * Headers with isWantTransferred=true.
     */
    findTransferHeaders(headers: PlatformHeader[]): PlatformHeader[] {
        return headers.filter((h) => h.isWantTransferred);
    }

    /**
     * Headers with isSecured=true.
     */
    secureHeaders(headers: PlatformHeader[]): PlatformHeader[] {
        return headers.filter((h) => h.isSecured);
    }

    /**
     * Every header of a request ready for logging. Multiple values are joined
     * with ', ' and the values of secured platform headers are masked.
     *
     * @param headerMap - header name -> values; names are matched case-insensitively
     */
    formatHeadersForLogging(
        headerMap: Map<string, string[]>,
        platformHeaders: PlatformHeader[],
    ): Record<string, string> {
        const secured = new Set(this.secureHeaders(platformHeaders).map((h) => h.headerName));
        const result: Record<string, string> = {};

        for (const [name, values] of headerMap) {
            if (values.length === 0) {
                continue;
            }
            const value = values.join(', ');
            result[name] = secured.has(name.toLowerCase()) ? this.maskSecureValue(value) : value;
        }

        return result;
    }

    /**
     * Masking by length:
     * - under 8 characters: '<secure key too short to log>'
     * - 8 to 15: first 2 characters + '...'
     * - over 15: first 3 + '...' + last 3
     */
    maskSecureValue(value: string): string {
        const len = value.length;

        if (len < 8) {
            return '<secure key too short to log>';
        } else if (len <= 15) {
            return `${value.substring(0, 2)}...`;
        } else {
            return `${value.substring(0, 3)}...${value.substring(len - 3)}`;
        }
    }
}
