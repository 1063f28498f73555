import { HeaderMethods } from '../HeaderMethods';
import { PlatformHeader } from '../PlatformHeader';
import { PlatformHeadersExtension } from '../PlatformHeadersExtension';

describe('HeaderMethods', () => {
    const headerMethods = new HeaderMethods();
    const requestId = new PlatformHeader('X-Request-Id');
    const apiKey = new PlatformHeader('x-api-key', true, true);
    const localOnly = new PlatformHeader('x-debug', false);

    describe('maskSecureValue', () => {
        it('hides values under 8 characters entirely', () => {
            expect(headerMethods.maskSecureValue('secret')).toBe('<secure key too short to log>');
        });

        it('keeps the first 2 characters of values up to 15', () => {
            expect(headerMethods.maskSecureValue('test-secret')).toBe('te...');
        });

        it('keeps first and last 3 characters of longer values', () => {
            expect(headerMethods.maskSecureValue('test-secret-value-1')).toBe('tes...e-1');
        });
    });

    it('lowercases platform header names', () => {
        expect(requestId.getHeaderName()).toBe('x-request-id');
    });

    it('describes a platform header by its name and two flags', () => {
        expect(apiKey).toEqual({ headerName: 'x-api-key', isWantTransferred: true, isSecured: true });
        expect(localOnly).toEqual({ headerName: 'x-debug', isWantTransferred: false, isSecured: false });
    });

    it('finds transfer and secured headers', () => {
        const all = PlatformHeadersExtension.flatten([
            new PlatformHeadersExtension([requestId]),
            new PlatformHeadersExtension([apiKey, localOnly]),
        ]);

        expect(headerMethods.findTransferHeaders(all)).toEqual([requestId, apiKey]);
        expect(headerMethods.secureHeaders(all)).toEqual([apiKey]);
    });

    it('formats every request header for logging', () => {
        const headerMap = new Map<string, string[]>([
            ['custom-header', ['a']],
            ['accept', ['text/plain', 'application/json']],
            ['X-Api-Key', ['test-secret']],
            ['empty', []],
        ]);

        const result = headerMethods.formatHeadersForLogging(headerMap, [requestId, apiKey]);

        expect(result).toEqual({
            'custom-header': 'a',
            accept: 'text/plain, application/json',
            'X-Api-Key': 'te...',
        });
    });
});
