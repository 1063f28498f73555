import { ClientRequestContext } from '../ClientRequestContext';

describe('ClientRequestContext', () => {
    it('treats header names case-insensitively', () => {
        const request = new ClientRequestContext('GET', 'http://127.0.0.1:8200/internal/a');
        request.add('Custom-Header', 'a');

        expect(request.getHeaderString('custom-header')).toBe('a');
        expect(request.getHeaderString('CUSTOM-HEADER')).toBe('a');
        expect(request.headerNames()).toEqual(['custom-header']);
    });

    it('keeps repeated values and joins them', () => {
        const request = new ClientRequestContext('GET', '/a');
        request.add('accept', 'text/plain');
        request.add('Accept', 'application/json');

        expect(request.getHeaderValues('accept')).toEqual(['text/plain', 'application/json']);
        expect(request.getHeaderString('accept')).toBe('text/plain, application/json');
        expect(request.toRecord()).toEqual({ accept: 'text/plain, application/json' });
    });

    it('replaces every value on putSingle', () => {
        const request = new ClientRequestContext('GET', '/a');
        request.add('custom-header', 'b');
        request.add('Custom-Header', 'c');

        request.putSingle('CUSTOM-header', 'a');

        expect(request.getHeaderValues('custom-header')).toEqual(['a']);
    });

    it('removes headers and reports absent ones as undefined', () => {
        const request = new ClientRequestContext('GET', '/a');
        request.putSingle('custom-header', 'a');

        request.remove('Custom-Header');

        expect(request.getHeaderString('custom-header')).toBeUndefined();
        expect(request.getHeaderValues('custom-header')).toEqual([]);
        expect(request.headerNames()).toEqual([]);
    });

    it('hands out copies of the header map', () => {
        const request = new ClientRequestContext('GET', '/a');
        request.putSingle('custom-header', 'a');

        request.headerMap().get('custom-header')?.push('changed');

        expect(request.getHeaderValues('custom-header')).toEqual(['a']);
    });
});
