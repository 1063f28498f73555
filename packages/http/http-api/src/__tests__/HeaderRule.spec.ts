import { HeaderRule, HeaderMismatch, injectHeader, validateHeader, InboundHeaders, OutboundHeaders } from '../HeaderRule';
import { InvalidArgumentError } from '../errors';

/**
 * Header bag keyed by lowercase name, standing in for MethodMeta and ClientRequestContext.
 */
class FakeHeaders implements InboundHeaders, OutboundHeaders {
    readonly values = new Map<string, string[]>();

    putSingle(name: string, value: string): void {
        this.values.set(name.toLowerCase(), [value]);
    }

    add(name: string, value: string): void {
        const key = name.toLowerCase();
        this.values.set(key, [...(this.values.get(key) ?? []), value]);
    }

    getHeaderString(name: string): string | undefined {
        return this.values.get(name.toLowerCase())?.join(', ');
    }
}

describe('HeaderRule', () => {
    describe('constructor', () => {
        it('keeps name and value as given', () => {
            const rule = new HeaderRule('custom-header', 'a');

            expect(rule.headerName).toBe('custom-header');
            expect(rule.headerValue).toBe('a');
            expect(rule.toString()).toBe('custom-header: a');
        });

        it.each([
            [null, 'a'],
            [undefined, 'a'],
            ['', 'a'],
            ['custom-header', null],
            ['custom-header', undefined],
            ['custom-header', ''],
        ])('rejects name=%p value=%p', (name, value) => {
            expect(() => new HeaderRule(name, value)).toThrow(InvalidArgumentError);
            expect(() => new HeaderRule(name, value)).toThrow('Header name and value must not be null or empty.');
        });

        it('is frozen', () => {
            const rule = new HeaderRule('custom-header', 'a');

            expect(Object.isFrozen(rule)).toBe(true);
        });
    });

    describe('injectHeader', () => {
        it('sets the header on an empty request', () => {
            const headers = new FakeHeaders();

            injectHeader(new HeaderRule('custom-header', 'a'), headers);

            expect(headers.values.get('custom-header')).toEqual(['a']);
        });

        it('overwrites earlier values and leaves one entry when applied twice', () => {
            const headers = new FakeHeaders();
            headers.add('Custom-Header', 'stale');
            headers.add('custom-header', 'older');
            const rule = new HeaderRule('custom-header', 'a');

            injectHeader(rule, headers);
            injectHeader(rule, headers);

            expect(headers.values.get('custom-header')).toEqual(['a']);
            expect(headers.values.size).toBe(1);
        });
    });

    describe('validateHeader', () => {
        const rule = new HeaderRule('custom-header', 'a');

        it('passes on an exact match', () => {
            const headers = new FakeHeaders();
            headers.putSingle('custom-header', 'a');

            expect(validateHeader(rule, headers)).toBeUndefined();
        });

        it('rejects a missing header with a 403 text/plain mismatch', () => {
            const mismatch = validateHeader(rule, new FakeHeaders());

            expect(mismatch).toBeInstanceOf(HeaderMismatch);
            expect(mismatch?.statusCode).toBe(403);
            expect(mismatch?.contentType).toBe('text/plain');
            expect(mismatch?.actualValue).toBeUndefined();
            expect(mismatch?.message).toBe("Expected header 'custom-header' not present or value not equal to 'a'");
        });

        it('rejects a different value', () => {
            const headers = new FakeHeaders();
            headers.putSingle('custom-header', 'b');

            const mismatch = validateHeader(rule, headers);

            expect(mismatch?.actualValue).toBe('b');
            expect(mismatch?.message).toBe("Expected header 'custom-header' not present or value not equal to 'a'");
        });

        it.each(['A', ' a', 'a '])('compares values exactly, rejecting %p', (value) => {
            const headers = new FakeHeaders();
            headers.putSingle('custom-header', value);

            expect(validateHeader(rule, headers)).toBeInstanceOf(HeaderMismatch);
        });

        it('rejects a header sent twice because the joined value differs', () => {
            const headers = new FakeHeaders();
            headers.add('custom-header', 'a');
            headers.add('custom-header', 'a');

            expect(validateHeader(rule, headers)?.actualValue).toBe('a,a');
        });
    });
});
