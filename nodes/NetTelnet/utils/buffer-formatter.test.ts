import { formatBuffer, normalizeLineEndings } from './buffer-formatter';

describe('normalizeLineEndings', () => {
    it('turns every line break variant into a single newline', () => {
        expect(normalizeLineEndings('a\n\rb\r\nc\rd\ne')).toBe('a\nb\nc\nd\ne');
    });

    it('replaces the variants one after another', () => {
        expect(normalizeLineEndings('a\r\n\rb')).toBe('a\nb');
        expect(normalizeLineEndings('a\n\r\nb')).toBe('a\n\nb');
    });

    it('leaves text without line breaks alone', () => {
        expect(normalizeLineEndings('router#')).toBe('router#');
    });
});

describe('formatBuffer', () => {
    it('drops the prompt line when stripping', () => {
        expect(formatBuffer('show version\r\nIOS 15.2\r\nrouter#', true)).toBe('show version\nIOS 15.2');
    });

    it('keeps the prompt line when not stripping', () => {
        expect(formatBuffer('show version\r\nIOS 15.2\r\nrouter#', false)).toBe('show version\nIOS 15.2\nrouter#');
    });

    it('returns an empty string for a single line when stripping', () => {
        expect(formatBuffer('router#', true)).toBe('');
    });

    it('trims surrounding whitespace', () => {
        expect(formatBuffer('\r\n  output  \r\n', false)).toBe('output');
    });

    it('handles an empty buffer', () => {
        expect(formatBuffer('', true)).toBe('');
        expect(formatBuffer('', false)).toBe('');
    });

    it('gives the same result when applied twice without stripping', () => {
        for (const sample of ['a\r\nb\r\n', '  x\n\ry  ', 'line1\rline2\rprompt>', '']) {
            const once = formatBuffer(sample, false);
            expect(formatBuffer(once, false)).toBe(once);
        }
    });
});
