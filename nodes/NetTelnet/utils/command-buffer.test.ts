import { CommandBuffer } from './command-buffer';

function appendText(buffer: CommandBuffer, text: string): void {
    for (const byte of Buffer.from(text, 'utf8')) {
        buffer.append(byte);
    }
}

describe('CommandBuffer', () => {
    it('decodes multi-byte characters once complete', () => {
        const buffer = new CommandBuffer();
        buffer.append(0xc3);
        expect(buffer.text).toBe('');

        buffer.append(0xa9);
        expect(buffer.text).toBe('é');
    });

    it('clears text and a half-received character', () => {
        const buffer = new CommandBuffer();
        appendText(buffer, 'abc');
        buffer.append(0xc3);
        buffer.clear();
        appendText(buffer, 'd');

        expect(buffer.text).toBe('d');
        expect(buffer.length).toBe(1);
    });

    it('returns the last characters with tail', () => {
        const buffer = new CommandBuffer();
        appendText(buffer, 'hello router#');

        expect(buffer.tail(7)).toBe('router#');
        expect(buffer.tail(100)).toBe('hello router#');
    });

    it('limits the current page to text after the last mark', () => {
        const buffer = new CommandBuffer();
        appendText(buffer, 'line1 --More--');
        buffer.markPage();
        appendText(buffer, 'line2');

        expect(buffer.currentPage(4096)).toBe('line2');
        expect(buffer.currentPage(3)).toBe('ne2');
    });

    it('resets the page mark on clear', () => {
        const buffer = new CommandBuffer();
        appendText(buffer, 'abc');
        buffer.markPage();
        buffer.clear();
        appendText(buffer, 'xy');

        expect(buffer.currentPage(4096)).toBe('xy');
    });
});
