import { StringDecoder } from 'string_decoder';

/**
 * Output received since the last command was sent.
 *
 * Bytes are decoded as UTF-8 as they arrive; a multi-byte character shows up
 * in `text` once its last byte has been appended.
 */
export class CommandBuffer {
    private decoder = new StringDecoder('utf8');
    private content = '';
    private pageStart = 0;

    get text(): string {
        return this.content;
    }

    get length(): number {
        return this.content.length;
    }

    append(byte: number): void {
        this.content += this.decoder.write(Buffer.of(byte));
    }

    clear(): void {
        this.decoder = new StringDecoder('utf8');
        this.content = '';
        this.pageStart = 0;
    }

    /**
     * Last `window` characters, the part a prompt pattern is tested against.
     */
    tail(window: number): string {
        return this.content.length > window ? this.content.slice(-window) : this.content;
    }

    /**
     * Text received since the last pagination continuation.
     */
    currentPage(window: number): string {
        const start = Math.max(this.pageStart, this.content.length - window);
        return this.content.slice(start);
    }

    markPage(): void {
        this.pageStart = this.content.length;
    }
}
