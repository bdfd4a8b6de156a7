const INITIAL_CAPACITY = 4096;

/**
 * Append-only record of every byte sent to or received from the peer.
 * Never cleared for the lifetime of a session.
 */
export class Transcript {
    private data: Buffer = Buffer.alloc(INITIAL_CAPACITY);
    private size = 0;

    append(chunk: Buffer | string | number): void {
        if (typeof chunk === 'number') {
            this.reserve(1);
            this.data[this.size++] = chunk & 0xff;
            return;
        }

        const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
        this.reserve(bytes.length);
        bytes.copy(this.data, this.size);
        this.size += bytes.length;
    }

    get length(): number {
        return this.size;
    }

    toBuffer(): Buffer {
        return Buffer.from(this.data.subarray(0, this.size));
    }

    // Display form only: invalid UTF-8 sequences become U+FFFD.
    toString(): string {
        return this.data.toString('utf8', 0, this.size);
    }

    private reserve(extra: number): void {
        const needed = this.size + extra;
        if (needed <= this.data.length) {
            return;
        }
        let capacity = this.data.length * 2;
        while (capacity < needed) {
            capacity *= 2;
        }
        const next = Buffer.alloc(capacity);
        this.data.copy(next, 0, 0, this.size);
        this.data = next;
    }
}
