/**
 * In-process stand-in for a telnet device, used by the tests
 */

import { Duplex } from 'stream';
import type { Transport, TransportFactory } from './transport';

type Reply = string | number[] | Buffer | (() => void);

interface ScriptStep {
    match: string;
    reply: Reply;
}

function toBuffer(data: string | number[] | Buffer): Buffer {
    if (typeof data === 'string') {
        return Buffer.from(data, 'utf8');
    }
    return Buffer.isBuffer(data) ? data : Buffer.from(data);
}

export class FakePeer {
    public readonly stream: Duplex;
    /** Every chunk the session wrote, in order */
    public readonly writes: Buffer[] = [];
    public closeCount = 0;
    public openCount = 0;
    private script: ScriptStep[] = [];

    constructor() {
        this.stream = new Duplex({
            read: () => undefined,
            write: (chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) => {
                this.onWrite(chunk);
                callback();
            },
        });
    }

    readonly factory: TransportFactory = async () => {
        this.openCount++;
        return this.transport();
    };

    transport(): Transport {
        return {
            stream: this.stream,
            close: async () => {
                this.closeCount++;
                this.stream.destroy();
            },
        };
    }

    /** Sends bytes to the session */
    send(data: string | number[] | Buffer): this {
        this.stream.push(toBuffer(data));
        return this;
    }

    /** Closes the device side of the stream */
    end(): void {
        this.stream.push(null);
    }

    /**
     * Queues a reply for the next write that contains `match`.
     * Steps are consumed in order.
     */
    expect(match: string | number[], reply: Reply): this {
        const text = typeof match === 'string' ? match : Buffer.from(match).toString('latin1');
        this.script.push({ match: text, reply });
        return this;
    }

    get writtenText(): string {
        return Buffer.concat(this.writes).toString('utf8');
    }

    writtenStrings(): string[] {
        return this.writes.map((chunk) => chunk.toString('utf8'));
    }

    private onWrite(chunk: Buffer): void {
        this.writes.push(Buffer.from(chunk));
        const step = this.script[0];
        if (!step || !chunk.toString('latin1').includes(step.match)) {
            return;
        }
        this.script.shift();
        if (typeof step.reply === 'function') {
            step.reply();
        } else {
            this.send(step.reply);
        }
    }
}
