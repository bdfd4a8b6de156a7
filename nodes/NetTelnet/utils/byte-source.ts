import type { Duplex } from 'stream';
import { LoggerProxy as Logger } from 'n8n-workflow';
import { Transcript } from './transcript';

export type EndReason = 'closed' | 'idle';

export type ReadResult =
    | { kind: 'byte'; byte: number }
    | { kind: 'end'; reason: EndReason };

interface PendingRead {
    resolve: (result: ReadResult) => void;
    timer: NodeJS.Timeout;
}

const CLOSED: ReadResult = { kind: 'end', reason: 'closed' };
const IDLE: ReadResult = { kind: 'end', reason: 'idle' };

// Pause the stream once this many unread bytes are queued
const HIGH_WATER_MARK = 64 * 1024;

/**
 * Hands out the bytes of a duplex stream one at a time.
 *
 * Every read is bounded by the per-read timeout; a read that times out
 * resolves with an `idle` end result instead of rejecting. Each byte handed
 * out is recorded in the transcript, control bytes included.
 */
export class ByteSource {
    private queue: Buffer[] = [];
    private offset = 0;
    private queued = 0;
    private ended = false;
    private pending: PendingRead | null = null;
    private readTimeout: number;

    constructor(
        private readonly stream: Duplex,
        private readonly transcript: Transcript,
        readTimeout: number,
    ) {
        this.readTimeout = readTimeout;
        stream.on('data', this.onData);
        stream.on('end', this.onEnd);
        stream.on('close', this.onEnd);
        stream.on('error', this.onError);
    }

    setReadTimeout(timeout: number): void {
        this.readTimeout = timeout;
    }

    get isEnded(): boolean {
        return this.ended && this.queued === 0;
    }

    nextByte(): Promise<ReadResult> {
        if (this.pending) {
            return Promise.reject(new Error('ByteSource: a read is already pending'));
        }

        const byte = this.take();
        if (byte !== undefined) {
            return Promise.resolve({ kind: 'byte', byte });
        }
        if (this.ended) {
            return Promise.resolve(CLOSED);
        }

        return new Promise<ReadResult>((resolve) => {
            const timer = setTimeout(() => {
                this.pending = null;
                resolve(IDLE);
            }, this.readTimeout);
            this.pending = { resolve, timer };
        });
    }

    /**
     * Hands out every byte already queued, without waiting for more.
     */
    drainQueued(): number[] {
        const bytes: number[] = [];
        for (let byte = this.take(); byte !== undefined; byte = this.take()) {
            bytes.push(byte);
        }
        return bytes;
    }

    /**
     * Stops reading from the stream and settles a pending read as closed.
     * The error listener stays, since the stream may still fail while it closes.
     */
    detach(): void {
        this.stream.off('data', this.onData);
        this.stream.off('end', this.onEnd);
        this.stream.off('close', this.onEnd);
        this.ended = true;
        this.settle(CLOSED);
    }

    private take(): number | undefined {
        const head = this.queue[0];
        if (head === undefined) {
            return undefined;
        }

        const byte = head[this.offset++];
        this.queued--;
        if (this.offset >= head.length) {
            this.queue.shift();
            this.offset = 0;
        }
        if (this.stream.isPaused() && this.queued < HIGH_WATER_MARK) {
            this.stream.resume();
        }

        this.transcript.append(byte);
        return byte;
    }

    private settle(result: ReadResult): void {
        const pending = this.pending;
        if (!pending) {
            return;
        }
        this.pending = null;
        clearTimeout(pending.timer);
        pending.resolve(result);
    }

    private readonly onData = (chunk: Buffer | string): void => {
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
        if (bytes.length === 0) {
            return;
        }
        this.queue.push(bytes);
        this.queued += bytes.length;
        if (this.queued >= HIGH_WATER_MARK) {
            this.stream.pause();
        }

        if (this.pending) {
            const byte = this.take();
            if (byte !== undefined) {
                this.settle({ kind: 'byte', byte });
            }
        }
    };

    private readonly onEnd = (): void => {
        if (this.ended) {
            return;
        }
        this.ended = true;
        if (this.queued === 0) {
            this.settle(CLOSED);
        }
    };

    private readonly onError = (error: Error): void => {
        Logger.warn('Telnet stream error', { error: error.message });
        this.onEnd();
    };
}
