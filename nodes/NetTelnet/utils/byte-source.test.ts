import { PassThrough } from 'stream';
import { ByteSource } from './byte-source';
import { Transcript } from './transcript';

describe('ByteSource', () => {
    let stream: PassThrough;
    let transcript: Transcript;
    let source: ByteSource;

    beforeEach(() => {
        stream = new PassThrough();
        transcript = new Transcript();
        source = new ByteSource(stream, transcript, 50);
    });

    afterEach(() => {
        source.detach();
        stream.destroy();
    });

    it('hands out bytes in order and records them', async () => {
        stream.write(Buffer.from('ab'));

        expect(await source.nextByte()).toEqual({ kind: 'byte', byte: 0x61 });
        expect(await source.nextByte()).toEqual({ kind: 'byte', byte: 0x62 });
        expect(transcript.toString()).toBe('ab');
    });

    it('resolves a pending read when data arrives', async () => {
        const read = source.nextByte();
        stream.write(Buffer.from([7]));

        expect(await read).toEqual({ kind: 'byte', byte: 7 });
    });

    it('reports idle when nothing arrives within the read timeout', async () => {
        expect(await source.nextByte()).toEqual({ kind: 'end', reason: 'idle' });
        expect(source.isEnded).toBe(false);
    });

    it('drains queued bytes before reporting the stream closed', async () => {
        stream.end(Buffer.from('z'));

        expect(await source.nextByte()).toEqual({ kind: 'byte', byte: 0x7a });
        expect(await source.nextByte()).toEqual({ kind: 'end', reason: 'closed' });
        expect(source.isEnded).toBe(true);
    });

    it('refuses a second read while one is pending', async () => {
        const first = source.nextByte();

        await expect(source.nextByte()).rejects.toThrow('a read is already pending');
        stream.write(Buffer.from([1]));
        expect(await first).toEqual({ kind: 'byte', byte: 1 });
    });

    it('settles a pending read as closed on detach', async () => {
        const read = source.nextByte();
        source.detach();

        expect(await read).toEqual({ kind: 'end', reason: 'closed' });
    });

    it('drains the queued bytes without waiting', async () => {
        stream.write(Buffer.from('abc'));

        expect(await source.nextByte()).toEqual({ kind: 'byte', byte: 0x61 });
        expect(source.drainQueued()).toEqual([0x62, 0x63]);
        expect(source.drainQueued()).toEqual([]);
        expect(transcript.toString()).toBe('abc');
    });

    it('still handles stream errors after detach', () => {
        source.detach();

        expect(() => stream.emit('error', new Error('channel reset'))).not.toThrow();
    });

    it('waits for the new read timeout', async () => {
        source.setReadTimeout(200);
        const read = source.nextByte();
        setTimeout(() => stream.write(Buffer.from([9])), 100);

        expect(await read).toEqual({ kind: 'byte', byte: 9 });
    });
});
