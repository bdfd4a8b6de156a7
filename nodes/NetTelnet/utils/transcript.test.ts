import { Transcript } from './transcript';

describe('Transcript', () => {
    it('records bytes, strings and buffers in order', () => {
        const transcript = new Transcript();
        transcript.append(0xff);
        transcript.append('ab');
        transcript.append(Buffer.from([1, 2]));

        expect([...transcript.toBuffer()]).toEqual([0xff, 0x61, 0x62, 1, 2]);
        expect(transcript.length).toBe(5);
    });

    it('grows past its initial capacity', () => {
        const transcript = new Transcript();
        transcript.append('x'.repeat(4000));
        transcript.append('y'.repeat(5000));

        expect(transcript.length).toBe(9000);
        const text = transcript.toString();
        expect(text.slice(3998, 4002)).toBe('xxyy');
        expect(text.endsWith('y')).toBe(true);
    });

    it('never shrinks', () => {
        const transcript = new Transcript();
        const lengths: number[] = [];
        for (const chunk of ['a', 'bc', '', 'def']) {
            transcript.append(chunk);
            lengths.push(transcript.length);
        }
        expect(lengths).toEqual([1, 3, 3, 6]);
    });

    it('returns a copy from toBuffer', () => {
        const transcript = new Transcript();
        transcript.append('abc');
        const copy = transcript.toBuffer();
        copy[0] = 0x7a;

        expect(transcript.toString()).toBe('abc');
    });

    it('shows invalid UTF-8 as replacement characters', () => {
        const transcript = new Transcript();
        transcript.append(0xff);
        transcript.append('a');

        expect(transcript.toString()).toBe('\uFFFDa');
    });
});
