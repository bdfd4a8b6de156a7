import { LoggerProxy as Logger } from 'n8n-workflow';
import type { ReadResult } from './byte-source';
import { describeByte, TELNET } from './telnet-protocol';

export type ByteReader = () => Promise<ReadResult>;
export type ByteWriter = (bytes: Buffer) => Promise<void>;

export type NegotiationResult =
    | { kind: 'handled'; reply: Buffer }
    | { kind: 'violation'; byte: number; message: string }
    | { kind: 'end' };

export type WindowSizeResult =
    | { kind: 'accepted' }
    | { kind: 'refused'; message: string }
    | { kind: 'violation'; byte: number; message: string }
    | { kind: 'end' };

function unknownControlByte(byte: number): { kind: 'violation'; byte: number; message: string } {
    return { kind: 'violation', byte, message: `Unknown control byte ${byte} (${describeByte(byte)})` };
}

/**
 * Answers the request that follows an IAC the peer just sent.
 *
 * The session claims no option: DO/DONT get WONT, WILL/WONT get DONT.
 * Anything else after IAC, IAC itself included, is a protocol violation.
 */
export async function negotiate(read: ByteReader, write: ByteWriter): Promise<NegotiationResult> {
    const command = await read();
    if (command.kind === 'end') {
        return { kind: 'end' };
    }

    let answer: number;
    switch (command.byte) {
        case TELNET.DO:
        case TELNET.DONT:
            answer = TELNET.WONT;
            break;
        case TELNET.WILL:
        case TELNET.WONT:
            answer = TELNET.DONT;
            break;
        default:
            return unknownControlByte(command.byte);
    }

    const option = await read();
    if (option.kind === 'end') {
        return { kind: 'end' };
    }

    const reply = Buffer.from([TELNET.IAC, answer, option.byte]);
    Logger.debug('Telnet option negotiation', {
        request: describeByte(command.byte),
        option: option.byte,
        reply: describeByte(answer),
    });
    await write(reply);
    return { kind: 'handled', reply };
}

/**
 * Builds `IAC SB NAWS 0 <width> 0 <height> IAC SE`.
 * A 255 in the payload is sent as `IAC IAC`.
 */
export function encodeWindowSize(width: number, height: number): Buffer {
    for (const [name, value] of [['width', width], ['height', height]] as const) {
        if (!Number.isInteger(value) || value < 0 || value > 0xff) {
            throw new RangeError(`Window ${name} must be an integer between 0 and 255, got ${value}`);
        }
    }
    const payload = [0, width, 0, height].flatMap((byte) => (byte === TELNET.IAC ? [TELNET.IAC, TELNET.IAC] : [byte]));
    return Buffer.from([TELNET.IAC, TELNET.SB, TELNET.NAWS, ...payload, TELNET.IAC, TELNET.SE]);
}

/**
 * Offers NAWS to the peer and, once accepted, sends the window size.
 */
export async function negotiateWindowSize(
    read: ByteReader,
    write: ByteWriter,
    width: number,
    height: number,
): Promise<WindowSizeResult> {
    const subnegotiation = encodeWindowSize(width, height);

    await write(Buffer.from([TELNET.IAC, TELNET.WILL, TELNET.NAWS]));

    const escape = await read();
    if (escape.kind === 'end') {
        return { kind: 'end' };
    }
    if (escape.byte !== TELNET.IAC) {
        return unknownControlByte(escape.byte);
    }

    const answer = await read();
    if (answer.kind === 'end') {
        return { kind: 'end' };
    }
    const refused = answer.byte === TELNET.DONT || answer.byte === TELNET.WONT;
    if (!refused && answer.byte !== TELNET.DO && answer.byte !== TELNET.WILL) {
        return unknownControlByte(answer.byte);
    }

    // The option byte that closes the peer's answer
    const option = await read();
    if (option.kind === 'end') {
        return { kind: 'end' };
    }
    if (refused) {
        return { kind: 'refused', message: 'Peer refuses window sizing (NAWS)' };
    }

    await write(subnegotiation);
    Logger.debug('Telnet window size sent', { width, height });
    return { kind: 'accepted' };
}
