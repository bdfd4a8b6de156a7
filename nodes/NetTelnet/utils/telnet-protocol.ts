// Telnet protocol bytes (RFC 854 / RFC 1073)
export const TELNET = Object.freeze({
    NULL: 0,
    DC1: 17,
    NAWS: 31,
    SE: 240,
    SB: 250,
    WILL: 251,
    WONT: 252,
    DO: 253,
    DONT: 254,
    IAC: 255,
} as const);

export type TelnetCode = (typeof TELNET)[keyof typeof TELNET];

const CODE_NAMES: { [byte: number]: string } = {
    [TELNET.SE]: 'SE',
    [TELNET.SB]: 'SB',
    [TELNET.WILL]: 'WILL',
    [TELNET.WONT]: 'WONT',
    [TELNET.DO]: 'DO',
    [TELNET.DONT]: 'DONT',
    [TELNET.IAC]: 'IAC',
};

export function describeByte(byte: number): string {
    return CODE_NAMES[byte] ?? String(byte);
}

/**
 * Markers a device prints when it holds back output until a key is pressed.
 */
export const DEFAULT_PAGINATION_MARKERS: readonly string[] = Object.freeze([
    '--- more ---',
    '--More--',
    '  --Press any key to continue Ctrl+c to stop-- ',
    "--More ( Press 'Q' to quit )--",
]);
