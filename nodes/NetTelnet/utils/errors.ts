export type TelnetErrorKind = 'transport' | 'protocol' | 'timeout' | 'login' | 'usage';

/**
 * Base class of every error the telnet session raises.
 * `kind` lets callers branch on the failure without `instanceof` chains.
 */
export abstract class TelnetError extends Error {
    abstract readonly kind: TelnetErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Connection refused, name resolution, write failure or use of a closed session. */
export class TransportError extends TelnetError {
    readonly kind = 'transport' as const;
}

export interface ProtocolViolationContext {
    pattern?: string;
    partialBuffer?: string;
}

/** The peer sent a control sequence this session does not understand. */
export class ProtocolViolationError extends TelnetError {
    readonly kind = 'protocol' as const;
    readonly pattern?: string;
    /** What had been read into the command buffer when the violation was found */
    readonly partialBuffer?: string;

    constructor(message: string, public readonly byte?: number, context: ProtocolViolationContext = {}) {
        super(message);
        this.pattern = context.pattern;
        this.partialBuffer = context.partialBuffer;
    }
}

export type PromptTimeoutReason = 'deadline' | 'closed';

export interface PromptTimeoutDetails {
    pattern: string;
    timeoutMs: number;
    partialBuffer: string;
    reason: PromptTimeoutReason;
}

/**
 * The prompt did not show up in time, or the peer went away first.
 * `partialBuffer` holds what had been read before the command buffer was cleared.
 */
export class PromptTimeoutError extends TelnetError {
    readonly kind = 'timeout' as const;
    readonly pattern: string;
    readonly timeoutMs: number;
    readonly partialBuffer: string;
    readonly reason: PromptTimeoutReason;

    constructor(message: string, details: PromptTimeoutDetails) {
        super(message);
        this.pattern = details.pattern;
        this.timeoutMs = details.timeoutMs;
        this.partialBuffer = details.partialBuffer;
        this.reason = details.reason;
    }
}

export class LoginFailedError extends TelnetError {
    readonly kind = 'login' as const;

    constructor() {
        super('Login failed.');
    }
}

export class ConcurrentOperationError extends TelnetError {
    readonly kind = 'usage' as const;

    constructor(operation: string, active: string) {
        super(`Cannot start "${operation}" while "${active}" is still running on this session`);
    }
}

export class UnknownDeviceTypeError extends TelnetError {
    readonly kind = 'usage' as const;

    constructor(deviceType: string, supported: string[]) {
        super(`Unsupported device type: ${deviceType}. Supported types: ${supported.join(', ')}`);
    }
}

export function isTelnetError(value: unknown, kind?: TelnetErrorKind): value is TelnetError {
    return value instanceof TelnetError && (kind === undefined || value.kind === kind);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
