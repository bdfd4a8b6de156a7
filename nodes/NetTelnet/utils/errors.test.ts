import {
    ConcurrentOperationError,
    errorMessage,
    isTelnetError,
    LoginFailedError,
    PromptTimeoutError,
    TransportError,
    UnknownDeviceTypeError,
} from './errors';

describe('telnet errors', () => {
    it('name themselves after their class', () => {
        expect(new TransportError('Cannot resolve router1').name).toBe('TransportError');
        expect(new LoginFailedError().name).toBe('LoginFailedError');
    });

    it('carry the wait details on a prompt timeout', () => {
        const error = new PromptTimeoutError('late', {
            pattern: 'router#',
            timeoutMs: 500,
            partialBuffer: 'show',
            reason: 'deadline',
        });

        expect(error).toBeInstanceOf(Error);
        expect(error).toMatchObject({ kind: 'timeout', pattern: 'router#', timeoutMs: 500, partialBuffer: 'show' });
    });

    it('does not expose a cause on login failure', () => {
        expect(new LoginFailedError().cause).toBeUndefined();
    });

    it('narrows by kind', () => {
        const usage = new ConcurrentOperationError('write', 'exec');

        expect(isTelnetError(usage)).toBe(true);
        expect(isTelnetError(usage, 'usage')).toBe(true);
        expect(isTelnetError(usage, 'transport')).toBe(false);
        expect(isTelnetError(new Error('plain'))).toBe(false);
        expect(usage.message).toBe('Cannot start "write" while "exec" is still running on this session');
    });

    it('lists the supported device types', () => {
        expect(new UnknownDeviceTypeError('acme', ['ios', 'junos']).message).toBe(
            'Unsupported device type: acme. Supported types: ios, junos',
        );
    });

    it('reads a message from anything thrown', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain text')).toBe('plain text');
    });
});
