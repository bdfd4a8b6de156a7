import { createConnection, Socket } from 'net';
import type { Duplex } from 'stream';
import { Client, ConnectConfig } from 'ssh2';
import { LoggerProxy as Logger } from 'n8n-workflow';
import { errorMessage, TransportError } from './errors';

export interface JumpHostConfig {
    host: string;
    port: number;
    username: string;
    authMethod: 'password' | 'privateKey';
    password?: string;
    privateKey?: string;
    passphrase?: string;
}

export interface TransportTarget {
    host: string;
    port: number;
    /** Connection timeout in milliseconds */
    timeout: number;
    keepAlive?: boolean;
    jumpHost?: JumpHostConfig;
}

/**
 * An open byte stream to the device. `close` is safe to call more than once.
 */
export interface Transport {
    readonly stream: Duplex;
    close(): Promise<void>;
}

export type TransportFactory = (target: TransportTarget) => Promise<Transport>;

const CLOSE_GRACE_PERIOD = 2000;

export function describeConnectError(error: NodeJS.ErrnoException, host: string, port: number): TransportError {
    if (error.code === 'ENOTFOUND' || error.code === 'EAI_AGAIN') {
        return new TransportError(`Cannot resolve ${host}`);
    }
    return new TransportError(`Cannot connect to ${host} on port ${port}: ${error.message}`);
}

/**
 * Ends the stream and waits for it to close, destroying it if the peer
 * does not finish the close in time.
 */
function closeStream(stream: Duplex): Promise<void> {
    return new Promise((resolve) => {
        if (stream.destroyed) {
            resolve();
            return;
        }
        const timer = setTimeout(() => {
            stream.destroy();
            resolve();
        }, CLOSE_GRACE_PERIOD);
        stream.once('close', () => {
            clearTimeout(timer);
            resolve();
        });
        stream.end();
    });
}

function once<T>(fn: () => Promise<T>): () => Promise<T> {
    let result: Promise<T> | null = null;
    return () => {
        if (!result) {
            result = fn();
        }
        return result;
    };
}

export function openTcpTransport(target: TransportTarget): Promise<Transport> {
    return new Promise((resolve, reject) => {
        Logger.debug('Opening telnet TCP connection', {
            host: target.host,
            port: target.port,
            timeout: target.timeout,
        });

        const socket: Socket = createConnection({ host: target.host, port: target.port });

        const timeoutId = setTimeout(() => {
            socket.destroy();
            reject(new TransportError(`Connection timeout after ${target.timeout}ms: ${target.host}:${target.port}`));
        }, target.timeout);

        socket.once('error', (error: NodeJS.ErrnoException) => {
            clearTimeout(timeoutId);
            Logger.error('Telnet TCP connection failed', {
                host: target.host,
                port: target.port,
                error: error.message,
                code: error.code,
            });
            reject(describeConnectError(error, target.host, target.port));
        });

        socket.once('connect', () => {
            clearTimeout(timeoutId);
            socket.setNoDelay(true);
            if (target.keepAlive) {
                socket.setKeepAlive(true, 30000);
            }
            Logger.info('Telnet TCP connection established', { host: target.host, port: target.port });
            resolve({ stream: socket, close: once(() => closeStream(socket)) });
        });
    });
}

/**
 * Normalizes a pasted private key: line endings, surrounding whitespace and
 * keys that lost their line breaks when pasted into a single-line field.
 */
export function formatPrivateKey(privateKey: string): string {
    const key = privateKey.trim().replace(/\r\n?/g, '\n');
    if (!key) {
        throw new Error('Private key is required');
    }

    const match = key.match(/^(-----BEGIN [A-Z ]+-----)([\s\S]*?)(-----END [A-Z ]+-----)$/);
    if (!match) {
        throw new Error('Private key must be enclosed in -----BEGIN and -----END markers');
    }

    const [, header, body, footer] = match;
    const lines = body.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
    // Single-line paste: re-wrap the base64 body at 64 columns
    if (lines.length === 1 && !lines[0].includes(':')) {
        const wrapped = lines[0].replace(/\s/g, '').match(/.{1,64}/g) ?? [];
        return [header, ...wrapped, footer].join('\n') + '\n';
    }
    return [header, ...lines, footer].join('\n') + '\n';
}

function buildJumpHostConfig(jumpHost: JumpHostConfig, timeout: number): ConnectConfig {
    const connectConfig: ConnectConfig = {
        host: jumpHost.host,
        port: jumpHost.port,
        username: jumpHost.username,
        readyTimeout: timeout,
    };

    if (jumpHost.authMethod === 'privateKey') {
        if (!jumpHost.privateKey) {
            throw new TransportError('Jump host SSH private key is required for private key authentication');
        }
        try {
            connectConfig.privateKey = formatPrivateKey(jumpHost.privateKey);
        } catch (keyError) {
            throw new TransportError(`Jump host SSH private key validation failed: ${errorMessage(keyError)}`);
        }
        if (jumpHost.passphrase && jumpHost.passphrase.trim() !== '') {
            connectConfig.passphrase = jumpHost.passphrase;
        }
        connectConfig.tryKeyboard = false;
    } else {
        if (!jumpHost.password) {
            throw new TransportError('Jump host password is required for password authentication');
        }
        connectConfig.password = jumpHost.password;
    }
    return connectConfig;
}

/**
 * Reaches the device through an SSH bastion: the telnet bytes travel in a
 * direct-tcpip channel opened on the jump host.
 */
export function openJumpHostTransport(target: TransportTarget): Promise<Transport> {
    const jumpHost = target.jumpHost;
    if (!jumpHost) {
        return Promise.reject(new TransportError('Jump host configuration is missing'));
    }

    let connectConfig: ConnectConfig;
    try {
        connectConfig = buildJumpHostConfig(jumpHost, target.timeout);
    } catch (error) {
        return Promise.reject(error);
    }

    return new Promise((resolve, reject) => {
        const client = new Client();
        const jumpHostLabel = `${jumpHost.host}:${jumpHost.port}`;

        Logger.debug('Connecting to jump host', {
            jumpHost: jumpHostLabel,
            username: jumpHost.username,
            authMethod: jumpHost.authMethod,
            hasPrivateKey: !!jumpHost.privateKey,
            hasPassphrase: !!jumpHost.passphrase,
            hasPassword: !!jumpHost.password,
        });

        let settled = false;
        const timeoutId = setTimeout(() => {
            settled = true;
            client.end();
            reject(new TransportError(`Jump host connection timeout after ${target.timeout}ms: ${jumpHostLabel}`));
        }, target.timeout);

        client.on('error', (error) => {
            Logger.error('Jump host connection error', { jumpHost: jumpHostLabel, error: error.message });
            if (!settled) {
                settled = true;
                clearTimeout(timeoutId);
                reject(new TransportError(`Jump host ${jumpHostLabel} failed: ${error.message}`));
            }
        });

        client.once('ready', () => {
            Logger.info('Jump host connection established', { jumpHost: jumpHostLabel });

            client.forwardOut('127.0.0.1', 0, target.host, target.port, (err, channel) => {
                clearTimeout(timeoutId);
                if (settled) {
                    return;
                }
                settled = true;
                if (err) {
                    Logger.error('Tunnel creation failed', {
                        jumpHost: jumpHostLabel,
                        target: `${target.host}:${target.port}`,
                        error: err.message,
                    });
                    client.end();
                    reject(new TransportError(`Cannot connect to ${target.host} on port ${target.port} through ${jumpHostLabel}: ${err.message}`));
                    return;
                }

                Logger.info('Outbound tunnel created successfully', {
                    jumpHost: jumpHostLabel,
                    target: `${target.host}:${target.port}`,
                });

                const close = once(async () => {
                    await closeStream(channel);
                    client.end();
                });
                resolve({ stream: channel, close });
            });
        });

        client.connect(connectConfig);
    });
}

export const openTransport: TransportFactory = (target) =>
    target.jumpHost ? openJumpHostTransport(target) : openTcpTransport(target);
