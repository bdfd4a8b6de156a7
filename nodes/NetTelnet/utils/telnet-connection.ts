import { EventEmitter } from 'events';
import { LoggerProxy as Logger } from 'n8n-workflow';
import { formatBuffer } from './buffer-formatter';
import { ByteSource } from './byte-source';
import { CommandBuffer } from './command-buffer';
import { negotiate, negotiateWindowSize } from './control-negotiator';
import {
    ConcurrentOperationError,
    errorMessage,
    LoginFailedError,
    PromptTimeoutError,
    PromptTimeoutReason,
    ProtocolViolationError,
    TelnetError,
    TransportError,
} from './errors';
import { defaultLoginProfiles, LoginProfileRegistry } from './login-profiles';
import { DEFAULT_PAGINATION_MARKERS, TELNET } from './telnet-protocol';
import { Transcript } from './transcript';
import { JumpHostConfig, openTransport, Transport, TransportFactory } from './transport';

export interface TelnetCredentials {
    host: string;
    port: number;
    username: string;
    password?: string;
    deviceType: string;
    /** Connection timeout in seconds */
    timeout?: number;
    keepAlive?: boolean;
    useJumpHost?: boolean;
    jumpHostHost?: string;
    jumpHostPort?: number;
    jumpHostUsername?: string;
    jumpHostAuthMethod?: 'password' | 'privateKey';
    jumpHostPassword?: string;
    jumpHostPrivateKey?: string;
    jumpHostPassphrase?: string;
}

export type LineEnding = '\n' | '\r\n';

export interface TelnetSessionOptions {
    /** Overall deadline of one prompt wait, in seconds */
    commandTimeout?: number;
    /** Longest silence tolerated between two bytes, in decimal seconds */
    readTimeout?: number;
    /** Regular expression source the end of the output must match */
    prompt?: string;
    lineEnding?: LineEnding;
    stripPrompt?: boolean;
    /** Answer telnet option requests; turn off for peers that send raw 0xFF bytes */
    negotiation?: boolean;
    paginationMarkers?: readonly string[];
    /**
     * Treat a read that hits the per-read timeout like the peer closing the
     * stream. When false an idle peer is waited on until the command timeout.
     */
    idleIsEndOfStream?: boolean;
    /** Number of trailing characters of the buffer the prompt is tested against */
    promptSearchWindow?: number;
    loginProfiles?: LoginProfileRegistry;
    transportFactory?: TransportFactory;
}

export interface CommandResult {
    command: string;
    output: string;
    success: boolean;
    error?: string;
}

export type WaitFailure = PromptTimeoutError | ProtocolViolationError | TransportError;

export type WaitOutcome =
    | { ok: true; buffer: string }
    | { ok: false; error: WaitFailure };

export type SessionState = 'created' | 'open' | 'closed';

const DEFAULT_CONNECTION_TIMEOUT = 10;
const DEFAULT_COMMAND_TIMEOUT = 10;
const DEFAULT_READ_TIMEOUT = 1.0;
const DEFAULT_PROMPT_SEARCH_WINDOW = 4096;

export function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Expect-style telnet session: send a command, read byte by byte until the
 * prompt shows up at the end of the output, hand back what was printed.
 *
 * One operation at a time: starting a second one while the first is still
 * pending rejects with ConcurrentOperationError.
 */
export class TelnetConnection extends EventEmitter {
    public readonly credentials: TelnetCredentials;
    private state: SessionState = 'created';
    private transport: Transport | null = null;
    private source: ByteSource | null = null;
    private readonly buffer = new CommandBuffer();
    private readonly transcript = new Transcript();
    private readonly loginProfiles: LoginProfileRegistry;
    private readonly transportFactory: TransportFactory;
    private activeOperation: string | null = null;

    protected prompt: string = '';
    protected timeout: number;
    protected readTimeout: number;
    protected connectionTimeout: number;
    protected lineEnding: LineEnding;
    protected stripPrompt: boolean;
    protected magicControl: boolean;
    protected paginationMarkers: readonly string[];
    protected idleIsEndOfStream: boolean;
    protected promptSearchWindow: number;

    constructor(credentials: TelnetCredentials, options: TelnetSessionOptions = {}) {
        super();
        this.credentials = credentials;
        this.connectionTimeout = (credentials.timeout || DEFAULT_CONNECTION_TIMEOUT) * 1000;
        this.timeout = (options.commandTimeout || DEFAULT_COMMAND_TIMEOUT) * 1000;
        this.readTimeout = Math.round((options.readTimeout ?? DEFAULT_READ_TIMEOUT) * 1000);
        this.lineEnding = options.lineEnding ?? '\r\n';
        this.stripPrompt = options.stripPrompt ?? true;
        this.magicControl = options.negotiation ?? true;
        this.paginationMarkers = options.paginationMarkers ?? DEFAULT_PAGINATION_MARKERS;
        this.idleIsEndOfStream = options.idleIsEndOfStream ?? true;
        this.promptSearchWindow = options.promptSearchWindow ?? DEFAULT_PROMPT_SEARCH_WINDOW;
        this.loginProfiles = options.loginProfiles ?? defaultLoginProfiles;
        this.transportFactory = options.transportFactory ?? openTransport;
        if (options.prompt) {
            this.setRegexPrompt(options.prompt);
        }
    }

    // ----------------------------------
    //         Lifecycle
    // ----------------------------------

    /**
     * Opens the transport. When a prompt is already configured, waits for it
     * so the banner does not end up in the first command's output.
     */
    async connect(): Promise<this> {
        return this.exclusive('connect', async () => {
            if (this.state === 'open') {
                return this;
            }
            if (this.state === 'closed') {
                throw new TransportError('Telnet session is closed; create a new session to reconnect');
            }

            Logger.debug('Starting telnet connection process', {
                host: this.credentials.host,
                port: this.credentials.port,
                deviceType: this.credentials.deviceType,
                timeout: this.connectionTimeout,
                useJumpHost: !!this.credentials.useJumpHost,
            });

            this.transport = await this.transportFactory({
                host: this.credentials.host,
                port: this.credentials.port,
                timeout: this.connectionTimeout,
                keepAlive: this.credentials.keepAlive,
                jumpHost: this.getJumpHostConfig(),
            });
            this.source = new ByteSource(this.transport.stream, this.transcript, this.readTimeout);
            this.state = 'open';
            this.emit('ready');

            Logger.info('Telnet connection established', {
                host: this.credentials.host,
                port: this.credentials.port,
            });

            if (this.prompt) {
                this.unwrap(await this.readTo(this.prompt));
            }
            return this;
        });
    }

    /**
     * Closes the transport. Calling it again, or on a session that was never
     * opened, does nothing.
     */
    async disconnect(): Promise<void> {
        const transport = this.transport;
        const wasOpen = this.state === 'open';
        this.state = 'closed';
        if (!wasOpen || !transport) {
            return;
        }

        this.transport = null;
        this.source?.detach();
        this.source = null;

        try {
            await transport.close();
        } catch (error) {
            Logger.warn('Error while closing telnet connection', {
                host: this.credentials.host,
                error: errorMessage(error),
            });
            throw new TransportError(`Error while closing telnet socket: ${errorMessage(error)}`);
        }
        Logger.debug('Telnet connection closed', { host: this.credentials.host });
        this.emit('close');
    }

    // ----------------------------------
    //         Configuration
    // ----------------------------------

    /**
     * Sets the literal text that ends command output, usually the last
     * characters of the shell prompt.
     */
    setPrompt(text: string): this {
        return this.setRegexPrompt(escapeRegex(text));
    }

    /**
     * Sets a regular expression matched against the end of the output.
     * An empty pattern makes a wait read until the peer stops sending.
     */
    setRegexPrompt(pattern: string): this {
        if (pattern) {
            new RegExp(pattern);
        }
        this.prompt = pattern;
        return this;
    }

    getPrompt(): string {
        return this.prompt;
    }

    setCommandTimeout(seconds: number): this {
        this.timeout = seconds * 1000;
        return this;
    }

    setStreamTimeout(seconds: number): this {
        this.readTimeout = Math.round(seconds * 1000);
        this.source?.setReadTimeout(this.readTimeout);
        return this;
    }

    setLinuxEOL(): this {
        this.lineEnding = '\n';
        return this;
    }

    setWinEOL(): this {
        this.lineEnding = '\r\n';
        return this;
    }

    enableStripPrompt(): this {
        return this.stripPromptFromBuffer(true);
    }

    disableStripPrompt(): this {
        return this.stripPromptFromBuffer(false);
    }

    stripPromptFromBuffer(strip: boolean): this {
        this.stripPrompt = strip;
        return this;
    }

    enableMagicControl(): this {
        this.magicControl = true;
        return this;
    }

    disableMagicControl(): this {
        this.magicControl = false;
        return this;
    }

    setPaginationMarkers(markers: readonly string[]): this {
        this.paginationMarkers = [...markers];
        return this;
    }

    // ----------------------------------
    //         Commands
    // ----------------------------------

    /**
     * Sends a command, waits for the prompt and returns the formatted output.
     * `prompt` replaces the session prompt for this call only.
     */
    async exec(command: string, addNewline: boolean = true, prompt?: string): Promise<string> {
        return this.exclusive('exec', async () => {
            await this.sendText(command, addNewline);
            this.unwrap(await this.readTo(prompt ?? this.prompt));
            return this.getBuffer();
        });
    }

    async write(text: string, addNewline: boolean = true, more: boolean = false): Promise<void> {
        return this.exclusive('write', () => this.sendText(text, addNewline, more));
    }

    /**
     * Reads until the prompt (or the session prompt) shows up and returns the raw buffer.
     */
    async waitPrompt(prompt?: string): Promise<string> {
        const outcome = await this.tryWaitPrompt(prompt);
        return this.unwrap(outcome);
    }

    /**
     * Same as waitPrompt, but failures come back as a value instead of a rejection.
     */
    async tryWaitPrompt(prompt?: string): Promise<WaitOutcome> {
        return this.exclusive('waitPrompt', () => this.readTo(prompt ?? this.prompt));
    }

    /**
     * Logs in through the username, password and shell prompts of the device type.
     * Whatever goes wrong on the way is reported as LoginFailedError; the
     * session should be considered unusable afterwards.
     */
    async login(username: string, password: string, deviceType: string = 'linux'): Promise<this> {
        const profile = this.loginProfiles.get(deviceType);

        return this.exclusive('login', async () => {
            Logger.debug('Starting telnet login', {
                host: this.credentials.host,
                deviceType,
                hasUsername: !!username,
                passwordLength: password.length,
            });

            try {
                if (username) {
                    this.setPrompt(profile.usernamePrompt);
                    this.unwrap(await this.readTo(this.prompt));
                    await this.sendText(username);
                }

                this.setPrompt(profile.passwordPrompt);
                this.unwrap(await this.readTo(this.prompt));
                await this.sendText(password);

                this.setRegexPrompt(profile.finalPromptPattern);
                this.unwrap(await this.readTo(this.prompt));
            } catch (error) {
                Logger.debug('Telnet login step failed', {
                    host: this.credentials.host,
                    deviceType,
                    error: errorMessage(error),
                });
                throw new LoginFailedError();
            }

            Logger.info('Telnet login successful', { host: this.credentials.host, deviceType });
            return this;
        });
    }

    /**
     * Offers NAWS and sends the terminal size once the peer accepts it.
     * Output still queued, such as the space after a `$ ` prompt, is moved
     * into the command buffer first so it is not taken for the answer.
     */
    async setWindowSize(width: number = 80, height: number = 40): Promise<this> {
        return this.exclusive('setWindowSize', async () => {
            const source = this.requireOpen();
            for (const byte of source.drainQueued()) {
                this.buffer.append(byte);
            }
            const result = await negotiateWindowSize(
                () => source.nextByte(),
                (bytes) => this.writeRaw(bytes),
                width,
                height,
            );

            switch (result.kind) {
                case 'accepted':
                    return this;
                case 'refused':
                    throw new ProtocolViolationError(result.message);
                case 'violation':
                    throw new ProtocolViolationError(result.message, result.byte);
                case 'end':
                    throw new TransportError('Connection closed during window size negotiation');
            }
        });
    }

    /**
     * Runs one command and reports the outcome as data; never rejects.
     */
    async sendCommand(command: string): Promise<CommandResult> {
        try {
            const output = await this.exec(command);
            return { command, output, success: true };
        } catch (error) {
            Logger.warn('Telnet command failed', {
                host: this.credentials.host,
                command,
                error: errorMessage(error),
            });
            return { command, output: '', success: false, error: errorMessage(error) };
        }
    }

    /**
     * Runs the commands in order and stops at the first failure.
     */
    async sendCommands(commands: string[]): Promise<CommandResult[]> {
        const results: CommandResult[] = [];
        for (const command of commands) {
            const result = await this.sendCommand(command);
            results.push(result);
            if (!result.success) {
                break;
            }
        }
        return results;
    }

    // ----------------------------------
    //         Buffers
    // ----------------------------------

    clearBuffer(): this {
        this.buffer.clear();
        return this;
    }

    /**
     * Current command buffer with line endings normalized and, when enabled,
     * the prompt line removed.
     */
    getBuffer(): string {
        return formatBuffer(this.buffer.text, this.stripPrompt);
    }

    getTranscript(): string {
        return this.transcript.toString();
    }

    getTranscriptBytes(): Buffer {
        return this.transcript.toBuffer();
    }

    // ----------------------------------
    //         State
    // ----------------------------------

    getState(): SessionState {
        return this.state;
    }

    isAlive(): boolean {
        const stream = this.transport?.stream;
        return this.state === 'open' && !!stream && !stream.destroyed && !!this.source && !this.source.isEnded;
    }

    getDeviceType(): string {
        return this.credentials.deviceType;
    }

    getHost(): string {
        return this.credentials.host;
    }

    getConnectionInfo(): { host: string; port: number; deviceType: string; connected: boolean } {
        return {
            host: this.credentials.host,
            port: this.credentials.port,
            deviceType: this.credentials.deviceType,
            connected: this.isAlive(),
        };
    }

    // ----------------------------------
    //         Prompt-wait engine
    // ----------------------------------

    /**
     * Reads byte by byte until `prompt` matches the end of the command buffer.
     *
     * Telnet requests are answered and dropped, pagination markers get a
     * space so the device keeps printing, everything else is appended to the
     * buffer. With `more` the buffer is extended instead of cleared.
     */
    protected async readTo(prompt: string, more: boolean = false): Promise<WaitOutcome> {
        if (this.state !== 'open' || !this.source) {
            return { ok: false, error: new TransportError('Telnet connection closed') };
        }
        const source = this.source;

        if (!more) {
            this.buffer.clear();
        }

        const matcher = prompt ? new RegExp(`(?:${prompt})$`) : null;
        const deadline = Date.now() + this.timeout;

        try {
            for (;;) {
                if (Date.now() > deadline) {
                    return this.timedOut(
                        prompt,
                        'deadline',
                        `Couldn't find the requested : '${prompt}' within ${this.timeout / 1000} seconds`,
                    );
                }

                const next = await source.nextByte();
                if (next.kind === 'end') {
                    if (next.reason === 'idle' && !this.idleIsEndOfStream) {
                        continue;
                    }
                    return this.endOfStream(prompt, matcher);
                }

                if (next.byte === TELNET.IAC && this.magicControl) {
                    const negotiation = await negotiate(() => source.nextByte(), (bytes) => this.writeRaw(bytes));
                    if (negotiation.kind === 'handled') {
                        continue;
                    }
                    if (negotiation.kind === 'end') {
                        return this.endOfStream(prompt, matcher);
                    }
                    const partialBuffer = this.buffer.text;
                    this.buffer.clear();
                    return {
                        ok: false,
                        error: new ProtocolViolationError(negotiation.message, negotiation.byte, { pattern: prompt, partialBuffer }),
                    };
                }

                this.buffer.append(next.byte);

                const marker = this.findPaginationMarker();
                if (marker !== undefined) {
                    Logger.debug('Pagination marker found, sending continuation', { marker });
                    this.buffer.markPage();
                    await this.sendText(' ', false, true);
                }

                if (matcher && matcher.test(this.buffer.tail(this.promptSearchWindow))) {
                    return { ok: true, buffer: this.buffer.text };
                }
            }
        } catch (error) {
            if (error instanceof TransportError) {
                this.buffer.clear();
                return { ok: false, error };
            }
            throw error;
        }
    }

    private endOfStream(prompt: string, matcher: RegExp | null): WaitOutcome {
        if (!matcher) {
            return { ok: true, buffer: this.buffer.text };
        }
        return this.timedOut(
            prompt,
            'closed',
            `Couldn't find the requested : '${prompt}', it was not in the data returned from server: ${this.buffer.text}`,
        );
    }

    private timedOut(prompt: string, reason: PromptTimeoutReason, message: string): WaitOutcome {
        const partialBuffer = this.buffer.text;
        this.buffer.clear();
        Logger.debug('Prompt wait failed', {
            host: this.credentials.host,
            prompt,
            reason,
            timeout: this.timeout,
            bufferLength: partialBuffer.length,
        });
        return {
            ok: false,
            error: new PromptTimeoutError(message, { pattern: prompt, timeoutMs: this.timeout, partialBuffer, reason }),
        };
    }

    private findPaginationMarker(): string | undefined {
        if (this.paginationMarkers.length === 0) {
            return undefined;
        }
        const page = this.buffer.currentPage(this.promptSearchWindow);
        return this.paginationMarkers.find((marker) => page.includes(marker));
    }

    // ----------------------------------
    //         Command sender
    // ----------------------------------

    private async sendText(text: string, addNewline: boolean = true, more: boolean = false): Promise<void> {
        if (this.state !== 'open' || !this.transport) {
            throw new TransportError('Telnet connection closed! Call connect() before sending anything');
        }

        if (!more) {
            this.buffer.clear();
        }

        const data = addNewline ? text + this.lineEnding : text;
        await this.writeRaw(Buffer.from(data, 'utf8'));
    }

    private writeRaw(bytes: Buffer): Promise<void> {
        const stream = this.transport?.stream;
        if (this.state !== 'open' || !stream || !stream.writable) {
            return Promise.reject(new TransportError('Telnet connection closed'));
        }

        this.transcript.append(bytes);
        Logger.debug('Writing to telnet stream', { bytes: bytes.length });

        return new Promise((resolve, reject) => {
            stream.write(bytes, (err?: Error | null) => {
                if (err) {
                    Logger.error('Telnet write error', { error: err.message });
                    reject(new TransportError(`Error writing to socket: ${err.message}`));
                } else {
                    resolve();
                }
            });
        });
    }

    // ----------------------------------
    //         Helpers
    // ----------------------------------

    private async exclusive<T>(operation: string, run: () => Promise<T>): Promise<T> {
        if (this.activeOperation) {
            throw new ConcurrentOperationError(operation, this.activeOperation);
        }
        this.activeOperation = operation;
        try {
            return await run();
        } finally {
            this.activeOperation = null;
        }
    }

    private requireOpen(): ByteSource {
        if (this.state !== 'open' || !this.source) {
            throw new TransportError('Telnet connection closed! Call connect() first');
        }
        return this.source;
    }

    private unwrap(outcome: WaitOutcome): string {
        if (!outcome.ok) {
            throw outcome.error;
        }
        return outcome.buffer;
    }

    private getJumpHostConfig(): JumpHostConfig | undefined {
        const c = this.credentials;
        if (!c.useJumpHost) {
            return undefined;
        }
        if (!c.jumpHostHost || !c.jumpHostUsername) {
            throw new TransportError('Jump host hostname and username are required when useJumpHost is enabled');
        }
        return {
            host: c.jumpHostHost,
            port: c.jumpHostPort || 22,
            username: c.jumpHostUsername,
            authMethod: c.jumpHostAuthMethod || 'password',
            password: c.jumpHostPassword,
            privateKey: c.jumpHostPrivateKey,
            passphrase: c.jumpHostPassphrase,
        };
    }
}

export function isWaitFailure(error: unknown): error is WaitFailure {
    return error instanceof TelnetError && (error.kind === 'timeout' || error.kind === 'protocol' || error.kind === 'transport');
}
