// Session
export {
    TelnetConnection,
    TelnetCredentials,
    TelnetSessionOptions,
    CommandResult,
    LineEnding,
    SessionState,
    WaitOutcome,
    WaitFailure,
    escapeRegex,
    isWaitFailure,
} from './telnet-connection';

// Protocol building blocks
export { ByteSource, ReadResult, EndReason } from './byte-source';
export { Transcript } from './transcript';
export { CommandBuffer } from './command-buffer';
export { negotiate, negotiateWindowSize, encodeWindowSize, NegotiationResult, WindowSizeResult } from './control-negotiator';
export { formatBuffer, normalizeLineEndings } from './buffer-formatter';
export { TELNET, DEFAULT_PAGINATION_MARKERS, describeByte } from './telnet-protocol';

// Device login profiles
export {
    LoginProfileRegistry,
    DeviceLoginProfile,
    DeviceTypeOption,
    SupportedDeviceType,
    defaultLoginProfiles,
} from './login-profiles';

// Transport
export {
    openTransport,
    openTcpTransport,
    openJumpHostTransport,
    formatPrivateKey,
    Transport,
    TransportFactory,
    TransportTarget,
    JumpHostConfig,
} from './transport';

// Errors
export {
    TelnetError,
    TelnetErrorKind,
    TransportError,
    ProtocolViolationError,
    ProtocolViolationContext,
    PromptTimeoutError,
    PromptTimeoutReason,
    LoginFailedError,
    ConcurrentOperationError,
    UnknownDeviceTypeError,
    isTelnetError,
    errorMessage,
} from './errors';
