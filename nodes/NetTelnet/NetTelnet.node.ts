import type {
    ICredentialDataDecryptedObject,
    IDataObject,
    IExecuteFunctions,
    INodeExecutionData,
    INodeType,
    INodeTypeDescription,
} from 'n8n-workflow';

import { LoggerProxy as Logger, NodeConnectionTypes, NodeOperationError } from 'n8n-workflow';
import {
    CommandResult,
    errorMessage,
    LineEnding,
    TelnetConnection,
    TelnetCredentials,
    TelnetSessionOptions,
} from './utils';

function readString(data: ICredentialDataDecryptedObject, key: string, fallback: string = ''): string {
    const value = data[key];
    return typeof value === 'string' ? value : fallback;
}

function readNumber(data: ICredentialDataDecryptedObject, key: string, fallback: number): number {
    const value = data[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readBoolean(data: ICredentialDataDecryptedObject, key: string, fallback: boolean): boolean {
    const value = data[key];
    return typeof value === 'boolean' ? value : fallback;
}

export function toTelnetCredentials(credentials: ICredentialDataDecryptedObject): TelnetCredentials {
    const useJumpHost = readBoolean(credentials, 'useJumpHost', false);
    const telnetCredentials: TelnetCredentials = {
        host: readString(credentials, 'host'),
        port: readNumber(credentials, 'port', 23),
        username: readString(credentials, 'username'),
        password: readString(credentials, 'password'),
        deviceType: readString(credentials, 'deviceType', 'ios'),
        timeout: readNumber(credentials, 'timeout', 10),
        keepAlive: readBoolean(credentials, 'keepAlive', true),
        useJumpHost,
    };

    if (useJumpHost) {
        telnetCredentials.jumpHostHost = readString(credentials, 'jumpHostHost');
        telnetCredentials.jumpHostPort = readNumber(credentials, 'jumpHostPort', 22);
        telnetCredentials.jumpHostUsername = readString(credentials, 'jumpHostUsername');
        telnetCredentials.jumpHostAuthMethod =
            readString(credentials, 'jumpHostAuthMethod') === 'privateKey' ? 'privateKey' : 'password';
        telnetCredentials.jumpHostPassword = readString(credentials, 'jumpHostPassword');
        telnetCredentials.jumpHostPrivateKey = readString(credentials, 'jumpHostPrivateKey');
        telnetCredentials.jumpHostPassphrase = readString(credentials, 'jumpHostPassphrase');
    }
    return telnetCredentials;
}

export function toSessionOptions(advancedOptions: IDataObject): TelnetSessionOptions {
    const options: TelnetSessionOptions = {
        commandTimeout: Math.max(1, (advancedOptions.commandTimeout as number) || 10),
        readTimeout: Math.max(0.1, (advancedOptions.readTimeout as number) || 1),
        lineEnding: advancedOptions.lineEnding === 'lf' ? '\n' : '\r\n',
        stripPrompt: (advancedOptions.stripPrompt as boolean) !== false,
        negotiation: (advancedOptions.telnetNegotiation as boolean) !== false,
    };
    if (advancedOptions.waitForIdle === true) {
        options.idleIsEndOfStream = false;
    }
    return options;
}

function lineEndingName(lineEnding: LineEnding | undefined): string {
    return lineEnding === '\n' ? 'lf' : 'crlf';
}

export class NetTelnet implements INodeType {
    description: INodeTypeDescription = {
        displayName: 'Net Telnet',
        name: 'netTelnet',
        icon: 'file:nettelnet-icon.svg',
        group: ['transform'],
        version: 1,
        description: 'Run commands on network devices over telnet',
        defaults: {
            name: 'Net Telnet',
        },
        inputs: [NodeConnectionTypes.Main],
        outputs: [NodeConnectionTypes.Main],
        credentials: [
            {
                name: 'netTelnetApi',
                required: true,
            },
        ],

        properties: [
            {
                displayName: 'Operation',
                name: 'operation',
                type: 'options',
                noDataExpression: true,
                required: true,
                options: [
					{
						name: 'Get Transcript',
						value: 'getTranscript',
						description: 'Log in and return the raw session transcript',
						action: 'Get the session transcript',
					},
					{
						name: 'Send Command',
						value: 'sendCommand',
						description: 'Send a command to the device and get the response',
						action: 'Send a command to the device',
					},
					{
						name: 'Send Commands',
						value: 'sendCommands',
						description: 'Send several commands in order, stopping at the first failure',
						action: 'Send several commands to the device',
					},
				],
				default: 'sendCommand',
            },
			// ----------------------------------
			//         Send Command Options
			// ----------------------------------
			{
				displayName: 'Command',
				name: 'command',
				type: 'string',
				default: '',
				required: true,
				displayOptions: {
					show: {
						operation: ['sendCommand'],
					},
				},
				description: 'The command to send to the device',
				placeholder: 'show version',
			},
			// ----------------------------------
			//         Send Commands Options
			// ----------------------------------
			{
				displayName: 'Commands',
				name: 'commands',
				type: 'string',
				default: '',
				required: true,
				displayOptions: {
					show: {
						operation: ['sendCommands'],
					},
				},
				description: 'Commands to send (one per line)',
				placeholder: 'show version\nshow interfaces status',
				typeOptions: {
					rows: 5,
				},
			},
			// ----------------------------------
			//         Advanced Options
			// ----------------------------------
			{
				displayName: 'Advanced Options',
				name: 'advancedOptions',
				type: 'collection',
				placeholder: 'Add Option',
				default: {},
				options: [
					{
						displayName: 'Command Timeout',
						name: 'commandTimeout',
						type: 'number',
						default: 10,
						description: 'Seconds to wait for the prompt after each command',
						typeOptions: {
							minValue: 1,
							maxValue: 600,
						},
					},
					{
						displayName: 'Connection Retry Count',
						name: 'connectionRetryCount',
						type: 'number',
						default: 1,
						description: 'Number of connection attempts before giving up',
						typeOptions: {
							minValue: 1,
							maxValue: 10,
						},
					},
					{
						displayName: 'Fail on Error',
						name: 'failOnError',
						type: 'boolean',
						default: true,
						description: 'Whether to fail the workflow on command errors (if false, errors are returned as data)',
					},
					{
						displayName: 'Include Transcript',
						name: 'includeTranscript',
						type: 'boolean',
						default: false,
						description: 'Whether to add the raw session transcript to the output',
					},
					{
						displayName: 'Line Ending',
						name: 'lineEnding',
						type: 'options',
						options: [
							{ name: 'CR LF (\\r\\n)', value: 'crlf' },
							{ name: 'LF (\\n)', value: 'lf' },
						],
						default: 'crlf',
						description: 'Line ending appended to every command',
					},
					{
						displayName: 'Login',
						name: 'login',
						type: 'boolean',
						default: true,
						description: 'Whether to log in with the credential username and password before running commands',
					},
					{
						displayName: 'Prompt Pattern',
						name: 'prompt',
						type: 'string',
						default: '',
						placeholder: '[>#]\\s?',
						description: 'Regular expression matching the end of the shell prompt. Defaults to the device type prompt.',
					},
					{
						displayName: 'Read Timeout',
						name: 'readTimeout',
						type: 'number',
						default: 1,
						description: 'Longest pause in the output, in seconds. A longer pause ends the wait: as success when no prompt is set, as a failure otherwise (see Wait for Idle).',
						typeOptions: {
							minValue: 0.1,
							maxValue: 60,
							numberPrecision: 1,
						},
					},
					{
						displayName: 'Retry Delay',
						name: 'retryDelay',
						type: 'number',
						default: 2,
						description: 'Delay between connection attempts in seconds',
						typeOptions: {
							minValue: 1,
							maxValue: 30,
						},
					},
					{
						displayName: 'Strip Prompt',
						name: 'stripPrompt',
						type: 'boolean',
						default: true,
						description: 'Whether to remove the trailing prompt line from the output',
					},
					{
						displayName: 'Telnet Negotiation',
						name: 'telnetNegotiation',
						type: 'boolean',
						default: true,
						description: 'Whether to answer telnet option requests. Turn off for raw TCP consoles.',
					},
					{
						displayName: 'Wait for Idle',
						name: 'waitForIdle',
						type: 'boolean',
						default: false,
						description: 'Whether a pause in the output keeps the wait going until the command timeout, instead of ending it',
					},
					{
						displayName: 'Window Height',
						name: 'windowHeight',
						type: 'number',
						default: 0,
						description: 'Terminal height to announce to the device (0 leaves it unset)',
						typeOptions: {
							minValue: 0,
							maxValue: 255,
						},
					},
					{
						displayName: 'Window Width',
						name: 'windowWidth',
						type: 'number',
						default: 0,
						description: 'Terminal width to announce to the device (0 leaves it unset)',
						typeOptions: {
							minValue: 0,
							maxValue: 255,
						},
					},
				],
			},
        ],
    };

    async execute(this: IExecuteFunctions): Promise<INodeExecutionData[][]> {
        const items = this.getInputData();
        const returnData: INodeExecutionData[] = [];

        const credentials = toTelnetCredentials(await this.getCredentials('netTelnetApi'));
        const operation = this.getNodeParameter('operation', 0) as string;

        for (let i = 0; i < items.length; i++) {
            const startTime = Date.now();
            let connection: TelnetConnection | null = null;

            const advancedOptions = this.getNodeParameter('advancedOptions', i, {}) as IDataObject;
            const connectionRetryCount = Math.max(1, (advancedOptions.connectionRetryCount as number) || 1);
            const retryDelay = Math.max(1, (advancedOptions.retryDelay as number) || 2) * 1000;
            const failOnError = (advancedOptions.failOnError as boolean) !== false;
            const includeTranscript = advancedOptions.includeTranscript === true;
            const shouldLogin = (advancedOptions.login as boolean) !== false;
            const promptOverride = (advancedOptions.prompt as string) || '';
            const windowWidth = (advancedOptions.windowWidth as number) || 0;
            const windowHeight = (advancedOptions.windowHeight as number) || 0;
            const sessionOptions = toSessionOptions(advancedOptions);

            try {
                let commands: string[] = [];
                if (operation === 'sendCommand') {
                    const command = this.getNodeParameter('command', i) as string;
                    if (!command) {
                        throw new NodeOperationError(
                            this.getNode(),
                            'Command parameter is required for sendCommand operation',
                            { itemIndex: i },
                        );
                    }
                    commands = [command];
                } else if (operation === 'sendCommands') {
                    commands = (this.getNodeParameter('commands', i) as string)
                        .split('\n')
                        .map((cmd) => cmd.trim())
                        .filter((cmd) => cmd.length > 0);
                    if (commands.length === 0) {
                        throw new NodeOperationError(
                            this.getNode(),
                            'At least one command is required for sendCommands operation',
                            { itemIndex: i },
                        );
                    }
                } else if (operation !== 'getTranscript') {
                    throw new NodeOperationError(
                        this.getNode(),
                        `The operation "${operation}" is not supported!`,
                        { itemIndex: i },
                    );
                }

                // Connection with retry logic
                for (let attempt = 1; attempt <= connectionRetryCount; attempt++) {
                    try {
                        connection = new TelnetConnection(credentials, sessionOptions);
                        await connection.connect();
                        break;
                    } catch (error) {
                        await connection?.disconnect();
                        connection = null;
                        if (attempt === connectionRetryCount) {
                            throw new NodeOperationError(
                                this.getNode(),
                                `Failed to connect to device ${credentials.host} after ${connectionRetryCount} attempts. Last error: ${errorMessage(error)}`,
                                { itemIndex: i, description: `Connection attempts: ${attempt}/${connectionRetryCount}` },
                            );
                        }
                        await new Promise<void>((resolve) => setTimeout(resolve, retryDelay * Math.pow(2, attempt - 1)));
                    }
                }
                if (!connection) {
                    throw new NodeOperationError(this.getNode(), 'No connection available', { itemIndex: i });
                }

                if (shouldLogin) {
                    try {
                        await connection.login(credentials.username, credentials.password || '', credentials.deviceType);
                    } catch (error) {
                        throw new NodeOperationError(this.getNode(), errorMessage(error), {
                            itemIndex: i,
                            description: `Device type: ${credentials.deviceType}`,
                        });
                    }
                }
                if (promptOverride) {
                    connection.setRegexPrompt(promptOverride);
                }
                if (windowWidth > 0 && windowHeight > 0) {
                    await connection.setWindowSize(windowWidth, windowHeight);
                }

                const results: CommandResult[] = await connection.sendCommands(commands);
                const failed = results.find((result) => !result.success);

                if (failed && failOnError) {
                    throw new NodeOperationError(
                        this.getNode(),
                        `Command "${failed.command}" failed: ${failed.error || 'Command execution failed'}`,
                        { itemIndex: i },
                    );
                }

                const outputData: IDataObject = {
                    success: !failed,
                    deviceType: connection.getDeviceType(),
                    host: connection.getHost(),
                    timestamp: new Date().toISOString(),
                    executionTime: Date.now() - startTime,
                    lineEnding: lineEndingName(sessionOptions.lineEnding),
                };
                if (operation === 'sendCommand') {
                    outputData.command = results[0]?.command;
                    outputData.output = results[0]?.output;
                } else if (operation === 'sendCommands') {
                    outputData.results = results.map((result) => ({ ...result }));
                }
                if (failed?.error) {
                    outputData.error = failed.error;
                }
                if (includeTranscript || operation === 'getTranscript') {
                    outputData.transcript = connection.getTranscript();
                }

                const executionData = this.helpers.constructExecutionMetaData(
                    this.helpers.returnJsonArray(outputData),
                    { itemData: { item: i } },
                );
                returnData.push(...executionData);
            } catch (error) {
                if (this.continueOnFail() || !failOnError) {
                    returnData.push({
                        json: {
                            error: errorMessage(error),
                            success: false,
                            timestamp: new Date().toISOString(),
                            executionTime: Date.now() - startTime,
                            host: credentials.host,
                            operation,
                        },
                        pairedItem: { item: i },
                    });
                    continue;
                }
                throw error;
            } finally {
                if (connection) {
                    try {
                        await connection.disconnect();
                    } catch (disconnectError) {
                        Logger.warn('Failed to close telnet connection', {
                            host: credentials.host,
                            error: errorMessage(disconnectError),
                        });
                    }
                }
            }
        }

        return [returnData];
    }
}
