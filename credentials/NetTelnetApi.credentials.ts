import type { Icon, ICredentialType, INodeProperties } from 'n8n-workflow';
import { defaultLoginProfiles } from '../nodes/NetTelnet/utils/login-profiles';

export class NetTelnetApi implements ICredentialType {
	name = 'netTelnetApi';
	displayName = 'Net Telnet API';

	icon: Icon = 'file:nettelnet-icon.svg';
	properties: INodeProperties[] = [
		{
			displayName: 'Hostname/IP',
			name: 'host',
			type: 'string',
			default: '',
			required: true,
			description: 'The hostname or IP address of the device',
		},
		{
			displayName: 'Port',
			name: 'port',
			type: 'number',
			default: 23,
			required: true,
			description: 'The telnet port number (default: 23)',
		},
		{
			displayName: 'Username',
			name: 'username',
			type: 'string',
			default: '',
			description: 'Login name. Leave empty for devices that only ask for a password.',
		},
		{
			displayName: 'Password',
			name: 'password',
			type: 'string',
			typeOptions: { password: true },
			default: '',
			description: 'The password sent at the password prompt',
		},
		{
			displayName: 'Device Type',
			name: 'deviceType',
			type: 'options',
			options: defaultLoginProfiles.getDeviceTypeOptions(),
			default: 'ios',
			required: true,
			description: 'Selects the login and shell prompts to wait for',
		},
		{
			displayName: 'Connection Timeout',
			name: 'timeout',
			type: 'number',
			default: 10,
			description: 'Connection timeout in seconds (default: 10)',
		},
		{
			displayName: 'Keep Alive',
			name: 'keepAlive',
			type: 'boolean',
			default: true,
			description: 'Whether to enable TCP keep-alive on the connection',
		},
		{
			displayName: 'Use Jump Host',
			name: 'useJumpHost',
			type: 'boolean',
			default: false,
			description: 'Whether to reach the device through an SSH jump host (bastion server)',
		},
		{
			displayName: 'Jump Host Hostname/IP',
			name: 'jumpHostHost',
			type: 'string',
			default: '',
			required: true,
			displayOptions: { show: { useJumpHost: [true] } },
			description: 'The hostname or IP address of the jump host',
		},
		{
			displayName: 'Jump Host Port',
			name: 'jumpHostPort',
			type: 'number',
			default: 22,
			required: true,
			displayOptions: { show: { useJumpHost: [true] } },
			description: 'SSH port number for the jump host',
		},
		{
			displayName: 'Jump Host Username',
			name: 'jumpHostUsername',
			type: 'string',
			default: '',
			required: true,
			displayOptions: { show: { useJumpHost: [true] } },
			description: 'Username for the jump host',
		},
		{
			displayName: 'Jump Host Authentication Method',
			name: 'jumpHostAuthMethod',
			type: 'options',
			options: [
				{ name: 'Password', value: 'password' },
				{ name: 'SSH Private Key', value: 'privateKey' },
			],
			default: 'password',
			displayOptions: { show: { useJumpHost: [true] } },
			description: 'Authentication method for the jump host',
		},
		{
			displayName: 'Jump Host Password',
			name: 'jumpHostPassword',
			type: 'string',
			typeOptions: { password: true },
			default: '',
			displayOptions: { show: { useJumpHost: [true], jumpHostAuthMethod: ['password'] } },
			description: 'Password for the jump host',
		},
		{
			displayName: 'Jump Host SSH Private Key',
			name: 'jumpHostPrivateKey',
			type: 'string',
			typeOptions: { password: true, rows: 5 },
			default: '',
			displayOptions: { show: { useJumpHost: [true], jumpHostAuthMethod: ['privateKey'] } },
			description: 'Paste the entire key including -----BEGIN and -----END lines',
		},
		{
			displayName: 'Jump Host Private Key Passphrase',
			name: 'jumpHostPassphrase',
			type: 'string',
			typeOptions: { password: true },
			default: '',
			displayOptions: { show: { useJumpHost: [true], jumpHostAuthMethod: ['privateKey'] } },
			description: 'Passphrase for the jump host private key (if any)',
		},
	];
}
