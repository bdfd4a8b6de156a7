import { UnknownDeviceTypeError } from './errors';

export interface DeviceLoginProfile {
    /** Literal text the device prints when it asks for the username */
    readonly usernamePrompt: string;
    /** Literal text the device prints when it asks for the password */
    readonly passwordPrompt: string;
    /** Regular expression source matching the end of the shell prompt */
    readonly finalPromptPattern: string;
}

export interface DeviceTypeOption {
    name: string;
    value: string;
    description: string;
}

export type SupportedDeviceType =
    | 'linux'
    | 'ios'
    | 'junos'
    | 'alaxala'
    | 'dlink'
    | 'xos'
    | 'bdcom'
    | 'cdata';

interface ProfileEntry {
    profile: DeviceLoginProfile;
    displayName: string;
    description: string;
}

const BUILT_IN_PROFILES: { [K in SupportedDeviceType]: ProfileEntry } = {
    linux: {
        profile: { usernamePrompt: 'login:', passwordPrompt: 'Password:', finalPromptPattern: '\\$' },
        displayName: 'Linux / UNIX',
        description: 'Generic Linux or UNIX host',
    },
    ios: {
        profile: { usernamePrompt: 'Username:', passwordPrompt: 'Password:', finalPromptPattern: '[>#]' },
        displayName: 'Cisco IOS',
        description: 'Cisco IOS, IOS-XE and IOS-XR devices',
    },
    junos: {
        profile: { usernamePrompt: 'login:', passwordPrompt: 'Password:', finalPromptPattern: '[%>#]' },
        displayName: 'Juniper Junos',
        description: 'Juniper Junos OS devices',
    },
    alaxala: {
        profile: { usernamePrompt: 'login:', passwordPrompt: 'Password:', finalPromptPattern: '[>#]' },
        displayName: 'AlaxalA / Hitachi',
        description: 'AlaxalA and Hitachi switches',
    },
    dlink: {
        profile: { usernamePrompt: 'ame:', passwordPrompt: 'ord:', finalPromptPattern: '[>|#]' },
        displayName: 'D-Link',
        description: 'D-Link switches',
    },
    xos: {
        profile: { usernamePrompt: 'login:', passwordPrompt: 'password:', finalPromptPattern: '\\.[0-9]{1,3} > ' },
        displayName: 'Extreme XOS',
        description: 'Extreme Networks routers and switches',
    },
    bdcom: {
        profile: { usernamePrompt: 'login:', passwordPrompt: 'password:', finalPromptPattern: '[ > ]' },
        displayName: 'BDCOM',
        description: 'BDCOM PON switches',
    },
    cdata: {
        profile: { usernamePrompt: 'ame:', passwordPrompt: 'ord:', finalPromptPattern: 'OLT(.*?)[>#]' },
        displayName: 'C-Data',
        description: 'C-Data OLTs',
    },
};

/**
 * Device type to login prompt table. Starts with the built-in dialects;
 * more can be registered without touching the login sequence.
 */
export class LoginProfileRegistry {
    private readonly entries = new Map<string, ProfileEntry>();

    constructor(withBuiltIns: boolean = true) {
        if (withBuiltIns) {
            for (const [deviceType, entry] of Object.entries(BUILT_IN_PROFILES)) {
                this.entries.set(deviceType, entry);
            }
        }
    }

    register(deviceType: string, profile: DeviceLoginProfile, displayName?: string, description?: string): this {
        const key = deviceType.toLowerCase();
        // Compile once so a broken pattern fails here rather than mid-login
        new RegExp(profile.finalPromptPattern);
        this.entries.set(key, {
            profile: Object.freeze({ ...profile }),
            displayName: displayName || deviceType,
            description: description || `${displayName || deviceType} devices`,
        });
        return this;
    }

    has(deviceType: string): boolean {
        return this.entries.has(deviceType.toLowerCase());
    }

    /**
     * @throws UnknownDeviceTypeError when no profile is registered for the type
     */
    get(deviceType: string): DeviceLoginProfile {
        const entry = this.entries.get(deviceType.toLowerCase());
        if (!entry) {
            throw new UnknownDeviceTypeError(deviceType, this.getSupportedDeviceTypes());
        }
        return entry.profile;
    }

    getSupportedDeviceTypes(): string[] {
        return [...this.entries.keys()];
    }

    getDeviceTypeDisplayName(deviceType: string): string {
        return this.entries.get(deviceType.toLowerCase())?.displayName || deviceType;
    }

    /**
     * Options list for the n8n device type dropdown
     */
    getDeviceTypeOptions(): DeviceTypeOption[] {
        return [...this.entries.entries()].map(([value, entry]) => ({
            name: entry.displayName,
            value,
            description: entry.description,
        }));
    }
}

export const defaultLoginProfiles = new LoginProfileRegistry();
