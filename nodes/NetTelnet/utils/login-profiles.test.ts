import { UnknownDeviceTypeError } from './errors';
import { defaultLoginProfiles, LoginProfileRegistry } from './login-profiles';

describe('LoginProfileRegistry', () => {
    it('ships the built-in device types', () => {
        expect(defaultLoginProfiles.getSupportedDeviceTypes()).toEqual([
            'linux', 'ios', 'junos', 'alaxala', 'dlink', 'xos', 'bdcom', 'cdata',
        ]);
    });

    it('returns the prompts of a device type', () => {
        expect(defaultLoginProfiles.get('ios')).toEqual({
            usernamePrompt: 'Username:',
            passwordPrompt: 'Password:',
            finalPromptPattern: '[>#]',
        });
    });

    it('looks device types up case-insensitively', () => {
        expect(defaultLoginProfiles.get('DLink').usernamePrompt).toBe('ame:');
    });

    it('rejects an unknown device type', () => {
        const registry = new LoginProfileRegistry(false);
        registry.register('vyos', { usernamePrompt: 'login:', passwordPrompt: 'Password:', finalPromptPattern: '\\$' });

        expect(() => registry.get('acme')).toThrow(UnknownDeviceTypeError);
        expect(() => registry.get('acme')).toThrow('Unsupported device type: acme. Supported types: vyos');
    });

    it('registers additional device types', () => {
        const registry = new LoginProfileRegistry();
        registry.register('EdgeOS', { usernamePrompt: 'login:', passwordPrompt: 'Password:', finalPromptPattern: '[$#] ?' }, 'Ubiquiti EdgeOS');

        expect(registry.has('edgeos')).toBe(true);
        expect(registry.getDeviceTypeDisplayName('edgeos')).toBe('Ubiquiti EdgeOS');
        expect(registry.getDeviceTypeOptions()).toContainEqual({
            name: 'Ubiquiti EdgeOS',
            value: 'edgeos',
            description: 'Ubiquiti EdgeOS devices',
        });
        expect(defaultLoginProfiles.has('edgeos')).toBe(false);
    });

    it('refuses a profile whose prompt pattern does not compile', () => {
        const registry = new LoginProfileRegistry(false);

        expect(() =>
            registry.register('broken', { usernamePrompt: 'a', passwordPrompt: 'b', finalPromptPattern: '[' }),
        ).toThrow(SyntaxError);
        expect(registry.has('broken')).toBe(false);
    });

    it('builds the device type dropdown', () => {
        expect(defaultLoginProfiles.getDeviceTypeOptions()[1]).toEqual({
            name: 'Cisco IOS',
            value: 'ios',
            description: 'Cisco IOS, IOS-XE and IOS-XR devices',
        });
    });

    it('falls back to the type itself as display name', () => {
        expect(defaultLoginProfiles.getDeviceTypeDisplayName('unknown')).toBe('unknown');
    });

    it('has every built-in final prompt compile', () => {
        for (const deviceType of defaultLoginProfiles.getSupportedDeviceTypes()) {
            expect(() => new RegExp(defaultLoginProfiles.get(deviceType).finalPromptPattern)).not.toThrow();
        }
    });
});
