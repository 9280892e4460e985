import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfiguration, toUserAgentOptions } from '#config/index';
import { ConfigurationError } from '#models/Errors';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

describe('loadConfiguration', () => {
    it('merges a YAML file over the defaults', () => {
        const config = loadConfiguration([fixture('client.yaml')], {});

        expect(config.account).toEqual({ username: 'alice', password: 'test-secret', domain: 'example.com', port: 5060 });
        expect(config.transport).toEqual({
            protocol: 'TCP',
            localAddress: undefined,
            localPort: 5060,
            publicAddress: undefined,
            outboundProxy: 'proxy.example.net:5070',
        });
        expect(config.timers).toEqual({ t1: 500, t2: 4000, t4: 5000, timerD: 32000 });
        expect(config.registration).toEqual({
            expires: 600,
            minRefresh: 30,
            keepAliveInterval: 0,
            retry: { enabled: true, delay: 5000, maxAttempts: 5 },
        });
        expect(config.call).toEqual({ ringTimeout: 180, sessionRefreshInterval: 0 });
        expect(config.media.codecs).toEqual([
            { payloadType: 8, name: 'PCMA', clockRate: 8000 },
            { payloadType: 101, name: 'telephone-event', clockRate: 8000, fmtp: '0-16' },
        ]);
        expect(config.log).toEqual({ level: 'info', pretty: false });
    });

    it('lets later files override earlier ones', () => {
        const config = loadConfiguration([fixture('client.yaml'), fixture('override.yaml')], {});
        expect(config.registration.expires).toBe(1200);
        expect(config.log.level).toBe('warn');
        expect(config.transport.protocol).toBe('TCP');
    });

    it('lets the environment override files', () => {
        const config = loadConfiguration([fixture('client.yaml')], {
            SIP_PASSWORD: 'other-secret',
            SIP_TRANSPORT: 'WS',
            SIP_PORT: '5080',
            LOG_LEVEL: 'debug',
        });
        expect(config.account.password).toBe('other-secret');
        expect(config.account.port).toBe(5080);
        expect(config.transport.protocol).toBe('WS');
        expect(config.log.level).toBe('debug');
    });

    it('reads credentials from the environment alone', () => {
        const config = loadConfiguration([], {
            CONFIG_FILE: fixture('does-not-exist.yaml'),
            SIP_USERNAME: 'bob',
            SIP_PASSWORD: 'test-secret',
            SIP_DOMAIN: 'example.org',
        });
        expect(config.account).toEqual({ username: 'bob', password: 'test-secret', domain: 'example.org', port: 5060 });
        expect(config.transport.protocol).toBe('UDP');
    });

    it('returns a frozen configuration', () => {
        const config = loadConfiguration([fixture('client.yaml')], {});
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.media.codecs[0])).toBe(true);
    });

    it('requires credentials', () => {
        expect(() => loadConfiguration([fixture('override.yaml')], {})).toThrow(new ConfigurationError('username is required'));
    });

    it('rejects unknown keys', () => {
        expect(() => loadConfiguration([fixture('unknown-key.yaml')], {})).toThrow(ConfigurationError);
    });

    it('rejects an unknown codec', () => {
        expect(() => loadConfiguration([fixture('bad-codec.yaml')], {})).toThrow(/unknown codec OPUS/);
    });

    it('rejects an unknown transport', () => {
        expect(() => loadConfiguration([fixture('client.yaml')], { SIP_TRANSPORT: 'SCTP' })).toThrow(ConfigurationError);
    });

    it('complains about a configuration file that does not exist', () => {
        expect(() => loadConfiguration([fixture('missing.yaml')], {})).toThrow(
            expect.objectContaining({ code: 'ConfigurationError', message: 'configuration file not found' }),
        );
    });
});

describe('toUserAgentOptions', () => {
    it('maps the configuration onto user agent options', () => {
        const options = toUserAgentOptions(loadConfiguration([fixture('client.yaml')], {}));

        expect(options.protocol).toBe('TCP');
        expect(options.outboundProxy).toBe('proxy.example.net:5070');
        expect(options.registration?.expires).toBe(600);
        expect(options.call).toEqual({ ringTimeout: 180, sessionRefreshInterval: 0 });
        expect(options.media?.getLocalMedia('any')).toEqual({
            address: '127.0.0.1',
            port: 10000,
            codecs: [
                { payloadType: 8, name: 'PCMA', clockRate: 8000 },
                { payloadType: 101, name: 'telephone-event', clockRate: 8000, fmtp: '0-16' },
            ],
            ptime: 20,
        });
    });
});
