import convict from 'convict';
import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { Account, validateAccount } from '#models/Account';
import { ConfigurationError, SipError } from '#models/Errors';
import { Codec, DEFAULT_CODECS } from '#models/Media';
import { configSchema, customFormats } from './schema';
import { ClientConfig, ConfigDocument } from './types';

function setupConvict(env: NodeJS.ProcessEnv) {
    convict.addParser({ extension: ['yml', 'yaml'], parse: yaml.load });
    customFormats.forEach((format) => convict.addFormat(format));

    // CLI flags are handled by commander, not convict.
    return convict<ConfigDocument>(configSchema, { env, args: [] });
}

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.values(value).forEach(deepFreeze);
        Object.freeze(value);
    }
    return value;
}

function resolveCodecs(names: string[]): Codec[] {
    return names.map((name) => {
        const codec = DEFAULT_CODECS.find((c) => c.name.toLowerCase() === name.toLowerCase());
        if (!codec) throw new ConfigurationError('unknown codec', { codec: name });
        return { ...codec };
    });
}

const optional = (value: string) => value || undefined;

function toClientConfig(doc: ConfigDocument): ClientConfig {
    const account: Account = validateAccount({
        username: doc.account.username,
        password: doc.account.password,
        domain: doc.account.domain,
        port: doc.account.port,
        displayName: optional(doc.account.displayName),
        realm: optional(doc.account.realm),
        authUsername: optional(doc.account.authUsername),
    });

    return {
        account,
        transport: {
            protocol: doc.transport.protocol,
            localAddress: optional(doc.transport.localAddress),
            localPort: doc.transport.localPort,
            publicAddress: optional(doc.transport.publicAddress),
            outboundProxy: optional(doc.transport.outboundProxy),
        },
        timers: { ...doc.timers },
        registration: { ...doc.registration, retry: { ...doc.registration.retry } },
        call: { ...doc.call },
        media: {
            rtpAddress: doc.media.rtpAddress,
            rtpPort: doc.media.rtpPort,
            codecs: resolveCodecs(doc.media.codecs),
            ptime: doc.media.ptime,
        },
        log: { ...doc.log },
    };
}

/**
 * Loads YAML files in order (later files win), then the environment, and
 * validates the result strictly. Without paths, `CONFIG_FILE` or
 * `config/default.yaml` under the working directory is read when present.
 */
export function loadConfiguration(configPaths?: string[], env: NodeJS.ProcessEnv = process.env): ClientConfig {
    const config = setupConvict(env);

    const explicit = configPaths !== undefined && configPaths.length > 0;
    const filesToLoad = explicit ? configPaths : [env.CONFIG_FILE || path.resolve(process.cwd(), 'config/default.yaml')];

    try {
        for (const configPath of filesToLoad) {
            if (fs.existsSync(configPath)) {
                config.loadFile(configPath);
            } else if (explicit) {
                throw new ConfigurationError('configuration file not found', { path: configPath });
            }
        }

        config.validate({ allowed: 'strict' });
        return deepFreeze(toClientConfig(config.getProperties()));
    } catch (error) {
        if (error instanceof SipError) throw error;
        throw new ConfigurationError(error instanceof Error ? error.message : String(error));
    }
}

