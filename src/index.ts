import { ClientConfig, loadConfiguration, toUserAgentOptions } from '#config/index';
import { Logger, createLogger } from '#utils/Logger';
import UserAgent from '#src/UserAgent';

export { UserAgent };
export type { UserAgentOptions, RetryPolicy } from '#src/UserAgent';
export { default as TransactionManager, DEFAULT_TIMERS } from '#src/TransactionManager';
export type { TimerConfig, TransactionOutcome, ServerTransaction } from '#src/TransactionManager';
export { default as SIPParser } from '#services/SIPParser';
export { default as SDPParser } from '#services/SDPParser';
export { default as Authenticator } from '#services/Authenticator';
export { default as Transport } from '#services/Transport';
export { default as Scheduler } from '#services/Scheduler';
export { default as StaticMediaHandler } from '#services/StaticMediaHandler';
export { refreshDelay } from '#services/Registrar';
export type { RegistrationSettings } from '#services/Registrar';
export type { ITransport, Protocol, Remote } from '#interfaces/ITransport';
export type { IMediaHandler } from '#interfaces/IMediaHandler';
export type { IAuthenticator } from '#interfaces/IAuthenticator';
export * from '#models/index';
export * from '#models/Account';
export * from '#models/CallInfo';
export * from '#models/Events';
export * from '#models/Media';
export * from '#models/Registration';
export { createLogger } from '#utils/Logger';
export { loadConfiguration, toUserAgentOptions } from '#config/index';
export type { ClientConfig } from '#config/index';

/** Builds a user agent from YAML files and the environment. */
export function createUserAgent(configPaths?: string[], logger?: Logger): { agent: UserAgent; config: ClientConfig } {
    const config = loadConfiguration(configPaths);
    const log = logger ?? createLogger({ level: config.log.level, pretty: config.log.pretty });
    return { agent: new UserAgent(toUserAgentOptions(config, log)), config };
}
