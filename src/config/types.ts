import type { Protocol } from '#interfaces/ITransport';
import type { Account } from '#models/Account';
import type { Codec } from '#models/Media';
import type { RegistrationSettings } from '#services/Registrar';
import type { TimerConfig } from '#src/TransactionManager';
import type { RetryPolicy } from '#src/UserAgent';
import type { LevelWithSilent } from '#utils/Logger';

/** Shape of the convict document, as read from YAML and the environment. */
export interface ConfigDocument {
    account: {
        username: string;
        password: string;
        domain: string;
        port: number;
        displayName: string;
        realm: string;
        authUsername: string;
    };
    transport: {
        protocol: Protocol;
        localAddress: string;
        localPort: number;
        publicAddress: string;
        outboundProxy: string;
    };
    timers: TimerConfig;
    registration: RegistrationSettings & { retry: RetryPolicy };
    call: {
        ringTimeout: number;
        sessionRefreshInterval: number;
    };
    media: {
        rtpAddress: string;
        rtpPort: number;
        codecs: string[];
        ptime: number;
    };
    log: {
        level: LevelWithSilent;
        pretty: boolean;
    };
}

export interface ClientConfig {
    readonly account: Account;
    readonly transport: {
        readonly protocol: Protocol;
        readonly localAddress?: string;
        readonly localPort: number;
        readonly publicAddress?: string;
        readonly outboundProxy?: string;
    };
    readonly timers: Readonly<TimerConfig>;
    readonly registration: Readonly<RegistrationSettings> & { readonly retry: Readonly<RetryPolicy> };
    /** Seconds. */
    readonly call: { readonly ringTimeout: number; readonly sessionRefreshInterval: number };
    readonly media: {
        readonly rtpAddress: string;
        readonly rtpPort: number;
        readonly codecs: readonly Codec[];
        readonly ptime: number;
    };
    readonly log: { readonly level: LevelWithSilent; readonly pretty: boolean };
}
