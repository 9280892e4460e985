import { Format, Schema } from 'convict';
import { DEFAULT_CODECS } from '#models/Media';
import { ConfigDocument } from './types';

const KNOWN_CODECS = DEFAULT_CODECS.map((c) => c.name.toLowerCase());

const codecListFormat: Format = {
    name: 'codec-list',
    validate: (val: unknown) => {
        if (!Array.isArray(val) || val.length === 0) {
            throw new Error('must be a non-empty list of codec names');
        }
        for (const name of val) {
            if (typeof name !== 'string' || !KNOWN_CODECS.includes(name.toLowerCase())) {
                throw new Error(`unknown codec ${String(name)}; expected one of: ${KNOWN_CODECS.join(', ')}`);
            }
        }
    },
    coerce: (val: unknown) => (typeof val === 'string' ? val.split(',').map((x) => x.trim()) : val),
};

const positiveFormat: Format = {
    name: 'positive',
    validate: (val: unknown) => {
        if (typeof val !== 'number' || !Number.isFinite(val) || val <= 0) {
            throw new Error('must be a positive number');
        }
    },
    coerce: (val: unknown) => Number(val),
};

export const customFormats: Format[] = [codecListFormat, positiveFormat];

export const configSchema: Schema<ConfigDocument> = {
    account: {
        username: {
            doc: 'SIP user name (user part of the address of record)',
            format: String,
            default: '',
            env: 'SIP_USERNAME',
        },
        password: {
            doc: 'SIP password',
            format: String,
            default: '',
            env: 'SIP_PASSWORD',
            sensitive: true,
        },
        domain: {
            doc: 'Registrar / proxy domain',
            format: String,
            default: '',
            env: 'SIP_DOMAIN',
        },
        port: {
            doc: 'Registrar port',
            format: 'port',
            default: 5060,
            env: 'SIP_PORT',
        },
        displayName: {
            doc: 'Display name in From headers',
            format: String,
            default: '',
            env: 'SIP_DISPLAY_NAME',
        },
        realm: {
            doc: 'Digest realm to answer; empty answers any realm',
            format: String,
            default: '',
            env: 'SIP_REALM',
        },
        authUsername: {
            doc: 'Digest user name when it differs from the SIP user name',
            format: String,
            default: '',
            env: 'SIP_AUTH_USERNAME',
        },
    },

    transport: {
        protocol: {
            doc: 'Transport protocol',
            format: ['UDP', 'TCP', 'WS'],
            default: 'UDP',
            env: 'SIP_TRANSPORT',
        },
        localAddress: {
            doc: 'Local address to bind; empty binds every interface',
            format: String,
            default: '',
            env: 'SIP_LOCAL_ADDRESS',
        },
        localPort: {
            doc: 'Local SIP port (0 picks a free one)',
            format: 'port',
            default: 5060,
            env: 'SIP_LOCAL_PORT',
        },
        publicAddress: {
            doc: 'Address advertised in Via and Contact',
            format: String,
            default: '',
            env: 'SIP_PUBLIC_ADDRESS',
        },
        outboundProxy: {
            doc: 'Outbound proxy as host[:port] or SIP URI',
            format: String,
            default: '',
            env: 'SIP_OUTBOUND_PROXY',
        },
    },

    timers: {
        t1: { doc: 'RTT estimate T1, ms', format: 'positive', default: 500 },
        t2: { doc: 'Maximum retransmit interval T2, ms', format: 'positive', default: 4000 },
        t4: { doc: 'Maximum message lifetime T4, ms', format: 'positive', default: 5000 },
        timerD: { doc: 'INVITE response absorption Timer D, ms', format: 'positive', default: 32000 },
    },

    registration: {
        expires: {
            doc: 'Requested registration lifetime, seconds',
            format: 'positive',
            default: 3600,
            env: 'SIP_EXPIRES',
        },
        minRefresh: {
            doc: 'Refresh floor, seconds',
            format: 'positive',
            default: 30,
        },
        keepAliveInterval: {
            doc: 'Seconds between OPTIONS keep-alives while registered; 0 disables',
            format: 'nat',
            default: 0,
        },
        retry: {
            enabled: { doc: 'Retry failed registrations', format: Boolean, default: true },
            delay: { doc: 'First retry delay, ms; doubles per attempt', format: 'positive', default: 5000 },
            maxAttempts: { doc: 'Retries before giving up', format: 'nat', default: 5 },
        },
    },

    call: {
        ringTimeout: {
            doc: 'Seconds an unanswered call may ring',
            format: 'positive',
            default: 180,
        },
        sessionRefreshInterval: {
            doc: 'Seconds between session refresh re-INVITEs; 0 disables',
            format: 'nat',
            default: 0,
        },
    },

    media: {
        rtpAddress: {
            doc: 'Address offered for RTP',
            format: String,
            default: '127.0.0.1',
            env: 'RTP_ADDRESS',
        },
        rtpPort: {
            doc: 'Port offered for RTP',
            format: 'port',
            default: 10000,
            env: 'RTP_PORT',
        },
        codecs: {
            doc: 'Offered codecs in preference order',
            format: 'codec-list',
            default: ['PCMU', 'PCMA', 'telephone-event'],
        },
        ptime: {
            doc: 'Packetization time, ms',
            format: 'positive',
            default: 20,
        },
    },

    log: {
        level: {
            doc: 'Log level',
            format: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
            default: 'info',
            env: 'LOG_LEVEL',
        },
        pretty: {
            doc: 'Human-readable log output',
            format: Boolean,
            default: false,
            env: 'LOG_PRETTY',
        },
    },
};
