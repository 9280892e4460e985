export interface Codec {
    payloadType: number;
    name: string;
    clockRate: number;
    channels?: number;
    fmtp?: string;
}

/** Local RTP endpoint offered to the peer. */
export interface LocalMedia {
    address: string;
    port: number;
    codecs: Codec[];
    ptime?: number;
}

/** Handed to the media layer once a call is connected. */
export interface NegotiatedMedia {
    codec: string;
    payloadType: number;
    clockRate: number;
    remoteAddress: string;
    remotePort: number;
    localAddress: string;
    localPort: number;
    ptime?: number;
    dtmfPayloadType?: number;
    direction: 'sendrecv' | 'sendonly' | 'recvonly' | 'inactive';
}

export const DEFAULT_CODECS: Codec[] = [
    { payloadType: 0, name: 'PCMU', clockRate: 8000 },
    { payloadType: 8, name: 'PCMA', clockRate: 8000 },
    { payloadType: 101, name: 'telephone-event', clockRate: 8000, fmtp: '0-16' },
];
