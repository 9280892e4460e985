import { LocalMedia, NegotiatedMedia } from '#models/Media';

export interface Origin {
    username: string;
    id: string;
    version: string;
    nettype: string;
    addrtype: string;
    address: string;
}

export interface Connection {
    nettype: string;
    addrtype: string;
    address: string;
}

export interface MediaDescription {
    media: string;
    port: number;
    portnum: number;
    proto: string;
    fmt: number[];
    i?: string;
    c?: Connection;
    b: string[];
    a: string[];
}

export interface SessionDescription {
    v?: string;
    o?: Origin;
    s?: string;
    c?: Connection;
    b: string[];
    t: string[];
    a: string[];
    /** Session-level lines this codec does not model, kept in order. */
    extra: [string, string][];
    m: MediaDescription[];
}

export interface SessionVersion {
    id: string;
    version: number;
}

export type MediaDirection = NegotiatedMedia['direction'];

export interface ISDPParser {
    parse(sdp: string): SessionDescription;
    stringify(sdp: SessionDescription): string;
    createOffer(local: LocalMedia, session: SessionVersion, direction?: MediaDirection): string;
    createAnswer(offer: string, local: LocalMedia, session: SessionVersion): { sdp: string; media: NegotiatedMedia } | undefined;
    negotiate(remote: string, local: LocalMedia): NegotiatedMedia | undefined;
}
