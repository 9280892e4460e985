import {
    Connection,
    ISDPParser,
    MediaDescription,
    MediaDirection,
    Origin,
    SessionDescription,
    SessionVersion,
} from '#interfaces/ISDPParser';
import { Codec, LocalMedia, NegotiatedMedia } from '#models/Media';

const DIRECTIONS: MediaDirection[] = ['sendrecv', 'sendonly', 'recvonly', 'inactive'];

const STATIC_PAYLOADS: Record<number, Codec> = {
    0: { payloadType: 0, name: 'PCMU', clockRate: 8000 },
    3: { payloadType: 3, name: 'GSM', clockRate: 8000 },
    8: { payloadType: 8, name: 'PCMA', clockRate: 8000 },
    9: { payloadType: 9, name: 'G722', clockRate: 8000 },
    18: { payloadType: 18, name: 'G729', clockRate: 8000 },
};

const isTelephoneEvent = (c: Codec) => c.name.toLowerCase() === 'telephone-event';

class SDPParser implements ISDPParser {
    private parsers = {
        o: (o: string): Origin => {
            const t = o.split(/\s+/);
            return {
                username: t[0] ?? '-',
                id: t[1] ?? '0',
                version: t[2] ?? '0',
                nettype: t[3] ?? 'IN',
                addrtype: t[4] ?? 'IP4',
                address: t[5] ?? '',
            };
        },
        c: (c: string): Connection => {
            const t = c.split(/\s+/);
            return { nettype: t[0] ?? 'IN', addrtype: t[1] ?? 'IP4', address: (t[2] ?? '').split('/')[0] };
        },
        m: (m: string): MediaDescription => {
            const t = /^(\w+) +(\d+)(?:\/(\d+))? +(\S+)((?: +\d+)*)/.exec(m);
            if (!t) return { media: '', port: 0, portnum: 1, proto: '', fmt: [], b: [], a: [] };
            return {
                media: t[1],
                port: +t[2],
                portnum: +(t[3] || 1),
                proto: t[4],
                fmt: t[5].trim().length ? t[5].trim().split(/\s+/).map((x) => +x) : [],
                b: [],
                a: [],
            };
        },
    };

    parse(sdp: string): SessionDescription {
        const root: SessionDescription = { b: [], t: [], a: [], extra: [], m: [] };
        let m: MediaDescription | undefined;

        for (const line of sdp.split(/\r?\n/)) {
            const tmp = /^(\w)=(.*)$/.exec(line.trim());
            if (!tmp) continue;
            const [, type, value] = tmp;

            switch (type) {
                case 'm':
                    m = this.parsers.m(value);
                    root.m.push(m);
                    break;
                case 'a':
                    (m ?? root).a.push(value);
                    break;
                case 'b':
                    (m ?? root).b.push(value);
                    break;
                case 'c':
                    (m ?? root).c = this.parsers.c(value);
                    break;
                case 'i':
                    if (m) m.i = value;
                    else root.extra.push([type, value]);
                    break;
                case 'o':
                    root.o = this.parsers.o(value);
                    break;
                case 'v':
                    root.v = value;
                    break;
                case 's':
                    root.s = value;
                    break;
                case 't':
                    root.t.push(value);
                    break;
                default:
                    if (!m) root.extra.push([type, value]);
                    break;
            }
        }

        return root;
    }

    private stringifiers = {
        o: (o: Origin) => [o.username || '-', o.id, o.version, o.nettype || 'IN', o.addrtype || 'IP4', o.address].join(' '),
        c: (c: Connection) => [c.nettype || 'IN', c.addrtype || 'IP4', c.address].join(' '),
        m: (m: MediaDescription) =>
            [m.media || 'audio', m.portnum > 1 ? `${m.port}/${m.portnum}` : m.port, m.proto || 'RTP/AVP', ...m.fmt].join(' '),
    };

    private line(type: string, value: string | undefined): string {
        return value === undefined ? '' : type + '=' + value + '\r\n';
    }

    private extra(sdp: SessionDescription, types: string): string {
        return sdp.extra
            .filter(([type]) => types.includes(type))
            .map(([type, value]) => this.line(type, value))
            .join('');
    }

    stringify(sdp: SessionDescription): string {
        let s = '';
        s += this.line('v', sdp.v ?? '0');
        s += this.line('o', sdp.o && this.stringifiers.o(sdp.o));
        s += this.line('s', sdp.s ?? '-');
        s += this.extra(sdp, 'iuep');
        s += this.line('c', sdp.c && this.stringifiers.c(sdp.c));
        s += sdp.b.map((b) => this.line('b', b)).join('');
        s += (sdp.t.length ? sdp.t : ['0 0']).map((t) => this.line('t', t)).join('');
        s += this.extra(sdp, 'rzk');
        s += sdp.a.map((a) => this.line('a', a)).join('');
        for (const m of sdp.m) {
            s += this.line('m', this.stringifiers.m(m));
            s += this.line('i', m.i);
            s += this.line('c', m.c && this.stringifiers.c(m.c));
            s += m.b.map((b) => this.line('b', b)).join('');
            s += m.a.map((a) => this.line('a', a)).join('');
        }

        return s;
    }

    createOffer(local: LocalMedia, session: SessionVersion, direction: MediaDirection = 'sendrecv'): string {
        return this.describe(local, local.codecs, session, direction, local.ptime);
    }

    createAnswer(offer: string, local: LocalMedia, session: SessionVersion): { sdp: string; media: NegotiatedMedia } | undefined {
        const media = this.negotiate(offer, local);
        if (!media) return;

        const chosen = local.codecs.find((c) => this.sameCodec(c, { payloadType: media.payloadType, name: media.codec, clockRate: media.clockRate }));
        const codecs: Codec[] = [{ ...(chosen ?? { name: media.codec, clockRate: media.clockRate }), payloadType: media.payloadType }];

        const dtmf = local.codecs.find(isTelephoneEvent);
        if (dtmf && media.dtmfPayloadType !== undefined) {
            codecs.push({ ...dtmf, payloadType: media.dtmfPayloadType });
        }

        return { sdp: this.describe(local, codecs, session, media.direction, media.ptime), media };
    }

    /** Matches the remote description against the local capabilities, in the remote side's codec order. */
    negotiate(remote: string, local: LocalMedia): NegotiatedMedia | undefined {
        const sdp = this.parse(remote);
        const m = sdp.m.find((x) => x.media === 'audio' && x.port > 0);
        if (!m) return;

        const connection = m.c ?? sdp.c;
        if (!connection?.address) return;

        const offered = this.codecs(m);
        const codec = offered.find((rc) => !isTelephoneEvent(rc) && local.codecs.some((lc) => this.sameCodec(lc, rc)));
        if (!codec) return;

        const dtmf = local.codecs.some(isTelephoneEvent) ? offered.find(isTelephoneEvent) : undefined;
        const ptime = this.attribute(m, 'ptime');

        return {
            codec: codec.name,
            payloadType: codec.payloadType,
            clockRate: codec.clockRate,
            remoteAddress: connection.address,
            remotePort: m.port,
            localAddress: local.address,
            localPort: local.port,
            ptime: ptime ? +ptime : local.ptime,
            dtmfPayloadType: dtmf?.payloadType,
            direction: this.reverse(this.direction(m, sdp)),
        };
    }

    private describe(local: LocalMedia, codecs: Codec[], session: SessionVersion, direction: MediaDirection, ptime?: number): string {
        const addrtype = local.address.includes(':') ? 'IP6' : 'IP4';
        const a: string[] = [];

        for (const c of codecs) {
            a.push(`rtpmap:${c.payloadType} ${c.name}/${c.clockRate}${c.channels ? '/' + c.channels : ''}`);
            if (c.fmtp) a.push(`fmtp:${c.payloadType} ${c.fmtp}`);
        }
        if (ptime) a.push(`ptime:${ptime}`);
        a.push(direction);

        return this.stringify({
            v: '0',
            o: { username: '-', id: session.id, version: String(session.version), nettype: 'IN', addrtype, address: local.address },
            s: '-',
            c: { nettype: 'IN', addrtype, address: local.address },
            b: [],
            t: ['0 0'],
            a: [],
            extra: [],
            m: [{ media: 'audio', port: local.port, portnum: 1, proto: 'RTP/AVP', fmt: codecs.map((c) => c.payloadType), b: [], a }],
        });
    }

    private codecs(m: MediaDescription): Codec[] {
        const codecs: Codec[] = [];
        for (const pt of m.fmt) {
            const rtpmap = this.attribute(m, `rtpmap:${pt}`);
            const r = rtpmap ? /^([^/\s]+)\/(\d+)(?:\/(\d+))?/.exec(rtpmap) : null;
            const fmtp = this.attribute(m, `fmtp:${pt}`);

            if (r) {
                codecs.push({ payloadType: pt, name: r[1], clockRate: +r[2], channels: r[3] ? +r[3] : undefined, fmtp });
            } else if (STATIC_PAYLOADS[pt]) {
                codecs.push({ ...STATIC_PAYLOADS[pt], fmtp });
            }
        }
        return codecs;
    }

    /** Value of the first `a=<name>[:| ]<value>` attribute of a media section. */
    private attribute(m: MediaDescription, name: string): string | undefined {
        for (const a of m.a) {
            if (a.startsWith(name) && (a[name.length] === ' ' || a[name.length] === ':')) {
                return a.substring(name.length + 1).trim();
            }
        }
    }

    private sameCodec(a: Codec, b: Codec): boolean {
        return a.name.toLowerCase() === b.name.toLowerCase() && a.clockRate === b.clockRate;
    }

    private direction(m: MediaDescription, sdp: SessionDescription): MediaDirection {
        return DIRECTIONS.find((d) => m.a.includes(d)) ?? DIRECTIONS.find((d) => sdp.a.includes(d)) ?? 'sendrecv';
    }

    private reverse(direction: MediaDirection): MediaDirection {
        if (direction === 'sendonly') return 'recvonly';
        if (direction === 'recvonly') return 'sendonly';
        return direction;
    }
}

export default SDPParser;
