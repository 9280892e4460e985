import { ISIPParser, StreamParserLimits } from '#interfaces/ISIPParser';
import {
    AuthHeader,
    CSeq,
    Headers,
    Message,
    NameAddr,
    Params,
    ParseError,
    Request,
    Response,
    Uri,
    Via,
    isRequest,
} from '#models/index';

interface Cursor {
    s: string;
    i: number;
}

const MANDATORY = ['via', 'from', 'to', 'call-id', 'cseq'];
const LEADING = ['via', 'from', 'to', 'call-id', 'cseq', 'contact'];
const MULTI_VALUE = new Set(['via', 'route', 'record-route', 'contact', 'path']);

const TOKEN = "[\\w\\-.!%*+`'~]+";
const QUOTED = '"[^"\\\\]*(?:\\\\.[^"\\\\]*)*"';

export const REASON_PHRASES: Record<number, string> = {
    100: 'Trying',
    180: 'Ringing',
    181: 'Call Is Being Forwarded',
    182: 'Queued',
    183: 'Session Progress',
    200: 'OK',
    202: 'Accepted',
    301: 'Moved Permanently',
    302: 'Moved Temporarily',
    400: 'Bad Request',
    401: 'Unauthorized',
    403: 'Forbidden',
    404: 'Not Found',
    405: 'Method Not Allowed',
    407: 'Proxy Authentication Required',
    408: 'Request Timeout',
    423: 'Interval Too Brief',
    480: 'Temporarily Unavailable',
    481: 'Call/Transaction Does Not Exist',
    486: 'Busy Here',
    487: 'Request Terminated',
    488: 'Not Acceptable Here',
    491: 'Request Pending',
    500: 'Server Internal Error',
    501: 'Not Implemented',
    503: 'Service Unavailable',
    603: 'Decline',
};

class SIPParser implements ISIPParser {
    private compactForm: Record<string, string> = {
        i: 'call-id',
        m: 'contact',
        e: 'content-encoding',
        l: 'content-length',
        c: 'content-type',
        f: 'from',
        o: 'event',
        r: 'refer-to',
        s: 'subject',
        k: 'supported',
        t: 'to',
        u: 'allow-events',
        v: 'via',
    };

    private prettyNames: Record<string, string> = {
        'call-id': 'Call-ID',
        cseq: 'CSeq',
        'www-authenticate': 'WWW-Authenticate',
        'mime-version': 'MIME-Version',
    };

    parse(data: Buffer | string): Message {
        const buf = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;

        let start = 0;
        while (start < buf.length && (buf[start] === 0x0d || buf[start] === 0x0a)) ++start;

        let end = buf.indexOf('\r\n\r\n', start);
        let separator = 4;
        if (end < 0) {
            end = buf.indexOf('\n\n', start);
            separator = 2;
        }
        if (end < 0) {
            end = buf.length;
            separator = 0;
        }

        const lines = buf
            .subarray(start, end)
            .toString('utf8')
            .replace(/\r?\n[ \t]+/g, ' ')
            .split(/\r?\n/);

        const m = this.parseStartLine(lines[0] ?? '');
        let contentLength: string | undefined;

        for (let i = 1; i < lines.length; ++i) {
            const r = /^([^\s:]+)[ \t]*:[ \t]*(.*)$/.exec(lines[i]);
            if (!r) {
                throw new ParseError('MalformedHeader', 'header line without a name', { line: lines[i] });
            }

            const name = this.expandName(r[1]);
            const value = r[2].trim();

            if (name === 'content-length') {
                contentLength = contentLength ?? value;
            } else if (MULTI_VALUE.has(name) && value !== '*') {
                m.headers.append(name, this.splitValues(value));
            } else {
                m.headers.append(name, value);
            }
        }

        const rest = separator > 0 ? buf.subarray(end + separator) : Buffer.alloc(0);
        if (contentLength === undefined) {
            m.content = rest.toString('latin1');
        } else {
            if (!/^\d+$/.test(contentLength)) {
                throw new ParseError('ContentLengthMismatch', 'Content-Length is not a number', { contentLength });
            }
            const length = Number(contentLength);
            if (length > rest.length) {
                throw new ParseError('ContentLengthMismatch', 'body shorter than Content-Length', { contentLength: length, available: rest.length });
            }
            m.content = rest.subarray(0, length).toString('latin1');
        }

        this.validate(m);
        return m;
    }

    /** Throws unless the message carries every mandatory header in a parseable form. */
    validate(m: Message): void {
        const required = isRequest(m) ? [...MANDATORY, 'max-forwards'] : MANDATORY;
        for (const name of required) {
            if (!m.headers.has(name)) {
                throw new ParseError('MissingMandatoryHeader', `missing ${this.prettifyHeaderName(name)} header`, { header: name });
            }
        }
        if (!this.parseCSeq(m.headers.get('cseq'))) {
            throw new ParseError('MalformedHeader', 'invalid CSeq header', { value: m.headers.get('cseq') });
        }
        if (!this.parseVia(m.headers.get('via'))) {
            throw new ParseError('MalformedHeader', 'invalid Via header', { value: m.headers.get('via') });
        }
    }

    serialize(msg: Message): Buffer {
        const lines = [
            isRequest(msg)
                ? `${msg.method} ${msg.uri} SIP/${msg.version || '2.0'}`
                : `SIP/${msg.version || '2.0'} ${msg.status} ${msg.reason}`,
        ];

        const names = [
            ...LEADING.filter((n) => msg.headers.has(n)),
            ...msg.headers.names().filter((n) => !LEADING.includes(n) && n !== 'content-length'),
        ];

        for (const name of names) {
            for (const value of msg.headers.getAll(name)) {
                lines.push(`${this.prettifyHeaderName(name)}: ${value}`);
            }
        }

        const body = Buffer.from(msg.content, 'latin1');
        lines.push(`Content-Length: ${body.length}`);

        return Buffer.concat([Buffer.from(lines.join('\r\n') + '\r\n\r\n', 'utf8'), body]);
    }

    makeResponse(rq: Request, status: number, reason?: string): Response {
        const headers = new Headers();
        for (const name of ['via', 'from', 'to', 'call-id', 'cseq']) {
            headers.set(name, rq.headers.getAll(name));
        }

        return {
            kind: 'response',
            status,
            reason: reason ?? REASON_PHRASES[status] ?? '',
            version: rq.version || '2.0',
            headers,
            content: '',
        };
    }

    createStreamParser(onFrame: (frame: Buffer) => void, onFlood: () => void, limits: StreamParserLimits = {}): (chunk: Buffer) => void {
        const maxBytesHeaders = limits.maxBytesHeaders ?? 60480;
        const maxContentLength = limits.maxContentLength ?? 604800;
        let r: Buffer = Buffer.alloc(0);

        const flood = () => {
            r = Buffer.alloc(0);
            onFlood();
        };

        return (chunk: Buffer) => {
            r = r.length ? Buffer.concat([r, chunk]) : chunk;

            for (;;) {
                let start = 0;
                while (start < r.length && (r[start] === 0x0d || r[start] === 0x0a)) ++start;
                if (start > 0) r = r.subarray(start);

                const end = r.indexOf('\r\n\r\n');
                if (end < 0) {
                    if (r.length > maxBytesHeaders) flood();
                    return;
                }
                if (end > maxBytesHeaders) return flood();

                const head = r.subarray(0, end).toString('utf8');
                const cl = /^(?:content-length|l)[ \t]*:[ \t]*(\d+)[ \t]*$/im.exec(head);
                const length = cl ? Number(cl[1]) : 0;
                if (length > maxContentLength) return flood();

                const total = end + 4 + length;
                if (r.length < total) return;

                onFrame(r.subarray(0, total));
                r = r.subarray(total);
            }
        };
    }

    parseUri(s: string | undefined): Uri | undefined {
        if (!s) return;

        const re = /^(sips?):(?:([^\s>:@]+)(?::([^\s@>]+))?@)?([\w\-.]+|\[[0-9a-fA-F:.]+\])(?::(\d+))?((?:;[^\s=?>;]+(?:=[^\s?;]+)?)*)(?:\?(([^\s&=>]+=[^\s&=>]+)(&[^\s&=>]+=[^\s&=>]+)*))?$/i;

        const r = re.exec(s.trim());
        if (!r) return;

        return {
            schema: r[1].toLowerCase(),
            user: r[2],
            password: r[3],
            host: r[4],
            port: r[5] ? +r[5] : undefined,
            params: (r[6].match(/[^;=]+(=[^;=]+)?/g) || [])
                .map((x) => x.split('='))
                .reduce<Params>((params, x) => {
                    params[x[0].toLowerCase()] = x[1] ?? null;
                    return params;
                }, {}),
            headers: ((r[7] || '').match(/[^&=]+=[^&=]+/g) || [])
                .map((x) => x.split('='))
                .reduce<Record<string, string>>((headers, x) => {
                    headers[x[0]] = x[1];
                    return headers;
                }, {}),
        };
    }

    stringifyUri(uri: Uri | string): string {
        if (typeof uri === 'string') return uri;

        let s = (uri.schema || 'sip') + ':';
        if (uri.user) {
            s += uri.password ? `${uri.user}:${uri.password}@` : `${uri.user}@`;
        }

        s += uri.host;
        if (uri.port) s += ':' + uri.port;
        s += this.stringifyParams(uri.params);

        const h = Object.keys(uri.headers)
            .map((x) => x + '=' + uri.headers[x])
            .join('&');
        if (h.length) s += '?' + h;

        return s;
    }

    parseNameAddr(s: string | undefined): NameAddr | undefined {
        if (s === undefined) return;

        const data: Cursor = { s: s.trim(), i: 0 };
        const r = this.applyRegex(new RegExp(`(${TOKEN}(?:\\s+${TOKEN})*|${QUOTED})?\\s*<\\s*([^>]*?)\\s*>|([^\\s;]+)`, 'y'), data);
        if (!r) return;

        return { name: r[1], uri: r[2] ?? r[3] ?? '', params: this.parseParams(data) };
    }

    stringifyNameAddr(aor: NameAddr): string {
        return (aor.name ? aor.name + ' ' : '') + '<' + aor.uri + '>' + this.stringifyParams(aor.params);
    }

    parseVia(s: string | undefined): Via | undefined {
        if (s === undefined) return;

        const data: Cursor = { s: s.trim(), i: 0 };
        const r = this.applyRegex(/SIP\s*\/\s*(\d+\.\d+)\s*\/\s*(\S+)\s+([^\s;:[]+|\[[^\]]+\])(?:\s*:\s*(\d+))?/y, data);
        if (!r) return;

        return {
            version: r[1],
            protocol: r[2].toUpperCase(),
            host: r[3],
            port: r[4] ? +r[4] : undefined,
            params: this.parseParams(data),
        };
    }

    stringifyVia(via: Via): string {
        return `SIP/${via.version || '2.0'}/${via.protocol.toUpperCase()} ${via.host}${via.port ? ':' + via.port : ''}${this.stringifyParams(via.params)}`;
    }

    parseCSeq(s: string | undefined): CSeq | undefined {
        const r = /^(\d+)\s+(\S+)$/.exec((s ?? '').trim());
        if (!r) return;
        return { seq: +r[1], method: r[2] };
    }

    parseAuthHeader(s: string | undefined): AuthHeader | undefined {
        if (!s) return;

        const d: Cursor = { s: s.trim(), i: 0 };
        const r1 = this.applyRegex(/(\S+)\s+/y, d);
        if (!r1) return;

        const a: AuthHeader = { scheme: r1[1], params: {} };
        const pair = `([^\\s,"=]+)\\s*=\\s*([^\\s,"]+|${QUOTED})\\s*`;

        let r2 = this.applyRegex(new RegExp(pair, 'y'), d);
        while (r2) {
            a.params[r2[1].toLowerCase()] = r2[2];
            r2 = this.applyRegex(new RegExp(',\\s*' + pair, 'y'), d);
        }

        return a;
    }

    stringifyAuthHeader(a: AuthHeader): string {
        const s = Object.keys(a.params).map((n) => n + '=' + a.params[n]);
        return a.scheme + ' ' + s.join(', ');
    }

    prettifyHeaderName(s: string): string {
        return this.prettyNames[s] ?? s.replace(/(^|-)([a-z])/g, (_, dash: string, c: string) => dash + c.toUpperCase());
    }

    private parseStartLine(line: string): Request | Response {
        const start = line.trim();

        const rs = /^SIP\/(\d+\.\d+)\s+(\d{3})(?:\s+(.*))?$/.exec(start);
        if (rs) {
            const status = +rs[2];
            if (status < 100 || status > 699) {
                throw new ParseError('MalformedStartLine', 'status code out of range', { line: start });
            }
            return { kind: 'response', version: rs[1], status, reason: rs[3] ?? '', headers: new Headers(), content: '' };
        }

        const rq = new RegExp(`^(${TOKEN})\\s+(\\S+)\\s+SIP\\/(\\d+\\.\\d+)$`).exec(start);
        if (rq) {
            return { kind: 'request', method: rq[1], uri: rq[2], version: rq[3], headers: new Headers(), content: '' };
        }

        throw new ParseError('MalformedStartLine', 'neither a request line nor a status line', { line: start });
    }

    private expandName(raw: string): string {
        const name = raw.toLowerCase();
        return this.compactForm[name] ?? name;
    }

    /** Splits a header value on commas that sit outside quotes and angle brackets. */
    private splitValues(value: string): string[] {
        const values: string[] = [];
        let quoted = false;
        let angle = 0;
        let from = 0;

        for (let i = 0; i < value.length; ++i) {
            const c = value[i];
            if (c === '\\' && quoted) {
                ++i;
            } else if (c === '"') {
                quoted = !quoted;
            } else if (!quoted && c === '<') {
                ++angle;
            } else if (!quoted && c === '>') {
                angle = Math.max(0, angle - 1);
            } else if (!quoted && angle === 0 && c === ',') {
                values.push(value.substring(from, i).trim());
                from = i + 1;
            }
        }
        values.push(value.substring(from).trim());

        return values.filter((v) => v.length > 0);
    }

    private applyRegex(regex: RegExp, data: Cursor): RegExpExecArray | undefined {
        regex.lastIndex = data.i;
        const r = regex.exec(data.s);
        if (r) {
            data.i = regex.lastIndex;
            return r;
        }
    }

    private parseParams(data: Cursor): Params {
        const params: Params = {};
        const re = new RegExp(`\\s*;\\s*(${TOKEN})(?:\\s*=\\s*([\\w\\-.!%*+\`'~:\\[\\]]+|${QUOTED}))?`, 'y');
        for (let r = this.applyRegex(re, data); r; r = this.applyRegex(re, data)) {
            params[r[1].toLowerCase()] = r[2] ?? null;
        }
        return params;
    }

    private stringifyParams(params: Params): string {
        let s = '';
        for (const n in params) {
            const v = params[n];
            s += ';' + n + (v !== null && v !== undefined ? '=' + v : '');
        }
        return s;
    }
}

export default SIPParser;
