import { describe, expect, it, vi } from 'vitest';
import SIPParser from '#services/SIPParser';
import { Headers, ParseError, Request, isRequest, isResponse } from '#models/index';

const parser = new SIPParser();

const INVITE = [
    'INVITE sip:bob@example.com SIP/2.0',
    'v: SIP/2.0/UDP 10.0.0.1:5060;branch=z9hG4bKabc, SIP/2.0/UDP 10.0.0.2;branch=z9hG4bKdef',
    'Max-Forwards: 70',
    'f: "Alice" <sip:alice@example.com>;tag=1928',
    't: <sip:bob@example.com>',
    'i: a84b4c76e66710',
    'CSeq: 314159 INVITE',
    'Subject: long',
    '  folded',
    'l: 4',
    '',
    'bodyxyz',
].join('\r\n');

function expectParseError(data: string, code: string) {
    try {
        parser.parse(data);
    } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        expect(err instanceof ParseError && err.code).toBe(code);
        return;
    }
    throw new Error('expected a parse error');
}

describe('SIPParser.parse', () => {
    it('parses a request with compact, folded and multi-value headers', () => {
        const m = parser.parse(INVITE);
        expect(isRequest(m)).toBe(true);
        if (!isRequest(m)) return;

        expect(m.method).toBe('INVITE');
        expect(m.uri).toBe('sip:bob@example.com');
        expect(m.version).toBe('2.0');
        expect(m.headers.getAll('via')).toEqual([
            'SIP/2.0/UDP 10.0.0.1:5060;branch=z9hG4bKabc',
            'SIP/2.0/UDP 10.0.0.2;branch=z9hG4bKdef',
        ]);
        expect(m.headers.get('from')).toBe('"Alice" <sip:alice@example.com>;tag=1928');
        expect(m.headers.get('call-id')).toBe('a84b4c76e66710');
        expect(m.headers.get('subject')).toBe('long folded');
        expect(m.headers.has('content-length')).toBe(false);
        expect(m.content).toBe('body');
    });

    it('parses a response and skips leading blank lines', () => {
        const m = parser.parse(
            '\r\n\r\nSIP/2.0 180 Ringing\r\nVia: SIP/2.0/UDP h;branch=z9hG4bK1\r\nFrom: <sip:a@h>;tag=1\r\nTo: <sip:b@h>;tag=2\r\nCall-ID: c1\r\nCSeq: 1 INVITE\r\nContent-Length: 0\r\n\r\n',
        );
        expect(isResponse(m)).toBe(true);
        if (!isResponse(m)) return;
        expect(m.status).toBe(180);
        expect(m.reason).toBe('Ringing');
        expect(m.content).toBe('');
    });

    it('takes the rest of the datagram as body without Content-Length', () => {
        const m = parser.parse('OPTIONS sip:h SIP/2.0\r\nVia: SIP/2.0/UDP h;branch=z9hG4bK1\r\nMax-Forwards: 70\r\nFrom: <sip:a@h>;tag=1\r\nTo: <sip:h>\r\nCall-ID: c\r\nCSeq: 2 OPTIONS\r\n\r\nhello');
        expect(m.content).toBe('hello');
    });

    it('rejects a request without Call-ID', () => {
        expectParseError('BYE sip:h SIP/2.0\r\nVia: SIP/2.0/UDP h;branch=z9hG4bK1\r\nMax-Forwards: 70\r\nFrom: <sip:a@h>;tag=1\r\nTo: <sip:h>\r\nCSeq: 2 BYE\r\n\r\n', 'MissingMandatoryHeader');
    });

    it('rejects a request without Max-Forwards', () => {
        expectParseError('BYE sip:h SIP/2.0\r\nVia: SIP/2.0/UDP h;branch=z9hG4bK1\r\nFrom: <sip:a@h>;tag=1\r\nTo: <sip:h>\r\nCall-ID: c\r\nCSeq: 2 BYE\r\n\r\n', 'MissingMandatoryHeader');
    });

    it('rejects a status code outside 100-699', () => {
        expectParseError('SIP/2.0 700 Nope\r\n\r\n', 'MalformedStartLine');
    });

    it('rejects a garbage start line', () => {
        expectParseError('hello world\r\n\r\n', 'MalformedStartLine');
    });

    it('rejects a header line without a colon', () => {
        expectParseError('SIP/2.0 200 OK\r\nnot a header\r\n\r\n', 'MalformedHeader');
    });

    it('rejects an unparseable CSeq', () => {
        expectParseError('SIP/2.0 200 OK\r\nVia: SIP/2.0/UDP h;branch=z9hG4bK1\r\nFrom: <sip:a@h>;tag=1\r\nTo: <sip:b@h>\r\nCall-ID: c\r\nCSeq: x\r\n\r\n', 'MalformedHeader');
    });

    it('rejects a body shorter than Content-Length', () => {
        expectParseError(
            'SIP/2.0 200 OK\r\nVia: SIP/2.0/UDP h;branch=z9hG4bK1\r\nFrom: <sip:a@h>;tag=1\r\nTo: <sip:b@h>\r\nCall-ID: c\r\nCSeq: 1 INVITE\r\nContent-Length: 10\r\n\r\nabcd',
            'ContentLengthMismatch',
        );
    });
});

describe('SIPParser.serialize', () => {
    it('writes leading headers first and recomputes Content-Length', () => {
        const rq: Request = {
            kind: 'request',
            method: 'OPTIONS',
            uri: 'sip:b@h',
            version: '2.0',
            headers: new Headers([
                ['cseq', '1 OPTIONS'],
                ['via', 'SIP/2.0/UDP h;branch=z9hG4bK1'],
                ['x-custom', 'a'],
                ['from', '<sip:a@h>;tag=1'],
                ['to', '<sip:b@h>'],
                ['call-id', 'c1'],
                ['max-forwards', '70'],
                ['content-length', '99'],
            ]),
            content: '',
        };

        expect(parser.serialize(rq).toString()).toBe(
            'OPTIONS sip:b@h SIP/2.0\r\n' +
                'Via: SIP/2.0/UDP h;branch=z9hG4bK1\r\n' +
                'From: <sip:a@h>;tag=1\r\n' +
                'To: <sip:b@h>\r\n' +
                'Call-ID: c1\r\n' +
                'CSeq: 1 OPTIONS\r\n' +
                'X-Custom: a\r\n' +
                'Max-Forwards: 70\r\n' +
                'Content-Length: 0\r\n\r\n',
        );
    });

    it('counts the body in bytes and keeps bytes that are not UTF-8', () => {
        const head =
            'MESSAGE sip:bob@example.com SIP/2.0\r\n' +
            'Via: SIP/2.0/UDP 10.0.0.1:5060;branch=z9hG4bKmsg\r\n' +
            'From: <sip:alice@example.com>;tag=1\r\n' +
            'To: <sip:bob@example.com>\r\n' +
            'Call-ID: m1\r\n' +
            'CSeq: 1 MESSAGE\r\n' +
            'Max-Forwards: 70\r\n' +
            'Content-Length: 2\r\n\r\n';
        const wire = Buffer.concat([Buffer.from(head), Buffer.from([0xff, 0xfe])]);

        const m = parser.parse(wire);
        expect(m.content).toHaveLength(2);

        const out = parser.serialize(m);
        expect(out.equals(wire)).toBe(true);
    });

    it('reparses its own output', () => {
        const m = parser.parse(INVITE);
        const again = parser.parse(parser.serialize(m));

        if (!isRequest(m) || !isRequest(again)) throw new Error('not a request');
        expect([again.method, again.uri, again.version]).toEqual(['INVITE', 'sip:bob@example.com', '2.0']);
        expect([again.method, again.uri, again.version]).toEqual([m.method, m.uri, m.version]);

        expect([...again.headers].map(([name]) => name)).toEqual(['via', 'from', 'to', 'call-id', 'cseq', 'max-forwards', 'subject']);
        expect(new Map(again.headers)).toEqual(new Map(m.headers));
        expect(again.headers.getAll('via')).toHaveLength(2);
        expect(again.headers.get('subject')).toBe('long folded');

        expect(again.content).toBe('body');
        expect(parser.serialize(again).equals(parser.serialize(m))).toBe(true);
    });
});

describe('SIPParser.makeResponse', () => {
    it('copies the transaction headers and fills the reason phrase', () => {
        const rq = parser.parse(INVITE);
        if (!isRequest(rq)) throw new Error('not a request');

        const rs = parser.makeResponse(rq, 486);
        expect(rs.status).toBe(486);
        expect(rs.reason).toBe('Busy Here');
        expect(rs.headers.getAll('via')).toHaveLength(2);
        expect(rs.headers.get('cseq')).toBe('314159 INVITE');
        expect(rs.headers.has('max-forwards')).toBe(false);
        expect(rs.headers.has('subject')).toBe(false);
    });
});

describe('SIPParser header accessors', () => {
    it('parses a SIP URI', () => {
        expect(parser.parseUri('sip:alice:pw@example.com:5070;transport=tcp;lr?subject=x')).toEqual({
            schema: 'sip',
            user: 'alice',
            password: 'pw',
            host: 'example.com',
            port: 5070,
            params: { transport: 'tcp', lr: null },
            headers: { subject: 'x' },
        });
        expect(parser.parseUri('mailto:alice@example.com')).toBeUndefined();
    });

    it('parses name-addr and addr-spec values', () => {
        expect(parser.parseNameAddr('"Alice Smith" <sip:alice@example.com>;tag=abc')).toEqual({
            name: '"Alice Smith"',
            uri: 'sip:alice@example.com',
            params: { tag: 'abc' },
        });
        expect(parser.parseNameAddr('sip:bob@example.com;tag=x')).toEqual({
            name: undefined,
            uri: 'sip:bob@example.com',
            params: { tag: 'x' },
        });
    });

    it('parses a Via', () => {
        expect(parser.parseVia('SIP/2.0/udp 10.0.0.1:5060;branch=z9hG4bK1;rport')).toEqual({
            version: '2.0',
            protocol: 'UDP',
            host: '10.0.0.1',
            port: 5060,
            params: { branch: 'z9hG4bK1', rport: null },
        });
    });

    it('parses CSeq', () => {
        expect(parser.parseCSeq('42 REGISTER')).toEqual({ seq: 42, method: 'REGISTER' });
        expect(parser.parseCSeq('REGISTER')).toBeUndefined();
    });

    it('parses a digest challenge keeping raw parameter values', () => {
        expect(parser.parseAuthHeader('Digest realm="r", nonce="n", qop="auth,auth-int", algorithm=MD5')).toEqual({
            scheme: 'Digest',
            params: { realm: '"r"', nonce: '"n"', qop: '"auth,auth-int"', algorithm: 'MD5' },
        });
    });

    it('prettifies header names', () => {
        expect(parser.prettifyHeaderName('call-id')).toBe('Call-ID');
        expect(parser.prettifyHeaderName('www-authenticate')).toBe('WWW-Authenticate');
        expect(parser.prettifyHeaderName('proxy-authorization')).toBe('Proxy-Authorization');
    });
});

describe('SIPParser.createStreamParser', () => {
    const frame = (body: string) =>
        `SIP/2.0 200 OK\r\nVia: SIP/2.0/TCP h;branch=z9hG4bK1\r\nFrom: <sip:a@h>;tag=1\r\nTo: <sip:b@h>\r\nCall-ID: c\r\nCSeq: 1 OPTIONS\r\nContent-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`;

    it('frames messages split across and packed into chunks', () => {
        const frames: string[] = [];
        const push = parser.createStreamParser((f) => frames.push(f.toString()), vi.fn());
        const data = Buffer.from(frame('one') + '\r\n' + frame('second'));

        push(data.subarray(0, 20));
        push(data.subarray(20, 150));
        push(data.subarray(150));

        expect(frames).toEqual([frame('one'), frame('second')]);
        expect(parser.parse(frames[1]).content).toBe('second');
    });

    it('reports a flood when headers exceed the limit', () => {
        const onFlood = vi.fn();
        const onFrame = vi.fn();
        const push = parser.createStreamParser(onFrame, onFlood, { maxBytesHeaders: 100 });

        push(Buffer.alloc(200, 'A'));
        expect(onFlood).toHaveBeenCalledTimes(1);
        expect(onFrame).not.toHaveBeenCalled();
    });

    it('reports a flood when Content-Length exceeds the limit', () => {
        const onFlood = vi.fn();
        const push = parser.createStreamParser(vi.fn(), onFlood, { maxContentLength: 10 });

        push(Buffer.from('SIP/2.0 200 OK\r\nl: 11\r\n\r\n'));
        expect(onFlood).toHaveBeenCalledTimes(1);
    });
});
