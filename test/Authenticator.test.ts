import { describe, expect, it } from 'vitest';
import Authenticator from '#services/Authenticator';
import SIPParser from '#services/SIPParser';
import { AuthError, Headers, Request, Response } from '#models/index';
import { Utils } from '#utils/Utils';

const parser = new SIPParser();
const authenticator = new Authenticator(() => '0a4f113b');

const MUFASA = { user: 'Mufasa', password: 'Circle Of Life' };
const NONCE = 'dcd98b7102dd2f0e8b11d0f600bfb0c093';
const OPAQUE = '5ccc069c403ebaf9f0171e9517f40e41';

function register(): Request {
    return {
        kind: 'request',
        method: 'REGISTER',
        uri: 'sip:example.com',
        version: '2.0',
        headers: new Headers([
            ['via', 'SIP/2.0/UDP 10.0.0.1:5060;branch=z9hG4bKfirst;rport'],
            ['from', '<sip:alice@example.com>;tag=t1'],
            ['to', '<sip:alice@example.com>'],
            ['call-id', 'reg-1'],
            ['cseq', '1 REGISTER'],
            ['max-forwards', '70'],
        ]),
        content: '',
    };
}

function challengeFor(rq: Request, status: 401 | 407, value: string): Response {
    const rs = parser.makeResponse(rq, status);
    rs.headers.set(status === 401 ? 'www-authenticate' : 'proxy-authenticate', value);
    return rs;
}

describe('Authenticator', () => {
    it('computes the RFC 2617 qop=auth response', () => {
        const challenge = parser.parseAuthHeader(`Digest realm="testrealm@host.com", qop="auth,auth-int", nonce="${NONCE}", opaque="${OPAQUE}"`);
        if (!challenge) throw new Error('challenge did not parse');

        const ctx = authenticator.createContext(challenge, MUFASA, false);
        const rq: Request = { kind: 'request', method: 'GET', uri: '/dir/index.html', version: '2.0', headers: new Headers(), content: '' };

        expect(authenticator.signRequest(ctx, rq).params).toEqual({
            username: '"Mufasa"',
            realm: '"testrealm@host.com"',
            nonce: `"${NONCE}"`,
            uri: '"/dir/index.html"',
            response: '"6629fae49393a05397450978507c4ef1"',
            algorithm: 'MD5',
            cnonce: '"0a4f113b"',
            qop: 'auth',
            nc: '00000001',
            opaque: `"${OPAQUE}"`,
        });
    });

    it('counts nonce uses', () => {
        const challenge = parser.parseAuthHeader(`Digest realm="r", qop="auth", nonce="n"`);
        if (!challenge) throw new Error('challenge did not parse');

        const ctx = authenticator.createContext(challenge, MUFASA, false);
        authenticator.signRequest(ctx, register());
        expect(authenticator.signRequest(ctx, register()).params.nc).toBe('00000002');
    });

    it('omits cnonce and nc without qop', () => {
        const challenge = parser.parseAuthHeader('Digest realm="r", nonce="n"');
        if (!challenge) throw new Error('challenge did not parse');

        const ctx = authenticator.createContext(challenge, MUFASA, false);
        const params = authenticator.signRequest(ctx, register()).params;
        const ha1 = Utils.kd('Mufasa', 'r', 'Circle Of Life');

        expect(params.response).toBe(`"${Utils.kd(ha1, 'n', Utils.kd('REGISTER', 'sip:example.com'))}"`);
        expect(params.cnonce).toBeUndefined();
        expect(params.nc).toBeUndefined();
        expect(params.qop).toBeUndefined();
    });

    it('derives a session key for MD5-sess', () => {
        const challenge = parser.parseAuthHeader('Digest realm="r", nonce="n", algorithm=MD5-sess');
        if (!challenge) throw new Error('challenge did not parse');

        const ctx = authenticator.createContext(challenge, MUFASA, false);
        expect(ctx.ha1).toBe(Utils.kd(Utils.kd('Mufasa', 'r', 'Circle Of Life'), 'n', '0a4f113b'));
        expect(authenticator.signRequest(ctx, register()).params.algorithm).toBe('MD5-sess');
    });

    it('answers a 401 with credentials, the next CSeq and a new branch', () => {
        const rq = register();
        const retry = authenticator.challenge(rq, challengeFor(rq, 401, 'Digest realm="example.com", nonce="abc", qop="auth"'), MUFASA);

        const auth = parser.parseAuthHeader(retry.headers.get('authorization'));
        expect(auth?.params.username).toBe('"Mufasa"');
        expect(auth?.params.uri).toBe('"sip:example.com"');
        expect(retry.headers.get('cseq')).toBe('2 REGISTER');

        const via = parser.parseVia(retry.headers.get('via'));
        expect(via?.params.branch).toMatch(/^z9hG4bK/);
        expect(via?.params.branch).not.toBe('z9hG4bKfirst');
        expect(via?.params.rport).toBeNull();

        expect(rq.headers.has('authorization')).toBe(false);
        expect(rq.headers.get('cseq')).toBe('1 REGISTER');
    });

    it('answers a 407 with Proxy-Authorization', () => {
        const rq = register();
        const retry = authenticator.challenge(rq, challengeFor(rq, 407, 'Digest realm="proxy", nonce="abc"'), MUFASA);
        expect(retry.headers.has('proxy-authorization')).toBe(true);
        expect(retry.headers.has('authorization')).toBe(false);
    });

    it('refuses to answer the same kind of challenge twice', () => {
        const rq = register();
        const retry = authenticator.challenge(rq, challengeFor(rq, 401, 'Digest realm="example.com", nonce="abc"'), MUFASA);

        expect(() => authenticator.challenge(retry, challengeFor(retry, 401, 'Digest realm="example.com", nonce="def"'), MUFASA)).toThrow(
            expect.objectContaining({ code: 'InvalidCredentials' }),
        );
    });

    it('refuses a 401 for a request that already answered a 407', () => {
        const rq = register();
        const retry = authenticator.challenge(rq, challengeFor(rq, 407, 'Digest realm="proxy", nonce="abc"'), MUFASA);

        expect(() => authenticator.challenge(retry, challengeFor(retry, 401, 'Digest realm="example.com", nonce="def"'), MUFASA)).toThrow(
            expect.objectContaining({ code: 'InvalidCredentials' }),
        );
        expect(retry.headers.get('cseq')).toBe('2 REGISTER');
        expect(retry.headers.has('authorization')).toBe(false);
    });

    it('rejects challenges it cannot answer', () => {
        const rq = register();
        const attempt = (value: string) => () => authenticator.challenge(rq, challengeFor(rq, 401, value), MUFASA);

        expect(attempt('Basic realm="example.com"')).toThrow(AuthError);
        expect(attempt('Digest realm="example.com", nonce="abc", algorithm=SHA-256')).toThrow(
            expect.objectContaining({ code: 'UnsupportedChallenge' }),
        );
        expect(attempt('Digest realm="example.com"')).toThrow(expect.objectContaining({ code: 'UnsupportedChallenge' }));
    });

    it('picks the challenge for the configured realm', () => {
        const rq = register();
        const rs = parser.makeResponse(rq, 401);
        rs.headers.set('www-authenticate', ['Digest realm="other", nonce="x"', 'Digest realm="example.com", nonce="y"']);

        const retry = authenticator.challenge(rq, rs, { ...MUFASA, realm: 'example.com' });
        expect(parser.parseAuthHeader(retry.headers.get('authorization'))?.params.nonce).toBe('"y"');
    });
});
