import { IAuthenticator } from '#interfaces/IAuthenticator';
import { Context, Credentials, DigestInput } from '#models/Context';
import { AuthError, AuthHeader, Request, Response } from '#models/index';
import { Utils } from '#utils/Utils';
import { generateBranch, generateCnonce } from '#utils/Tools';
import SIPParser from '#services/SIPParser';

const SUPPORTED_ALGORITHMS = ['md5', 'md5-sess'];

class Authenticator implements IAuthenticator {
    private sipParser = new SIPParser();

    constructor(private cnonce: () => string = generateCnonce) {}

    calculateHA1(ctx: Pick<Context, 'userhash' | 'algorithm' | 'nonce' | 'cnonce'>): string {
        if (ctx.algorithm === 'md5-sess') return Utils.kd(ctx.userhash, ctx.nonce, ctx.cnonce ?? '');
        return ctx.userhash;
    }

    calculateDigest(ctx: DigestInput): string {
        switch (ctx.qop) {
            case 'auth-int':
                return Utils.kd(ctx.ha1, ctx.nonce, ctx.nc ?? '', ctx.cnonce ?? '', ctx.qop, Utils.kd(ctx.method, ctx.uri, Utils.hashBody(ctx.entity ?? '')));
            case 'auth':
                return Utils.kd(ctx.ha1, ctx.nonce, ctx.nc ?? '', ctx.cnonce ?? '', ctx.qop, Utils.kd(ctx.method, ctx.uri));
        }
        return Utils.kd(ctx.ha1, ctx.nonce, Utils.kd(ctx.method, ctx.uri));
    }

    createContext(challenge: AuthHeader, credentials: Credentials, proxy: boolean): Context {
        const realm = Utils.unq(challenge.params.realm) ?? '';
        const nonce = Utils.unq(challenge.params.nonce);
        if (!nonce) {
            throw new AuthError('UnsupportedChallenge', 'challenge carries no nonce', { realm });
        }

        const algorithm = Utils.lowercase(Utils.unq(challenge.params.algorithm));
        if (algorithm && !SUPPORTED_ALGORITHMS.includes(algorithm)) {
            throw new AuthError('UnsupportedChallenge', `unsupported digest algorithm ${algorithm}`, { realm });
        }

        const qop = this.selectQop(Utils.lowercase(challenge.params.qop));
        const ctx: Context = {
            user: credentials.user,
            realm,
            nonce,
            proxy,
            algorithm,
            qop,
            nc: 0,
            cnonce: qop || algorithm === 'md5-sess' ? this.cnonce() : undefined,
            opaque: Utils.unq(challenge.params.opaque),
            domain: Utils.unq(challenge.params.domain),
            userhash: credentials.hash || Utils.kd(credentials.user, realm, credentials.password ?? ''),
            ha1: '',
        };
        ctx.ha1 = this.calculateHA1(ctx);

        return ctx;
    }

    signRequest(ctx: Context, rq: Request): AuthHeader {
        const nc = ctx.qop ? Utils.numberTo8Hex(++ctx.nc) : undefined;
        ctx.uri = rq.uri;

        const response = this.calculateDigest({
            ha1: ctx.ha1,
            method: rq.method,
            nonce: ctx.nonce,
            nc,
            cnonce: ctx.cnonce,
            qop: ctx.qop,
            uri: ctx.uri,
            entity: rq.content,
        });

        const params: Record<string, string | undefined> = {
            username: Utils.q(ctx.user),
            realm: Utils.q(ctx.realm),
            nonce: Utils.q(ctx.nonce),
            uri: Utils.q(ctx.uri),
            response: Utils.q(response),
            algorithm: ctx.algorithm === 'md5-sess' ? 'MD5-sess' : 'MD5',
            cnonce: ctx.qop ? Utils.q(ctx.cnonce) : undefined,
            qop: ctx.qop,
            nc,
            opaque: Utils.q(ctx.opaque),
        };

        const signature: AuthHeader = { scheme: 'Digest', params: {} };
        for (const [name, value] of Object.entries(params)) {
            if (value !== undefined) signature.params[name] = value;
        }
        return signature;
    }

    challenge(request: Request, response: Response, credentials: Credentials): Request {
        const proxy = response.status === 407;
        const authorization = proxy ? 'proxy-authorization' : 'authorization';

        // One challenge-response cycle per request, whichever header answered it.
        if (request.headers.has('authorization') || request.headers.has('proxy-authorization')) {
            throw new AuthError('InvalidCredentials', `credentials rejected for ${request.method}`, { status: response.status });
        }

        const challenge = this.findDigestRealm(response.headers.getAll(proxy ? 'proxy-authenticate' : 'www-authenticate'), credentials.realm);
        if (!challenge) {
            throw new AuthError('UnsupportedChallenge', `no digest challenge in ${response.status} response`, { status: response.status });
        }

        const ctx = this.createContext(challenge, credentials, proxy);
        const headers = request.headers.clone();
        headers.append(authorization, this.sipParser.stringifyAuthHeader(this.signRequest(ctx, request)));

        const cseq = this.sipParser.parseCSeq(headers.get('cseq'));
        if (cseq) headers.set('cseq', `${cseq.seq + 1} ${cseq.method}`);

        const vias = headers.getAll('via');
        const top = this.sipParser.parseVia(vias[0]);
        if (top) {
            top.params.branch = generateBranch();
            headers.set('via', [this.sipParser.stringifyVia(top), ...vias.slice(1)]);
        }

        return { ...request, headers };
    }

    private findDigestRealm(values: string[], realm?: string): AuthHeader | undefined {
        return values
            .map((x) => this.sipParser.parseAuthHeader(x))
            .find((x): x is AuthHeader => !!x && x.scheme.toLowerCase() === 'digest' && (!realm || Utils.unq(x.params.realm) === realm));
    }

    /** `auth` when offered, then `auth-int`; none when the challenge has no qop. */
    private selectQop(challenge: string | undefined): string | undefined {
        if (!challenge) return;

        const offered = (Utils.unq(challenge) ?? '').split(',').map((x) => x.trim());
        if (offered.includes('auth')) return 'auth';
        if (offered.includes('auth-int')) return 'auth-int';

        throw new AuthError('UnsupportedChallenge', 'failed to negotiate protection quality', { qop: challenge });
    }
}

export default Authenticator;
