import { Context, Credentials, DigestInput } from '#models/Context';
import { AuthHeader, Request, Response } from '#models/index';

export interface IAuthenticator {
    calculateHA1(ctx: Pick<Context, 'userhash' | 'algorithm' | 'nonce' | 'cnonce'>): string;
    calculateDigest(input: DigestInput): string;
    createContext(challenge: AuthHeader, credentials: Credentials, proxy: boolean): Context;
    signRequest(ctx: Context, rq: Request): AuthHeader;
    /**
     * Answers a 401/407 with a copy of `request` carrying credentials, the next
     * CSeq and a fresh branch. Throws `AuthError` when the request was already
     * answered once or the response offers no usable Digest challenge.
     */
    challenge(request: Request, response: Response, credentials: Credentials): Request;
}
