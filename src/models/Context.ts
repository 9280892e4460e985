/** Client-side digest state derived from one challenge. */
export interface Context {
    user: string;
    realm: string;
    nonce: string;
    ha1: string;
    userhash: string;
    proxy: boolean;
    algorithm?: string;
    qop?: string;
    cnonce?: string;
    nc: number;
    opaque?: string;
    domain?: string;
    uri?: string;
}

export interface Credentials {
    user: string;
    password?: string;
    /** Precomputed MD5(user:realm:password), used instead of the password when set. */
    hash?: string;
    realm?: string;
}

export interface DigestInput {
    ha1: string;
    method: string;
    uri: string;
    nonce: string;
    nc?: string;
    cnonce?: string;
    qop?: string;
    entity?: string;
}
