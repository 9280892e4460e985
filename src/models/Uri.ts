export type Params = Record<string, string | null>;

export interface Uri {
    schema: string;
    user?: string;
    password?: string;
    host: string;
    port?: number;
    params: Params;
    headers: Record<string, string>;
}

/** A `name-addr` / `addr-spec` header value such as From, To, Contact or Route. */
export interface NameAddr {
    name?: string;
    uri: string;
    params: Params;
}

export interface Via {
    version: string;
    protocol: string;
    host: string;
    port?: number;
    params: Params;
}

export interface CSeq {
    seq: number;
    method: string;
}

export interface AuthHeader {
    scheme: string;
    params: Record<string, string>;
}
