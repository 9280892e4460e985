import Headers from '#models/Headers';

export interface Request {
    kind: 'request';
    method: string;
    uri: string;
    version: string;
    headers: Headers;
    /** Body bytes, one char per byte (latin1). */
    content: string;
}
