import Headers from '#models/Headers';

export interface Response {
    kind: 'response';
    status: number;
    reason: string;
    version: string;
    headers: Headers;
    /** Body bytes, one char per byte (latin1). */
    content: string;
}
