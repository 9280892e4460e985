import { Message, Request, Response } from '#models/index';

export interface StreamParserLimits {
    maxBytesHeaders?: number;
    maxContentLength?: number;
}

export interface ISIPParser {
    parse(data: Buffer | string): Message;
    serialize(msg: Message): Buffer;
    makeResponse(rq: Request, status: number, reason?: string): Response;
    createStreamParser(onFrame: (frame: Buffer) => void, onFlood: () => void, limits?: StreamParserLimits): (chunk: Buffer) => void;
}
