import Headers from '#models/Headers';
import { Request } from '#models/Request';
import { Response } from '#models/Response';

export type Message = Request | Response;

export function isRequest(msg: Message): msg is Request {
    return msg.kind === 'request';
}

export function isResponse(msg: Message): msg is Response {
    return msg.kind === 'response';
}

export { Headers };
export type { Request, Response };
export * from '#models/Uri';
export * from '#models/Errors';
