import { ITransport, MessageHandler, Protocol, Remote } from '#interfaces/ITransport';
import { Message, Request, Response, TransportError, isRequest } from '#models/index';
import SIPParser from '#services/SIPParser';

export const PEER: Remote = { host: '192.0.2.1', port: 5060 };

export interface Sent {
    message: Message;
    destination: Remote;
}

/** In-process transport: records what is sent and lets a test play the network side. */
export class FakeTransport implements ITransport {
    readonly reliable: boolean;
    readonly sent: Sent[] = [];
    unreachable = false;
    destroyed = false;

    private parser = new SIPParser();
    private handler?: MessageHandler;

    constructor(readonly protocol: Protocol = 'UDP') {
        this.reliable = protocol !== 'UDP';
    }

    async open(onMessage: MessageHandler): Promise<void> {
        this.handler = onMessage;
    }

    send(data: Buffer, destination: Remote): Promise<void> {
        if (this.unreachable) {
            return Promise.reject(new TransportError('Unreachable', 'network down', { ...destination }));
        }
        this.sent.push({ message: this.parser.parse(data), destination });
        return Promise.resolve();
    }

    getLocalAddress(): Remote {
        return { host: '10.0.0.1', port: 5060 };
    }

    destroy(): void {
        this.destroyed = true;
    }

    /** Feeds a message as if it arrived from `remote`. */
    deliver(message: Message | string, remote: Remote = PEER): void {
        if (!this.handler) throw new Error('transport not opened');
        this.handler(typeof message === 'string' ? Buffer.from(message) : this.parser.serialize(message), remote);
    }

    requests(method?: string): Request[] {
        return this.sent
            .map((s) => s.message)
            .filter((m): m is Request => isRequest(m) && (!method || m.method === method));
    }

    responses(status?: number): Response[] {
        return this.sent
            .map((s) => s.message)
            .filter((m): m is Response => !isRequest(m) && (!status || m.status === status));
    }

    last(): Message | undefined {
        return this.sent[this.sent.length - 1]?.message;
    }

    clear(): void {
        this.sent.length = 0;
    }
}

const parser = new SIPParser();

/** A response to `rq` as the far end would send it, with a To tag on anything but 100. */
export function reply(rq: Request, status: number, options: { toTag?: string; headers?: [string, string][]; content?: string } = {}): Response {
    const rs = parser.makeResponse(rq, status);
    if (status !== 100 && options.toTag !== '') {
        const to = parser.parseNameAddr(rs.headers.get('to'));
        if (to && !to.params.tag) {
            to.params.tag = options.toTag ?? 'remote-tag';
            rs.headers.set('to', parser.stringifyNameAddr(to));
        }
    }
    for (const [name, value] of options.headers ?? []) rs.headers.append(name, value);
    if (options.content) {
        rs.content = options.content;
        rs.headers.set('content-type', 'application/sdp');
    }
    return rs;
}

/** Lets promise callbacks (transport rejections) run. */
export async function flush(): Promise<void> {
    for (let i = 0; i < 5; ++i) await Promise.resolve();
}
