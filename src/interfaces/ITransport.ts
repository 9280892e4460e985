export type Protocol = 'UDP' | 'TCP' | 'WS';

export interface Remote {
    host: string;
    port: number;
}

export type MessageHandler = (data: Buffer, remote: Remote) => void;

export interface ITransport {
    readonly protocol: Protocol;
    /** TCP and WS deliver in order without loss; no retransmission runs over them. */
    readonly reliable: boolean;
    open(onMessage: MessageHandler): Promise<void>;
    /** Rejects with a `TransportError` when the remote cannot be reached or the transport is closed. */
    send(data: Buffer, destination: Remote): Promise<void>;
    getLocalAddress(): Remote;
    destroy(): void;
}
