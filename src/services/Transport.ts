import net from 'net';
import dgram from 'dgram';
import WebSocket from 'ws';
import { ITransport, MessageHandler, Protocol, Remote } from '#interfaces/ITransport';
import { TransportError, formatError } from '#models/Errors';
import { Logger, silentLogger } from '#utils/Logger';
import { getLocalAddress } from '#utils/Tools';
import SIPParser from '#services/SIPParser';

export interface TransportOptions {
    protocol: Protocol;
    /** Address to bind; `0.0.0.0` binds every interface. */
    address?: string;
    port?: number;
    maxBytesHeaders?: number;
    maxContentLength?: number;
    logger?: Logger;
}

interface Flow {
    send(data: Buffer, remote: Remote): Promise<void>;
    local(): Remote;
    destroy(): void;
}

interface WsClient {
    socket: WebSocket;
    queue: { data: Buffer; resolve: () => void; reject: (err: TransportError) => void }[];
}

const id = (remote: Remote) => `${remote.host}:${remote.port}`;

class Transport implements ITransport {
    readonly protocol: Protocol;
    readonly reliable: boolean;

    private flow?: Flow;
    private callback?: MessageHandler;
    private closed = false;
    private sipParser = new SIPParser();
    private localAddress: string;
    private port: number;
    private logger: Logger;

    constructor(private options: TransportOptions) {
        this.protocol = options.protocol;
        this.reliable = options.protocol !== 'UDP';
        this.localAddress = options.address || '0.0.0.0';
        this.port = options.port ?? 5060;
        this.logger = (options.logger ?? silentLogger).child({ component: 'transport', protocol: this.protocol });
    }

    async open(onMessage: MessageHandler): Promise<void> {
        if (this.closed) throw new TransportError('Closed', 'transport has been destroyed');

        this.callback = onMessage;
        switch (this.protocol) {
            case 'UDP':
                this.flow = await this.makeUdpTransport();
                break;
            case 'TCP':
                this.flow = this.makeTcpTransport();
                break;
            case 'WS':
                this.flow = this.makeWsTransport();
                break;
        }
        this.logger.info(this.getLocalAddress(), 'transport open');
    }

    async send(data: Buffer, destination: Remote): Promise<void> {
        if (this.closed || !this.flow) {
            throw new TransportError('Closed', 'transport is not open', { ...destination });
        }
        this.logger.trace({ to: destination, bytes: data.length }, 'send\n%s', data.toString('utf8'));
        await this.flow.send(data, destination);
    }

    getLocalAddress(): Remote {
        const bound = this.flow?.local();
        const host = bound && bound.host !== '0.0.0.0' && bound.host !== '::' ? bound.host : this.localAddress;
        return {
            host: host === '0.0.0.0' ? getLocalAddress() : host,
            port: bound?.port ?? this.port,
        };
    }

    destroy(): void {
        if (this.closed) return;
        this.closed = true;
        const flow = this.flow;
        this.flow = undefined;
        flow?.destroy();
        this.logger.info('transport closed');
    }

    private deliver(data: Buffer, remote: Remote) {
        if (this.closed || !this.callback) return;
        this.logger.trace({ from: remote, bytes: data.length }, 'recv\n%s', data.toString('utf8'));
        this.callback(data, remote);
    }

    private async makeUdpTransport(): Promise<Flow> {
        const socket = dgram.createSocket(net.isIPv6(this.localAddress) ? 'udp6' : 'udp4');

        socket.on('message', (data, rinfo) => this.deliver(data, { host: rinfo.address, port: rinfo.port }));

        await new Promise<void>((resolve, reject) => {
            const onError = (err: Error) => reject(new TransportError('Unreachable', `cannot bind ${this.localAddress}:${this.port}: ${err.message}`));
            socket.once('error', onError);
            socket.bind(this.port, this.localAddress, () => {
                socket.removeListener('error', onError);
                resolve();
            });
        });

        socket.on('error', (err) => this.logger.warn({ err }, 'udp socket error'));

        return {
            send: (data, remote) =>
                new Promise<void>((resolve, reject) => {
                    socket.send(data, remote.port, remote.host, (err) => {
                        if (err) reject(new TransportError('Unreachable', err.message, { ...remote }));
                        else resolve();
                    });
                }),
            local: () => {
                const a = socket.address();
                return { host: a.address, port: a.port };
            },
            destroy: () => socket.close(),
        };
    }

    private makeTcpTransport(): Flow {
        const remotes = new Map<string, Promise<net.Socket>>();

        const connect = (remote: Remote) => {
            const remoteid = id(remote);
            const existing = remotes.get(remoteid);
            if (existing) return existing;

            const connection = new Promise<net.Socket>((resolve, reject) => {
                const stream = net.connect(remote.port, remote.host);

                const onFlood = () => {
                    this.logger.warn({ remote }, 'flood attempt, destroying stream');
                    stream.destroy();
                };

                stream.on('data', this.sipParser.createStreamParser((frame) => this.deliver(frame, remote), onFlood, this.options));
                stream.once('connect', () => resolve(stream));
                stream.on('error', (err) => {
                    this.logger.debug({ err, remote }, 'tcp connection error');
                    reject(new TransportError('Unreachable', err.message, { ...remote }));
                });
                stream.on('close', () => remotes.delete(remoteid));
            });

            remotes.set(remoteid, connection);
            return connection;
        };

        return {
            send: async (data, remote) => {
                const stream = await connect(remote);
                await new Promise<void>((resolve, reject) => {
                    stream.write(data, (err) => {
                        if (err) reject(new TransportError('Closed', err.message, { ...remote }));
                        else resolve();
                    });
                });
            },
            local: () => ({ host: this.localAddress, port: this.port }),
            destroy: () => {
                for (const connection of remotes.values()) {
                    connection.then(
                        (stream) => stream.destroy(),
                        (err: unknown) => this.logger.debug({ err: formatError(err) }, 'connection already failed'),
                    );
                }
                remotes.clear();
            },
        };
    }

    private makeWsTransport(): Flow {
        const clients = new Map<string, WsClient>();

        const toBuffer = (data: WebSocket.RawData): Buffer => {
            if (Buffer.isBuffer(data)) return data;
            if (Array.isArray(data)) return Buffer.concat(data);
            return Buffer.from(data);
        };

        const transmit = (client: WsClient, data: Buffer, remote: Remote) =>
            new Promise<void>((resolve, reject) => {
                client.socket.send(data, { binary: false }, (err) => {
                    if (err) reject(new TransportError('Closed', err.message, { ...remote }));
                    else resolve();
                });
            });

        const makeClient = (remote: Remote): WsClient => {
            const remoteid = id(remote);
            const existing = clients.get(remoteid);
            if (existing) return existing;

            const client: WsClient = { socket: new WebSocket(`ws://${remote.host}:${remote.port}`, 'sip'), queue: [] };

            const fail = (message: string) => {
                for (const pending of client.queue.splice(0)) {
                    pending.reject(new TransportError('Unreachable', message, { ...remote }));
                }
            };

            client.socket.on('open', () => {
                for (const pending of client.queue.splice(0)) {
                    transmit(client, pending.data, remote).then(pending.resolve, pending.reject);
                }
            });
            client.socket.on('message', (data) => this.deliver(toBuffer(data), remote));
            client.socket.on('error', (err) => {
                this.logger.debug({ err, remote }, 'websocket error');
                fail(err.message);
            });
            client.socket.on('close', () => {
                clients.delete(remoteid);
                fail('websocket closed');
            });

            clients.set(remoteid, client);
            return client;
        };

        return {
            send: (data, remote) => {
                const client = makeClient(remote);
                if (client.socket.readyState === WebSocket.OPEN) return transmit(client, data, remote);
                if (client.socket.readyState !== WebSocket.CONNECTING) {
                    return Promise.reject(new TransportError('Closed', 'websocket is closing', { ...remote }));
                }
                return new Promise<void>((resolve, reject) => client.queue.push({ data, resolve, reject }));
            },
            local: () => ({ host: this.localAddress, port: this.port }),
            destroy: () => {
                for (const client of clients.values()) client.socket.terminate();
                clients.clear();
            },
        };
    }
}

export default Transport;
