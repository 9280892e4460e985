import { ITransport, Remote } from '#interfaces/ITransport';
import {
    Message,
    ParseError,
    Request,
    Response,
    TransactionTimeoutError,
    TransportError,
    formatError,
    isRequest,
} from '#models/index';
import {
    ClientTransactionState,
    ServerTransactionState,
    TransactionInput,
    classify,
    initialState,
    nextState,
} from '#models/Transaction';
import { Logger, silentLogger } from '#utils/Logger';
import { deriveRequest } from '#services/RequestBuilder';
import Scheduler, { TimerHandle } from '#services/Scheduler';
import SIPParser from '#services/SIPParser';

export interface TimerConfig {
    t1: number;
    t2: number;
    t4: number;
    /** Linger of a Completed INVITE client transaction on unreliable transports. */
    timerD: number;
}

export const DEFAULT_TIMERS: TimerConfig = { t1: 500, t2: 4000, t4: 5000, timerD: 32000 };

export type TransactionOutcome =
    | { type: 'provisional'; response: Response }
    | { type: 'final'; response: Response }
    | { type: 'timeout'; error: TransactionTimeoutError }
    | { type: 'transport-error'; error: TransportError };

export type TransactionUser = (outcome: TransactionOutcome) => void;

export interface ServerTransaction {
    readonly request: Request;
    readonly remote: Remote;
    readonly state: ServerTransactionState;
    respond(response: Response): void;
}

export interface TransactionManagerOptions {
    transport: ITransport;
    scheduler: Scheduler;
    timers?: Partial<TimerConfig>;
    logger?: Logger;
    /** New inbound requests; `tx` is absent for an ACK to a 2xx, which has no transaction. */
    onRequest?: (request: Request, remote: Remote, tx?: ServerTransaction) => void;
    /** Responses that match no live client transaction, such as retransmitted 2xx to INVITE. */
    onStrayResponse?: (response: Response, remote: Remote) => void;
}

interface ClientTransaction {
    key: string;
    invite: boolean;
    request: Request;
    data: Buffer;
    destination: Remote;
    state: ClientTransactionState;
    user: TransactionUser;
    interval: number;
    retransmit?: TimerHandle;
    timeout?: TimerHandle;
    ack?: Buffer;
}

interface ServerEntry extends ServerTransaction {
    key: string;
    state: ServerTransactionState;
    last?: Buffer;
    interval: number;
    retransmit?: TimerHandle;
    timeout?: TimerHandle;
}

class TransactionManager {
    private clientTransactions: Map<string, ClientTransaction> = new Map();
    private serverTransactions: Map<string, ServerEntry> = new Map();
    private sipParser = new SIPParser();
    private transport: ITransport;
    private scheduler: Scheduler;
    private timers: TimerConfig;
    private logger: Logger;

    constructor(private options: TransactionManagerOptions) {
        this.transport = options.transport;
        this.scheduler = options.scheduler;
        this.timers = { ...DEFAULT_TIMERS, ...options.timers };
        this.logger = (options.logger ?? silentLogger).child({ component: 'transaction' });
    }

    get reliable(): boolean {
        return this.transport.reliable;
    }

    /** 64·T1: Timers B, F, H and J. */
    get timeoutInterval(): number {
        return 64 * this.timers.t1;
    }

    get t1(): number {
        return this.timers.t1;
    }

    get t2(): number {
        return this.timers.t2;
    }

    /**
     * Starts a client transaction for `request` and returns its key. The owner
     * hears about it only through `user`: provisionals, then exactly one of a
     * final response, a timeout or a transport error.
     */
    sendRequest(request: Request, destination: Remote, user: TransactionUser): string {
        this.sipParser.validate(request);
        if (request.method === 'ACK') {
            throw new ParseError('MalformedStartLine', 'ACK is sent outside client transactions');
        }

        const key = this.generateTransactionId(request);
        if (this.clientTransactions.has(key)) {
            throw new ParseError('MalformedHeader', 'branch already in use', { key });
        }

        const invite = request.method === 'INVITE';
        const tx: ClientTransaction = {
            key,
            invite,
            request,
            data: this.sipParser.serialize(request),
            destination,
            state: initialState(invite),
            user,
            interval: this.timers.t1,
        };
        this.clientTransactions.set(key, tx);
        this.logger.debug({ key, method: request.method, destination }, 'client transaction created');

        this.transmit(tx, tx.data);
        if (!this.reliable) {
            tx.retransmit = this.scheduler.schedule(tx.interval, () => this.onRetransmit(tx));
        }
        tx.timeout = this.scheduler.schedule(this.timeoutInterval, () => this.onTimeout(tx));

        return key;
    }

    /** Fire-and-forget send for messages outside any transaction (2xx ACK, 2xx retransmissions). */
    sendStateless(message: Message, destination: Remote): void {
        this.transport.send(this.sipParser.serialize(message), destination).catch((err: unknown) => {
            this.logger.warn({ err: formatError(err), destination }, 'stateless send failed');
        });
    }

    /** Drops a client transaction without notifying its owner. */
    abandon(key: string): void {
        const tx = this.clientTransactions.get(key);
        if (tx) this.terminate(tx);
    }

    findServer(request: Request, method: string = request.method): ServerTransaction | undefined {
        return this.serverTransactions.get(this.generateTransactionId(request, method));
    }

    clientCount(): number {
        return this.clientTransactions.size;
    }

    serverCount(): number {
        return this.serverTransactions.size;
    }

    /** Entry point for bytes from the transport; runs inside a scheduler task. */
    receive(data: Buffer, remote: Remote): void {
        let msg: Message;
        try {
            msg = this.sipParser.parse(data);
        } catch (err) {
            this.logger.warn({ err: formatError(err), remote }, 'dropping unparseable message');
            return;
        }

        if (isRequest(msg)) this.onRequest(msg, remote);
        else this.onResponse(msg, remote);
    }

    shutdown(): void {
        for (const tx of [...this.clientTransactions.values()]) this.terminate(tx);
        for (const tx of [...this.serverTransactions.values()]) this.terminateServer(tx);
    }

    private generateTransactionId(msg: Message, method?: string): string {
        const via = this.sipParser.parseVia(msg.headers.get('via'));
        const cseq = this.sipParser.parseCSeq(msg.headers.get('cseq'));
        const branch = via?.params.branch ?? `${msg.headers.get('call-id')}:${cseq?.seq}`;
        return [branch, method ?? cseq?.method].join(':');
    }

    private transmit(tx: ClientTransaction, data: Buffer) {
        this.transport.send(data, tx.destination).catch((err: unknown) => {
            this.scheduler.post(() => this.onTransportError(tx, err));
        });
    }

    private transition(tx: ClientTransaction, input: TransactionInput) {
        const previous = tx.state;
        tx.state = nextState(tx.invite, tx.state, input);
        if (previous !== tx.state) {
            this.logger.debug({ key: tx.key, previous, state: tx.state }, 'client transaction state');
        }
    }

    private onRetransmit(tx: ClientTransaction) {
        tx.retransmit = undefined;
        if (tx.state === 'Calling') {
            tx.interval *= 2;
        } else if (tx.state === 'Trying') {
            tx.interval = Math.min(tx.interval * 2, this.timers.t2);
        } else if (tx.state === 'Proceeding' && !tx.invite) {
            tx.interval = this.timers.t2;
        } else {
            return;
        }

        this.logger.debug({ key: tx.key }, 'retransmitting request');
        this.transmit(tx, tx.data);
        tx.retransmit = this.scheduler.schedule(tx.interval, () => this.onRetransmit(tx));
    }

    private onTimeout(tx: ClientTransaction) {
        tx.timeout = undefined;
        if (tx.state !== 'Calling' && tx.state !== 'Trying' && tx.state !== 'Proceeding') return;

        this.logger.warn({ key: tx.key, method: tx.request.method }, 'transaction timeout');
        this.transition(tx, 'timeout');
        this.terminate(tx);

        const branch = this.sipParser.parseVia(tx.request.headers.get('via'))?.params.branch ?? '';
        tx.user({ type: 'timeout', error: new TransactionTimeoutError(tx.request.method, branch) });
    }

    private onTransportError(tx: ClientTransaction, err: unknown) {
        if (tx.state === 'Terminated') return;

        if (tx.state === 'Completed') {
            // The final response was already delivered; a failed ACK or late send ends the transaction quietly.
            this.logger.warn({ key: tx.key, err: formatError(err) }, 'transport error after final response');
            this.terminate(tx);
            return;
        }

        this.logger.warn({ key: tx.key, err: formatError(err) }, 'transport error');
        this.transition(tx, 'transport-error');
        this.terminate(tx);

        const error = err instanceof TransportError ? err : new TransportError('Unreachable', formatError(err), { ...tx.destination });
        tx.user({ type: 'transport-error', error });
    }

    private onResponse(rs: Response, remote: Remote) {
        const tx = this.clientTransactions.get(this.generateTransactionId(rs));
        if (!tx || tx.state === 'Terminated') {
            this.logger.debug({ status: rs.status, remote }, 'response matches no transaction');
            this.options.onStrayResponse?.(rs, remote);
            return;
        }

        const input = classify(rs.status);

        if (tx.state === 'Completed') {
            if (tx.ack && input === 'failure') this.transmit(tx, tx.ack);
            return;
        }

        this.transition(tx, input);

        if (input === 'provisional') {
            if (tx.invite) {
                this.scheduler.cancel(tx.retransmit);
                this.scheduler.cancel(tx.timeout);
                tx.retransmit = tx.timeout = undefined;
            } else if (tx.retransmit) {
                tx.interval = this.timers.t2;
            }
            tx.user({ type: 'provisional', response: rs });
            return;
        }

        this.scheduler.cancel(tx.retransmit);
        this.scheduler.cancel(tx.timeout);
        tx.retransmit = tx.timeout = undefined;

        if (tx.invite && input === 'failure') {
            tx.ack = this.sipParser.serialize(deriveRequest(tx.request, 'ACK', rs));
            this.transmit(tx, tx.ack);
        }

        if (tx.state === 'Completed') {
            // Timer D for INVITE; Timer K is T4 (RFC 3261 17.1.2.2). Both are zero on reliable transports.
            const linger = this.reliable ? 0 : tx.invite ? this.timers.timerD : this.timers.t4;
            if (linger > 0) {
                tx.timeout = this.scheduler.schedule(linger, () => {
                    this.transition(tx, 'linger-expired');
                    this.terminate(tx);
                });
            } else {
                this.transition(tx, 'linger-expired');
                this.terminate(tx);
            }
        } else {
            this.terminate(tx);
        }

        tx.user({ type: 'final', response: rs });
    }

    private terminate(tx: ClientTransaction) {
        this.scheduler.cancel(tx.retransmit);
        this.scheduler.cancel(tx.timeout);
        tx.retransmit = tx.timeout = undefined;
        tx.state = 'Terminated';
        if (this.clientTransactions.get(tx.key) === tx) this.clientTransactions.delete(tx.key);
    }

    private onRequest(rq: Request, remote: Remote) {
        if (rq.method === 'ACK') {
            const invite = this.serverTransactions.get(this.generateTransactionId(rq, 'INVITE'));
            if (invite && invite.state === 'Completed') {
                this.scheduler.cancel(invite.retransmit);
                this.scheduler.cancel(invite.timeout);
                invite.state = 'Confirmed';
                const timerI = this.reliable ? 0 : this.timers.t4;
                invite.timeout = this.scheduler.schedule(timerI, () => this.terminateServer(invite));
                return;
            }
            if (invite) return;
            this.options.onRequest?.(rq, remote);
            return;
        }

        const key = this.generateTransactionId(rq);
        const existing = this.serverTransactions.get(key);
        if (existing) {
            this.logger.debug({ key }, 'request retransmission absorbed');
            if (existing.last) this.sendServer(existing, existing.last);
            return;
        }

        const tx: ServerEntry = {
            key,
            request: rq,
            remote,
            state: 'Proceeding',
            interval: this.timers.t1,
            respond: (rs: Response) => this.respond(tx, rs),
        };
        this.serverTransactions.set(key, tx);

        if (this.options.onRequest) {
            this.options.onRequest(rq, remote, tx);
        } else {
            tx.respond(this.sipParser.makeResponse(rq, 501));
        }
    }

    private respond(tx: ServerEntry, rs: Response) {
        if (tx.state !== 'Proceeding') {
            this.logger.warn({ key: tx.key, status: rs.status, state: tx.state }, 'response after final ignored');
            return;
        }

        tx.last = this.sipParser.serialize(rs);
        this.sendServer(tx, tx.last);

        const input = classify(rs.status);
        if (input === 'provisional') return;

        const invite = tx.request.method === 'INVITE';
        if (invite && input === 'success') {
            this.terminateServer(tx);
            return;
        }

        tx.state = 'Completed';
        if (invite) {
            if (!this.reliable) {
                tx.retransmit = this.scheduler.schedule(tx.interval, () => this.onServerRetransmit(tx));
            }
            tx.timeout = this.scheduler.schedule(this.timeoutInterval, () => {
                this.logger.warn({ key: tx.key }, 'no ACK for final response');
                this.terminateServer(tx);
            });
        } else {
            tx.timeout = this.scheduler.schedule(this.reliable ? 0 : this.timeoutInterval, () => this.terminateServer(tx));
        }
    }

    private onServerRetransmit(tx: ServerEntry) {
        tx.retransmit = undefined;
        if (tx.state !== 'Completed' || !tx.last) return;

        this.sendServer(tx, tx.last);
        tx.interval = Math.min(tx.interval * 2, this.timers.t2);
        tx.retransmit = this.scheduler.schedule(tx.interval, () => this.onServerRetransmit(tx));
    }

    private sendServer(tx: ServerEntry, data: Buffer) {
        this.transport.send(data, tx.remote).catch((err: unknown) => {
            this.logger.warn({ key: tx.key, err: formatError(err) }, 'response send failed');
        });
    }

    private terminateServer(tx: ServerEntry) {
        this.scheduler.cancel(tx.retransmit);
        this.scheduler.cancel(tx.timeout);
        tx.retransmit = tx.timeout = undefined;
        tx.state = 'Terminated';
        if (this.serverTransactions.get(tx.key) === tx) this.serverTransactions.delete(tx.key);
    }
}

export default TransactionManager;
