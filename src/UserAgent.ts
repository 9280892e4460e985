import { EventEmitter } from 'events';
import { IAuthenticator } from '#interfaces/IAuthenticator';
import { IMediaHandler } from '#interfaces/IMediaHandler';
import { ITransport, Protocol, Remote } from '#interfaces/ITransport';
import { Account, validateAccount } from '#models/Account';
import { CallInfo } from '#models/CallInfo';
import { Credentials } from '#models/Context';
import { Dialog } from '#models/Dialog';
import { UserAgentEvent } from '#models/Events';
import { RegistrationState } from '#models/Registration';
import { ConfigurationError, Request, Response, formatError } from '#models/index';
import { Logger, silentLogger } from '#utils/Logger';
import Authenticator from '#services/Authenticator';
import Call, { CallContext } from '#services/Call';
import Registrar, { RegistrationSettings } from '#services/Registrar';
import RequestBuilder, { ALLOW } from '#services/RequestBuilder';
import Scheduler, { TimerHandle } from '#services/Scheduler';
import SDPParser from '#services/SDPParser';
import SIPParser from '#services/SIPParser';
import StaticMediaHandler from '#services/StaticMediaHandler';
import Transport from '#services/Transport';
import TransactionManager, { ServerTransaction, TimerConfig } from '#src/TransactionManager';

export interface RetryPolicy {
    enabled: boolean;
    /** Milliseconds before the first retry; doubles per attempt. */
    delay: number;
    maxAttempts: number;
}

export interface UserAgentOptions {
    account: Account;
    transport?: ITransport;
    protocol?: Protocol;
    localAddress?: string;
    localPort?: number;
    /** Address advertised in Via and Contact instead of the bound one. */
    publicAddress?: string;
    /** `host[:port]` or a SIP URI every request is sent to. */
    outboundProxy?: string;
    timers?: Partial<TimerConfig>;
    registration?: Partial<RegistrationSettings> & { retry?: Partial<RetryPolicy> };
    /** Seconds. */
    call?: { ringTimeout?: number; sessionRefreshInterval?: number };
    media?: IMediaHandler;
    authenticator?: IAuthenticator;
    logger?: Logger;
}

const DEFAULT_REGISTRATION: RegistrationSettings = { expires: 3600, minRefresh: 30, keepAliveInterval: 0 };
const DEFAULT_RETRY: RetryPolicy = { enabled: false, delay: 5000, maxAttempts: 3 };
const DEFAULT_CALL = { ringTimeout: 180, sessionRefreshInterval: 0 };

export declare interface UserAgent {
    on(event: 'event', listener: (event: UserAgentEvent) => void): this;
    once(event: 'event', listener: (event: UserAgentEvent) => void): this;
    off(event: 'event', listener: (event: UserAgentEvent) => void): this;
}

/**
 * SIP user agent for one account. Every operation returns at once; progress
 * is reported through `'event'`.
 */
export class UserAgent extends EventEmitter {
    readonly account: Readonly<Account>;

    private sipParser = new SIPParser();
    private scheduler: Scheduler;
    private transport: ITransport;
    private transactions: TransactionManager;
    private builder: RequestBuilder;
    private registrar: Registrar;
    private media: IMediaHandler;
    private calls = new Map<string, Call>();
    private callContext: CallContext;
    private retry: RetryPolicy;
    private retryTimer?: TimerHandle;
    private outboundProxy?: Remote;
    private started = false;
    private logger: Logger;

    constructor(options: UserAgentOptions) {
        super();
        this.account = validateAccount(options.account);
        this.logger = options.logger ?? silentLogger;
        this.outboundProxy = options.outboundProxy ? this.parseHop(options.outboundProxy) : undefined;

        this.scheduler = new Scheduler(this.logger);
        this.transport =
            options.transport ??
            new Transport({
                protocol: options.protocol ?? 'UDP',
                address: options.localAddress,
                port: options.localPort ?? 5060,
                logger: this.logger,
            });

        this.transactions = new TransactionManager({
            transport: this.transport,
            scheduler: this.scheduler,
            timers: options.timers,
            logger: this.logger,
            onRequest: (rq, remote, tx) => this.onRequest(rq, remote, tx),
            onStrayResponse: (rs) => this.onStrayResponse(rs),
        });

        this.builder = new RequestBuilder(this.account, this.transport.protocol, () => this.transport.getLocalAddress(), options.publicAddress);
        this.media = options.media ?? new StaticMediaHandler({ address: options.publicAddress ?? '127.0.0.1', port: 10000 }, this.logger);

        const authenticator = options.authenticator ?? new Authenticator();
        const credentials: Credentials = {
            user: this.account.authUsername ?? this.account.username,
            password: this.account.password,
            realm: this.account.realm,
        };
        const emit = (event: UserAgentEvent) => this.publish(event);

        const call = { ...DEFAULT_CALL, ...options.call };
        this.callContext = {
            transactions: this.transactions,
            builder: this.builder,
            authenticator,
            sdp: new SDPParser(),
            media: this.media,
            scheduler: this.scheduler,
            credentials,
            settings: { ringTimeout: call.ringTimeout * 1000, sessionRefreshInterval: call.sessionRefreshInterval * 1000 },
            logger: this.logger.child({ component: 'call' }),
            destination: (dialog) => this.destination(dialog),
            emit,
            onFinished: (c) => this.onCallFinished(c),
        };

        const { retry, ...registration } = options.registration ?? {};
        this.retry = { ...DEFAULT_RETRY, ...retry };
        this.registrar = new Registrar({
            account: this.account,
            transactions: this.transactions,
            builder: this.builder,
            authenticator,
            scheduler: this.scheduler,
            credentials,
            settings: { ...DEFAULT_REGISTRATION, ...registration },
            logger: this.logger,
            destination: () => this.destination(),
            emit,
            onFailure: (failures) => this.onRegistrationFailure(failures),
        });
    }

    get registrationState(): RegistrationState {
        return this.registrar.state;
    }

    /** 64·T1, the longest a single transaction may stay unanswered, ms. */
    get transactionTimeout(): number {
        return this.transactions.timeoutInterval;
    }

    async start(): Promise<void> {
        if (this.started) return;
        await this.transport.open((data, remote) => this.scheduler.post(() => this.transactions.receive(data, remote)));
        this.started = true;
        this.logger.info({ local: this.transport.getLocalAddress(), protocol: this.transport.protocol }, 'user agent started');
    }

    /** Drops every call and transaction without signalling and closes the transport. */
    stop(): void {
        for (const call of this.calls.values()) call.terminate('user agent stopped');
        this.scheduler.cancel(this.retryTimer);
        this.registrar.stop();
        this.transactions.shutdown();
        this.scheduler.stop();
        this.transport.destroy();
        this.started = false;
        this.logger.info('user agent stopped');
    }

    register(): boolean {
        if (!this.registrar.canRegister()) return false;
        this.scheduler.cancel(this.retryTimer);
        this.scheduler.post(() => this.registrar.register());
        return true;
    }

    unregister(): boolean {
        this.scheduler.cancel(this.retryTimer);
        if (!this.registrar.canUnregister()) return false;
        this.scheduler.post(() => this.registrar.unregister());
        return true;
    }

    /** Places a call and returns its Call-ID. A bare number is dialled in the account's domain. */
    call(target: string): string {
        const call = Call.outbound(this.callContext, this.normalizeTarget(target));
        this.calls.set(call.callId, call);
        this.scheduler.post(() => call.start());
        return call.callId;
    }

    hangup(callId: string): boolean {
        return this.dispatch(callId, (call) => call.canHangup(), (call) => call.hangup());
    }

    cancel(callId: string): boolean {
        return this.dispatch(callId, (call) => call.canCancel(), (call) => call.cancel());
    }

    answer(callId: string): boolean {
        return this.dispatch(callId, (call) => call.canAnswer(), (call) => call.answer());
    }

    reject(callId: string, status = 486): boolean {
        if (status < 300 || status > 699) throw new ConfigurationError('reject needs a 3xx-6xx status', { status });
        return this.dispatch(callId, (call) => call.canReject(), (call) => call.reject(status));
    }

    getCall(callId: string): CallInfo | undefined {
        return this.calls.get(callId)?.getInfo();
    }

    getCalls(): CallInfo[] {
        return [...this.calls.values()].map((call) => call.getInfo());
    }

    private dispatch(callId: string, check: (call: Call) => boolean, action: (call: Call) => void): boolean {
        const call = this.calls.get(callId);
        if (!call || !check(call)) return false;
        this.scheduler.post(() => action(call));
        return true;
    }

    private publish(event: UserAgentEvent) {
        try {
            this.emit('event', event);
        } catch (err) {
            this.logger.error({ err: formatError(err), event: event.type }, 'event listener failed');
        }
    }

    private onRequest(rq: Request, remote: Remote, tx?: ServerTransaction) {
        const callId = rq.headers.get('call-id') ?? '';
        const call = this.calls.get(callId);
        if (call) {
            call.onRequest(rq, tx);
            return;
        }
        if (!tx) return;

        const toTag = this.sipParser.parseNameAddr(rq.headers.get('to'))?.params.tag;

        if (rq.method === 'INVITE' && !toTag) {
            const inbound = Call.inbound(this.callContext, rq, tx);
            this.calls.set(inbound.callId, inbound);
            this.logger.info({ callId, from: rq.headers.get('from'), remote }, 'incoming call');
            inbound.ring();
            return;
        }

        if (rq.method === 'OPTIONS' && !toTag) {
            const rs = this.sipParser.makeResponse(rq, 200);
            rs.headers.set('allow', ALLOW);
            rs.headers.set('accept', 'application/sdp');
            tx.respond(rs);
            return;
        }

        if (toTag || rq.method === 'CANCEL' || rq.method === 'BYE') {
            tx.respond(this.sipParser.makeResponse(rq, 481));
            return;
        }

        tx.respond(this.sipParser.makeResponse(rq, 501));
    }

    private onStrayResponse(rs: Response) {
        const call = this.calls.get(rs.headers.get('call-id') ?? '');
        if (call) call.onStrayResponse(rs);
    }

    /** Finished calls stay visible long enough to absorb late retransmissions. */
    private onCallFinished(call: Call) {
        this.scheduler.schedule(this.transactions.timeoutInterval, () => {
            if (this.calls.get(call.callId) === call) this.calls.delete(call.callId);
        });
    }

    private onRegistrationFailure(failures: number) {
        if (!this.retry.enabled) return;
        if (failures > this.retry.maxAttempts) {
            this.logger.warn({ failures }, 'registration retries exhausted');
            return;
        }

        const delay = this.retry.delay * 2 ** (failures - 1);
        this.logger.info({ delay, attempt: failures }, 'retrying registration');
        this.retryTimer = this.scheduler.schedule(delay, () => {
            this.retryTimer = undefined;
            this.registrar.register();
        });
    }

    /**
     * Next hop: the outbound proxy when set; otherwise the registrar domain out
     * of dialog, and in a dialog the first Route hop or the remote target.
     */
    private destination(dialog?: Dialog): Remote {
        if (this.outboundProxy) return this.outboundProxy;
        if (!dialog) return { host: this.account.domain, port: this.account.port };

        const hop = dialog.routeSet.length ? this.sipParser.parseNameAddr(dialog.routeSet[0])?.uri : dialog.remoteTarget;
        return this.parseHop(hop ?? dialog.remoteTarget);
    }

    private parseHop(value: string): Remote {
        const uri = this.sipParser.parseUri(value);
        if (uri) return { host: uri.host, port: uri.port ?? 5060 };

        const r = /^([^:\s]+|\[[^\]]+\])(?::(\d+))?$/.exec(value.trim());
        if (!r) throw new ConfigurationError('invalid next hop', { value });
        return { host: r[1], port: r[2] ? +r[2] : 5060 };
    }

    private normalizeTarget(target: string): string {
        const t = target.trim();
        if (/^sips?:/i.test(t)) return t;
        if (t.includes('@')) return `sip:${t}`;
        return `sip:${t}@${this.account.domain}`;
    }
}

export default UserAgent;
