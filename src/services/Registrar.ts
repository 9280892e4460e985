import { IAuthenticator } from '#interfaces/IAuthenticator';
import { Remote } from '#interfaces/ITransport';
import { Account } from '#models/Account';
import { Credentials } from '#models/Context';
import { UserAgentEvent } from '#models/Events';
import { RegistrationContext, RegistrationState } from '#models/Registration';
import { AuthError, Request, Response, SipError, formatError } from '#models/index';
import { Logger } from '#utils/Logger';
import { generateCallId, generateTag } from '#utils/Tools';
import RequestBuilder, { ALLOW } from '#services/RequestBuilder';
import Scheduler, { TimerHandle } from '#services/Scheduler';
import SIPParser from '#services/SIPParser';
import TransactionManager, { TransactionOutcome } from '#src/TransactionManager';

export interface RegistrationSettings {
    /** Requested binding lifetime, seconds. */
    expires: number;
    /** Refresh floor, seconds. */
    minRefresh: number;
    /** Seconds between OPTIONS pings while registered; 0 disables. */
    keepAliveInterval: number;
}

export interface RegistrarContext {
    account: Account;
    transactions: TransactionManager;
    builder: RequestBuilder;
    authenticator: IAuthenticator;
    scheduler: Scheduler;
    credentials: Credentials;
    settings: RegistrationSettings;
    logger: Logger;
    destination(): Remote;
    emit(event: UserAgentEvent): void;
    /** Called after every failure with the count of consecutive failures. */
    onFailure?(failures: number): void;
}

/**
 * Seconds after a successful REGISTER at which the binding is renewed:
 * 90% of the granted lifetime, never under the floor, and half the lifetime
 * when the lifetime itself is within the floor.
 */
export function refreshDelay(expires: number, floor: number): number {
    if (expires <= floor) return expires / 2;
    return Math.max(0.9 * expires, floor);
}

class Registrar {
    private reg: RegistrationContext = { state: RegistrationState.Unregistered, cseq: 0, failures: 0 };
    private sipParser = new SIPParser();
    private callId: string;
    private localTag = generateTag();
    private desiredExpires: number;
    private requestedExpires = 0;
    private outstanding = false;
    private pendingUnregister = false;
    private minExpiresRetried = false;
    private refreshTimer?: TimerHandle;
    private keepAliveTimer?: TimerHandle;
    private logger: Logger;

    constructor(private ctx: RegistrarContext) {
        this.callId = generateCallId(ctx.builder.sentBy().host);
        this.desiredExpires = ctx.settings.expires;
        this.logger = ctx.logger.child({ component: 'registrar', aor: `${ctx.account.username}@${ctx.account.domain}` });
    }

    get state(): RegistrationState {
        return this.reg.state;
    }

    getContext(): RegistrationContext {
        return { ...this.reg };
    }

    canRegister(): boolean {
        return !this.outstanding;
    }

    /** Starts a registration, or refreshes a live one right away. */
    register(): boolean {
        if (!this.canRegister()) return false;

        this.cancelTimers();
        this.minExpiresRetried = false;
        this.send(this.desiredExpires);
        return true;
    }

    canUnregister(): boolean {
        return this.outstanding ? this.requestedExpires !== 0 : this.reg.state === RegistrationState.Registered;
    }

    /** Removes the binding; waits for an outstanding REGISTER first. */
    unregister(): boolean {
        if (!this.canUnregister()) return false;

        if (this.outstanding) {
            this.logger.debug('unregister deferred until the outstanding REGISTER completes');
            this.pendingUnregister = true;
            return true;
        }

        this.cancelTimers();
        this.send(0);
        return true;
    }

    stop(): void {
        this.cancelTimers();
        this.pendingUnregister = false;
    }

    private send(expires: number) {
        this.outstanding = true;
        this.requestedExpires = expires;
        const rq = this.buildRegister(expires);
        this.setState(expires === 0 ? RegistrationState.Unregistering : RegistrationState.Registering);
        this.transmit(rq);
    }

    private buildRegister(expires: number): Request {
        const { account, builder } = this.ctx;
        this.reg.cseq += 1;

        return builder.request({
            method: 'REGISTER',
            uri: account.port === 5060 ? `sip:${account.domain}` : `sip:${account.domain}:${account.port}`,
            from: builder.identity(this.localTag),
            to: builder.identity(),
            callId: this.callId,
            cseq: this.reg.cseq,
            contact: true,
            headers: [
                ['expires', String(expires)],
                ['allow', ALLOW],
            ],
        });
    }

    private transmit(rq: Request) {
        this.ctx.transactions.sendRequest(rq, this.ctx.destination(), (outcome) => this.onOutcome(rq, outcome));
    }

    private onOutcome(rq: Request, outcome: TransactionOutcome) {
        switch (outcome.type) {
            case 'provisional':
                return;
            case 'timeout':
            case 'transport-error':
                this.fail(formatError(outcome.error), outcome.error);
                return;
        }

        const rs = outcome.response;
        if (rs.status < 300) {
            this.onSuccess(rs);
        } else if (rs.status === 401 || rs.status === 407) {
            this.onChallenge(rq, rs);
        } else if (rs.status === 423) {
            this.onIntervalTooBrief(rs);
        } else {
            this.fail(`${rs.status} ${rs.reason}`.trim());
        }
    }

    private onSuccess(rs: Response) {
        this.outstanding = false;
        this.reg.failures = 0;

        if (this.requestedExpires === 0) {
            this.reg.expires = undefined;
            this.reg.refreshAt = undefined;
            this.setState(RegistrationState.Unregistered);
            return;
        }

        const expires = this.grantedExpires(rs);
        this.learnAddress(rs);

        if (expires <= 0) {
            this.fail('registrar granted no binding');
            return;
        }

        const delay = refreshDelay(expires, this.ctx.settings.minRefresh) * 1000;
        this.reg.expires = expires;
        this.reg.refreshAt = Date.now() + delay;
        this.refreshTimer = this.ctx.scheduler.schedule(delay, () => this.refresh());
        this.scheduleKeepAlive();
        this.setState(RegistrationState.Registered);

        if (this.pendingUnregister) {
            this.pendingUnregister = false;
            this.unregister();
        }
    }

    private onChallenge(rq: Request, rs: Response) {
        try {
            const retry = this.ctx.authenticator.challenge(rq, rs, this.ctx.credentials);
            this.reg.cseq = this.sipParser.parseCSeq(retry.headers.get('cseq'))?.seq ?? this.reg.cseq + 1;
            this.setState(this.reg.state);
            this.transmit(retry);
        } catch (err) {
            if (!(err instanceof AuthError)) throw err;
            this.fail('authentication failed', err);
        }
    }

    private onIntervalTooBrief(rs: Response) {
        const min = Number(rs.headers.get('min-expires'));
        if (this.minExpiresRetried || !Number.isInteger(min) || min <= 0) {
            this.fail('423 interval too brief');
            return;
        }

        this.minExpiresRetried = true;
        this.desiredExpires = Math.max(this.desiredExpires, min);
        this.requestedExpires = this.desiredExpires;
        this.logger.info({ expires: this.desiredExpires }, 'retrying with registrar minimum expiry');

        const retry = this.buildRegister(this.desiredExpires);
        this.setState(this.reg.state);
        this.transmit(retry);
    }

    private fail(reason: string, error?: SipError) {
        this.outstanding = false;
        this.pendingUnregister = false;
        this.cancelTimers();
        this.reg.failures += 1;
        this.reg.expires = undefined;
        this.reg.refreshAt = undefined;

        this.logger.warn({ reason, failures: this.reg.failures }, 'registration failed');
        this.setState(RegistrationState.Failed, reason);
        this.ctx.onFailure?.(this.reg.failures);
    }

    private refresh() {
        this.refreshTimer = undefined;
        if (this.outstanding || this.reg.state !== RegistrationState.Registered) return;

        this.logger.debug('refreshing registration');
        this.cancelTimers();
        this.minExpiresRetried = false;
        this.send(this.desiredExpires);
    }

    private scheduleKeepAlive() {
        const interval = this.ctx.settings.keepAliveInterval;
        if (interval <= 0) return;
        this.keepAliveTimer = this.ctx.scheduler.schedule(interval * 1000, () => this.keepAlive());
    }

    private keepAlive() {
        this.keepAliveTimer = undefined;
        if (this.reg.state !== RegistrationState.Registered) return;

        const { account, builder } = this.ctx;
        const options = builder.request({
            method: 'OPTIONS',
            uri: `sip:${account.domain}`,
            from: builder.identity(generateTag()),
            to: `<sip:${account.domain}>`,
            callId: generateCallId(builder.sentBy().host),
            cseq: 1,
            headers: [['accept', 'application/sdp']],
        });

        this.ctx.transactions.sendRequest(options, this.ctx.destination(), (outcome) => {
            if (outcome.type === 'final') this.logger.trace({ status: outcome.response.status }, 'keep-alive answered');
            else if (outcome.type !== 'provisional') this.logger.warn({ err: formatError(outcome.error) }, 'keep-alive failed');
        });
        this.scheduleKeepAlive();
    }

    /** Contact `expires` of our own binding, else the Expires header, else what was asked for. */
    private grantedExpires(rs: Response): number {
        const sentBy = this.ctx.builder.sentBy();

        for (const value of rs.headers.getAll('contact')) {
            const contact = this.sipParser.parseNameAddr(value);
            const uri = this.sipParser.parseUri(contact?.uri);
            const expires = contact?.params.expires;
            if (!uri || typeof expires !== 'string' || uri.user !== this.ctx.account.username) continue;
            if (uri.host === sentBy.host && (uri.port ?? 5060) === sentBy.port) return Number(expires);
        }

        const header = Number(rs.headers.get('expires'));
        if (rs.headers.has('expires') && Number.isFinite(header)) return header;

        return this.requestedExpires;
    }

    /** Adopts `received`/`rport` from the top Via so later Contacts reach us through NAT. */
    private learnAddress(rs: Response) {
        const via = this.sipParser.parseVia(rs.headers.get('via'));
        if (!via) return;

        const received = via.params.received;
        const rport = Number(via.params.rport);
        const current = this.ctx.builder.sentBy();
        const learnt: Remote = {
            host: typeof received === 'string' ? received : current.host,
            port: Number.isInteger(rport) && rport > 0 ? rport : current.port,
        };

        if (learnt.host !== current.host || learnt.port !== current.port) {
            this.logger.info({ address: learnt }, 'learnt public address');
            this.ctx.builder.setAdvertisedAddress(learnt);
        }
    }

    private setState(state: RegistrationState, reason?: string) {
        const previous = this.reg.state;
        this.reg.state = state;
        this.logger.info({ previous, state, expires: this.reg.expires }, 'registration state');
        this.ctx.emit({ type: 'RegistrationStateChanged', previous, state, expires: this.reg.expires, reason });
    }

    private cancelTimers() {
        this.ctx.scheduler.cancel(this.refreshTimer);
        this.ctx.scheduler.cancel(this.keepAliveTimer);
        this.refreshTimer = this.keepAliveTimer = undefined;
    }
}

export default Registrar;
