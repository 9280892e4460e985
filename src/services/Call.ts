import { IAuthenticator } from '#interfaces/IAuthenticator';
import { IMediaHandler } from '#interfaces/IMediaHandler';
import { ISDPParser, SessionVersion } from '#interfaces/ISDPParser';
import { Remote } from '#interfaces/ITransport';
import { CallDirection, CallInfo, CallState, canTransition, isFinished } from '#models/CallInfo';
import { Credentials } from '#models/Context';
import { Dialog } from '#models/Dialog';
import { UserAgentEvent } from '#models/Events';
import { NegotiatedMedia } from '#models/Media';
import { AuthError, ProtocolViolationError, Request, Response, SipError, formatError } from '#models/index';
import { Logger } from '#utils/Logger';
import { generateCallId, generateTag } from '#utils/Tools';
import RequestBuilder, { ALLOW } from '#services/RequestBuilder';
import Scheduler, { TimerHandle } from '#services/Scheduler';
import SIPParser from '#services/SIPParser';
import TransactionManager, { ServerTransaction, TransactionOutcome } from '#src/TransactionManager';

export interface CallSettings {
    /** Milliseconds a call may ring before it is given up. */
    ringTimeout: number;
    /** Milliseconds between re-INVITEs of a connected outbound call; 0 disables. */
    sessionRefreshInterval: number;
}

export interface CallContext {
    transactions: TransactionManager;
    builder: RequestBuilder;
    authenticator: IAuthenticator;
    sdp: ISDPParser;
    media: IMediaHandler;
    scheduler: Scheduler;
    credentials: Credentials;
    settings: CallSettings;
    logger: Logger;
    /** Next hop for requests of this call, in or out of its dialog. */
    destination(dialog?: Dialog): Remote;
    emit(event: UserAgentEvent): void;
    onFinished(call: Call): void;
}

type Completion = Exclude<TransactionOutcome, { type: 'provisional' }>;

const sipParser = new SIPParser();

const uriOf = (value: string | undefined): string | undefined => sipParser.parseNameAddr(value)?.uri;

const tagOf = (value: string | undefined): string | undefined => {
    const tag = sipParser.parseNameAddr(value)?.params.tag;
    return typeof tag === 'string' ? tag : undefined;
};

const cseqOf = (msg: Request | Response): number => sipParser.parseCSeq(msg.headers.get('cseq'))?.seq ?? 0;

/**
 * One voice session: the INVITE dialog, its media hand-off and its teardown.
 * Every method runs inside a scheduler task.
 */
class Call {
    readonly callId: string;
    readonly direction: CallDirection;

    private info: CallInfo;
    private dialog?: Dialog;
    private logger: Logger;

    private invite?: Request;
    private inviteKey?: string;
    private cseq = 1;
    private localTag = generateTag();
    private session: SessionVersion;
    private localSdp?: string;
    private remoteOffer?: string;
    private ack?: Request;

    private provisionalReceived = false;
    private finalReceived = false;
    private cancelRequested = false;
    private cancelSent = false;
    private noAnswer = false;
    private hangupRequested = false;
    private byeSent = false;
    private mediaStarted = false;

    private serverTx?: ServerTransaction;
    private answerResponse?: Response;
    private answerInterval = 0;

    private ringTimer?: TimerHandle;
    private cancelGuard?: TimerHandle;
    private refreshTimer?: TimerHandle;
    private answerRetransmit?: TimerHandle;
    private answerTimeout?: TimerHandle;

    private constructor(private ctx: CallContext, callId: string, direction: CallDirection, peerUri: string) {
        this.callId = callId;
        this.direction = direction;
        this.info = { callId, direction, peerUri, state: CallState.Idle, startedAt: new Date() };
        this.session = { id: String(Date.now()), version: 1 };
        this.logger = ctx.logger.child({ callId, direction });
    }

    static outbound(ctx: CallContext, target: string): Call {
        return new Call(ctx, generateCallId(ctx.builder.sentBy().host), 'Outbound', target);
    }

    static inbound(ctx: CallContext, request: Request, tx: ServerTransaction): Call {
        const call = new Call(ctx, request.headers.get('call-id') ?? '', 'Inbound', uriOf(request.headers.get('from')) ?? '');
        call.serverTx = tx;
        call.invite = request;
        return call;
    }

    get state(): CallState {
        return this.info.state;
    }

    get finished(): boolean {
        return isFinished(this.info.state);
    }

    getInfo(): CallInfo {
        return {
            ...this.info,
            dialog: this.dialog && { ...this.dialog, routeSet: [...this.dialog.routeSet] },
        };
    }

    /** Sends the initial INVITE of an outbound call. */
    start(): void {
        const local = this.ctx.media.getLocalMedia(this.callId);
        this.localSdp = this.ctx.sdp.createOffer(local, this.session);

        const invite = this.ctx.builder.request({
            method: 'INVITE',
            uri: this.info.peerUri,
            from: this.ctx.builder.identity(this.localTag),
            to: sipParser.stringifyNameAddr({ uri: this.info.peerUri, params: {} }),
            callId: this.callId,
            cseq: this.cseq,
            contact: true,
            headers: [['allow', ALLOW]],
            content: this.localSdp,
        });

        this.setState(CallState.Calling);
        this.ringTimer = this.ctx.scheduler.schedule(this.ctx.settings.ringTimeout, () => this.onRingTimeout());
        this.sendInvite(invite);
    }

    /** Answers a fresh inbound INVITE with 100 and 180, then reports it. */
    ring(): void {
        const request = this.invite;
        const tx = this.serverTx;
        if (!request || !tx) return;

        const cseq = cseqOf(request);
        this.dialog = {
            callId: this.callId,
            localTag: this.localTag,
            remoteTag: tagOf(request.headers.get('from')),
            localCseq: 0,
            remoteCseq: cseq,
            localUri: uriOf(request.headers.get('to')) ?? request.uri,
            remoteUri: this.info.peerUri,
            remoteTarget: uriOf(request.headers.get('contact')) ?? this.info.peerUri,
            routeSet: request.headers.getAll('record-route'),
            state: 'Early',
        };
        this.remoteOffer = request.content || undefined;

        tx.respond(sipParser.makeResponse(request, 100));
        tx.respond(this.localResponse(request, 180));

        this.setState(CallState.Ringing);
        this.ringTimer = this.ctx.scheduler.schedule(this.ctx.settings.ringTimeout, () => this.onRingTimeout());
        this.ctx.emit({ type: 'IncomingCall', callId: this.callId, from: this.info.peerUri });
    }

    canCancel(): boolean {
        return this.direction === 'Outbound' && !this.finalReceived && (this.state === CallState.Calling || this.state === CallState.Ringing);
    }

    /** Returns false once a final response has arrived. */
    cancel(): boolean {
        if (!this.canCancel()) return false;
        if (this.cancelRequested) return true;

        this.cancelRequested = true;
        this.logger.info(this.provisionalReceived ? 'cancelling call' : 'cancel deferred until a provisional response');
        if (this.provisionalReceived) this.sendCancel();
        return true;
    }

    canHangup(): boolean {
        return !this.finished && !this.byeSent;
    }

    hangup(): boolean {
        if (!this.canHangup()) return false;

        if (this.direction === 'Outbound' && this.state !== CallState.Connected) {
            return this.cancel();
        }

        if (this.direction === 'Inbound' && this.state === CallState.Ringing) {
            if (!this.answerResponse) return this.reject(603);
            this.hangupRequested = true;
            return true;
        }

        this.sendBye();
        return true;
    }

    canAnswer(): boolean {
        return this.direction === 'Inbound' && this.state === CallState.Ringing && !this.answerResponse;
    }

    answer(): boolean {
        const request = this.invite;
        const tx = this.serverTx;
        if (!this.canAnswer() || !request || !tx) return false;

        this.ctx.scheduler.cancel(this.ringTimer);
        const local = this.ctx.media.getLocalMedia(this.callId);

        let media: NegotiatedMedia | undefined;
        if (this.remoteOffer) {
            const answer = this.ctx.sdp.createAnswer(this.remoteOffer, local, this.session);
            if (!answer) {
                tx.respond(this.localResponse(request, 488));
                this.end(CallState.Failed, 'no common codec');
                return false;
            }
            this.localSdp = answer.sdp;
            media = answer.media;
        } else {
            this.localSdp = this.ctx.sdp.createOffer(local, this.session);
        }
        this.info.media = media;

        const rs = this.localResponse(request, 200, this.localSdp);
        this.answerResponse = rs;
        tx.respond(rs);

        if (!this.ctx.transactions.reliable) {
            this.answerInterval = this.ctx.transactions.t1;
            this.answerRetransmit = this.ctx.scheduler.schedule(this.answerInterval, () => this.retransmitAnswer());
        }
        this.answerTimeout = this.ctx.scheduler.schedule(this.ctx.transactions.timeoutInterval, () => {
            this.logger.warn('no ACK for 200 OK, ending call');
            this.ctx.scheduler.cancel(this.answerRetransmit);
            if (this.dialog) this.dialog.state = 'Confirmed';
            this.sendBye();
        });

        this.logger.info('call answered');
        return true;
    }

    canReject(): boolean {
        return this.canAnswer();
    }

    reject(status = 486): boolean {
        const request = this.invite;
        const tx = this.serverTx;
        if (!this.canReject() || !request || !tx) return false;

        tx.respond(this.localResponse(request, status));
        this.end(CallState.Disconnected, `rejected (${status})`);
        return true;
    }

    /** Responses for this Call-ID that outlived their transaction. */
    onStrayResponse(rs: Response): void {
        const cseq = sipParser.parseCSeq(rs.headers.get('cseq'));
        if (this.direction === 'Outbound' && cseq?.method === 'INVITE' && rs.status >= 200 && rs.status < 300) {
            this.onSuccess(rs);
        }
    }

    /** Requests inside this call's dialog, plus CANCEL of its INVITE. */
    onRequest(rq: Request, tx?: ServerTransaction): void {
        if (rq.method === 'ACK') {
            this.onAck(rq);
            return;
        }
        if (!tx) return;

        if (rq.method === 'CANCEL') {
            tx.respond(sipParser.makeResponse(rq, 200));
            this.onRemoteCancel();
            return;
        }

        const dialog = this.dialog;
        if (!dialog || dialog.state === 'Terminated') {
            tx.respond(sipParser.makeResponse(rq, 481));
            return;
        }

        const cseq = cseqOf(rq);
        if (dialog.remoteCseq !== undefined && cseq < dialog.remoteCseq) {
            tx.respond(sipParser.makeResponse(rq, 500, 'CSeq Out Of Order'));
            return;
        }
        dialog.remoteCseq = cseq;

        switch (rq.method) {
            case 'BYE':
                tx.respond(sipParser.makeResponse(rq, 200));
                this.end(CallState.Disconnected, 'remote hangup');
                break;
            case 'INVITE': {
                dialog.remoteTarget = uriOf(rq.headers.get('contact')) ?? dialog.remoteTarget;
                tx.respond(this.localResponse(rq, 200, this.localSdp));
                break;
            }
            case 'OPTIONS': {
                const rs = sipParser.makeResponse(rq, 200);
                rs.headers.set('allow', ALLOW);
                tx.respond(rs);
                break;
            }
            case 'INFO':
                tx.respond(sipParser.makeResponse(rq, 200));
                break;
            default:
                tx.respond(sipParser.makeResponse(rq, 501));
                break;
        }
    }

    /** Tears the call down without signalling, e.g. when the engine stops. */
    terminate(reason: string): void {
        if (this.inviteKey && !this.finalReceived) this.ctx.transactions.abandon(this.inviteKey);
        this.end(CallState.Disconnected, reason);
    }

    private setState(state: CallState): boolean {
        const previous = this.info.state;
        if (!canTransition(previous, state)) {
            this.logger.warn({ previous, state }, 'illegal call transition ignored');
            return false;
        }

        this.info.state = state;
        if (state === CallState.Connected) this.info.connectedAt = new Date();
        this.logger.info({ previous, state }, 'call state');
        this.ctx.emit({ type: 'CallStateChanged', callId: this.callId, previous, state });
        return true;
    }

    private end(state: CallState.Disconnected | CallState.Failed, reason: string, error?: SipError) {
        if (this.finished) return;

        for (const timer of [this.ringTimer, this.cancelGuard, this.refreshTimer, this.answerRetransmit, this.answerTimeout]) {
            this.ctx.scheduler.cancel(timer);
        }
        if (this.mediaStarted) {
            this.mediaStarted = false;
            this.ctx.media.stop(this.callId);
        }
        if (this.dialog) this.dialog.state = 'Terminated';

        this.info.reason = reason;
        this.info.endedAt = new Date();
        this.setState(state);

        if (state === CallState.Failed) {
            this.ctx.emit({ type: 'CallFailed', callId: this.callId, reason, error });
        }
        this.ctx.onFinished(this);
    }

    private sendInvite(invite: Request) {
        this.invite = invite;
        this.cseq = cseqOf(invite);
        this.inviteKey = this.ctx.transactions.sendRequest(invite, this.ctx.destination(), (outcome) => this.onInviteOutcome(invite, outcome));
    }

    private onInviteOutcome(invite: Request, outcome: TransactionOutcome) {
        if (invite !== this.invite) return;

        switch (outcome.type) {
            case 'provisional':
                this.onProvisional(outcome.response);
                break;
            case 'final':
                if (outcome.response.status < 300) this.onSuccess(outcome.response);
                else this.onFailure(outcome.response);
                break;
            case 'timeout':
            case 'transport-error':
                if (this.cancelRequested && !this.noAnswer) this.end(CallState.Disconnected, 'cancelled');
                else this.end(CallState.Failed, this.noAnswer ? 'no answer' : formatError(outcome.error), outcome.error);
                break;
        }
    }

    private onProvisional(rs: Response) {
        if (this.finished || this.finalReceived) return;

        const tag = tagOf(rs.headers.get('to'));
        if (tag) {
            if (!this.dialog) {
                this.dialog = this.createDialog(rs, tag);
            } else if (this.dialog.remoteTag !== tag) {
                this.violation('provisional response from another fork', { tag, expected: this.dialog.remoteTag });
                return;
            }
        }

        this.provisionalReceived = true;
        if (rs.status !== 100 && tag && this.state === CallState.Calling) this.setState(CallState.Ringing);
        if (this.cancelRequested && !this.cancelSent) this.sendCancel();
    }

    private onSuccess(rs: Response) {
        const tag = tagOf(rs.headers.get('to'));

        if (this.dialog?.remoteTag && tag !== this.dialog.remoteTag) {
            this.violation('2xx from another fork', { tag, expected: this.dialog.remoteTag });
            this.hangupFork(rs);
            return;
        }

        if (this.dialog?.state === 'Confirmed' || this.dialog?.state === 'Terminated' || this.finished) {
            if (this.ack && cseqOf(this.ack) === cseqOf(rs)) {
                this.logger.debug('2xx retransmission, repeating ACK');
                this.ctx.transactions.sendStateless(this.ack, this.ctx.destination(this.dialog));
            } else if (this.finished && this.dialog?.state !== 'Confirmed') {
                this.hangupFork(rs);
            }
            return;
        }

        const invite = this.invite;
        if (!invite) return;

        this.finalReceived = true;
        this.ctx.scheduler.cancel(this.ringTimer);
        this.ctx.scheduler.cancel(this.cancelGuard);

        const dialog = this.dialog ?? this.createDialog(rs, tag);
        dialog.remoteTarget = uriOf(rs.headers.get('contact')) ?? dialog.remoteTarget;
        dialog.routeSet = rs.headers.getAll('record-route').reverse();
        dialog.state = 'Confirmed';
        this.dialog = dialog;

        this.ack = this.ctx.builder.ack(invite, dialog);
        this.ctx.transactions.sendStateless(this.ack, this.ctx.destination(dialog));

        if (this.cancelRequested) {
            this.logger.info('answered after CANCEL, hanging up');
            this.setState(CallState.Connected);
            this.sendBye();
            return;
        }

        const media = rs.content ? this.ctx.sdp.negotiate(rs.content, this.ctx.media.getLocalMedia(this.callId)) : undefined;
        if (media) {
            this.info.media = media;
            this.ctx.media.start(this.callId, media);
            this.mediaStarted = true;
        } else {
            this.logger.warn('2xx carries no usable session description');
        }

        this.setState(CallState.Connected);
        this.scheduleRefresh();
    }

    private onFailure(rs: Response) {
        if (this.finished) return;
        this.finalReceived = true;

        if ((rs.status === 401 || rs.status === 407) && !this.cancelRequested && this.invite) {
            try {
                const retry = this.ctx.authenticator.challenge(this.invite, rs, this.ctx.credentials);
                this.finalReceived = false;
                this.provisionalReceived = false;
                this.dialog = undefined;
                this.logger.debug({ status: rs.status }, 'retrying INVITE with credentials');
                this.sendInvite(retry);
            } catch (err) {
                if (!(err instanceof AuthError)) throw err;
                this.end(CallState.Failed, 'authentication failed', err);
            }
            return;
        }

        if (this.noAnswer) {
            this.end(CallState.Failed, 'no answer');
        } else if (rs.status === 487 && this.cancelRequested) {
            this.end(CallState.Disconnected, 'cancelled');
        } else {
            this.end(CallState.Failed, `${rs.status} ${rs.reason}`.trim());
        }
    }

    private onRingTimeout() {
        this.ringTimer = undefined;
        if (this.finished) return;

        if (this.direction === 'Inbound') {
            const request = this.invite;
            if (request && this.serverTx && this.canReject()) {
                this.serverTx.respond(this.localResponse(request, 480));
                this.end(CallState.Failed, 'no answer');
            }
            return;
        }

        if (this.finalReceived) return;
        this.noAnswer = true;
        if (this.cancel() && this.provisionalReceived) return;

        if (this.inviteKey) this.ctx.transactions.abandon(this.inviteKey);
        this.end(CallState.Failed, 'no answer');
    }

    private sendCancel() {
        const invite = this.invite;
        if (!invite) return;

        this.cancelSent = true;
        this.ctx.transactions.sendRequest(this.ctx.builder.cancel(invite), this.ctx.destination(), (outcome) => {
            if (outcome.type === 'final') this.logger.debug({ status: outcome.response.status }, 'CANCEL answered');
            else if (outcome.type !== 'provisional') this.logger.warn({ err: formatError(outcome.error) }, 'CANCEL failed');
        });

        this.cancelGuard = this.ctx.scheduler.schedule(this.ctx.transactions.timeoutInterval, () => {
            if (this.finalReceived || this.finished) return;
            this.logger.warn('no final response after CANCEL, ending call locally');
            if (this.inviteKey) this.ctx.transactions.abandon(this.inviteKey);
            if (this.noAnswer) this.end(CallState.Failed, 'no answer');
            else this.end(CallState.Disconnected, 'cancelled');
        });
    }

    private sendBye() {
        const dialog = this.dialog;
        if (this.byeSent || !dialog) return;
        this.byeSent = true;

        this.ctx.scheduler.cancel(this.refreshTimer);
        if (this.mediaStarted) {
            this.mediaStarted = false;
            this.ctx.media.stop(this.callId);
        }

        dialog.localCseq = Math.max(dialog.localCseq, this.cseq) + 1;
        const bye = this.ctx.builder.inDialog('BYE', dialog);

        this.sendInDialog(bye, (outcome) => {
            const reason = outcome.type === 'final' ? 'local hangup' : `local hangup (${formatError(outcome.error)})`;
            this.end(CallState.Disconnected, reason);
        });
    }

    private scheduleRefresh() {
        const interval = this.ctx.settings.sessionRefreshInterval;
        if (interval <= 0 || this.direction !== 'Outbound') return;
        this.refreshTimer = this.ctx.scheduler.schedule(interval, () => this.refresh());
    }

    private refresh() {
        this.refreshTimer = undefined;
        const dialog = this.dialog;
        if (!dialog || this.state !== CallState.Connected || this.byeSent) return;

        dialog.localCseq = Math.max(dialog.localCseq, this.cseq) + 1;
        this.session.version += 1;
        this.localSdp = this.ctx.sdp.createOffer(this.ctx.media.getLocalMedia(this.callId), this.session);

        const reinvite = this.ctx.builder.inDialog('INVITE', dialog, { contact: true, content: this.localSdp });
        this.logger.debug('refreshing session');

        this.sendInDialog(reinvite, (outcome, rq) => {
            if (this.finished || this.byeSent) return;

            if (outcome.type === 'transport-error') {
                this.end(CallState.Disconnected, `session refresh failed (${formatError(outcome.error)})`);
                return;
            }
            if (outcome.type === 'timeout' || outcome.response.status === 408) {
                this.sendBye();
                return;
            }

            const rs = outcome.response;
            if (rs.status === 481) {
                this.end(CallState.Disconnected, 'session expired');
                return;
            }
            if (rs.status < 300) {
                dialog.remoteTarget = uriOf(rs.headers.get('contact')) ?? dialog.remoteTarget;
                this.ack = this.ctx.builder.ack(rq, dialog);
                this.ctx.transactions.sendStateless(this.ack, this.ctx.destination(dialog));
            } else {
                this.logger.warn({ status: rs.status }, 'session refresh rejected');
            }
            this.scheduleRefresh();
        });
    }

    /** Sends a request in the dialog, answering one 401/407 with credentials. */
    private sendInDialog(rq: Request, done: (outcome: Completion, rq: Request) => void, retried = false) {
        this.ctx.transactions.sendRequest(rq, this.ctx.destination(this.dialog), (outcome) => {
            if (outcome.type === 'provisional') return;

            if (outcome.type === 'final' && (outcome.response.status === 401 || outcome.response.status === 407) && !retried) {
                try {
                    const retry = this.ctx.authenticator.challenge(rq, outcome.response, this.ctx.credentials);
                    if (this.dialog) this.dialog.localCseq = cseqOf(retry);
                    this.sendInDialog(retry, done, true);
                    return;
                } catch (err) {
                    if (!(err instanceof AuthError)) throw err;
                    this.logger.warn({ err: formatError(err), method: rq.method }, 'cannot authenticate in-dialog request');
                }
            }

            done(outcome, rq);
        });
    }

    private onAck(rq: Request) {
        if (!this.answerResponse || this.state !== CallState.Ringing) return;

        this.ctx.scheduler.cancel(this.answerRetransmit);
        this.ctx.scheduler.cancel(this.answerTimeout);
        if (this.dialog) this.dialog.state = 'Confirmed';

        if (!this.info.media && rq.content) {
            this.info.media = this.ctx.sdp.negotiate(rq.content, this.ctx.media.getLocalMedia(this.callId));
        }

        this.setState(CallState.Connected);
        if (this.hangupRequested) {
            this.sendBye();
            return;
        }

        if (this.info.media) {
            this.ctx.media.start(this.callId, this.info.media);
            this.mediaStarted = true;
        } else {
            this.logger.warn('no media negotiated for answered call');
        }
    }

    private onRemoteCancel() {
        const request = this.invite;
        if (this.direction !== 'Inbound' || !request || !this.serverTx || !this.canReject()) return;

        this.serverTx.respond(this.localResponse(request, 487));
        this.end(CallState.Disconnected, 'cancelled by caller');
    }

    private retransmitAnswer() {
        this.answerRetransmit = undefined;
        const rs = this.answerResponse;
        if (!rs || !this.serverTx || this.state !== CallState.Ringing) return;

        this.ctx.transactions.sendStateless(rs, this.serverTx.remote);
        this.answerInterval = Math.min(this.answerInterval * 2, this.ctx.transactions.t2);
        this.answerRetransmit = this.ctx.scheduler.schedule(this.answerInterval, () => this.retransmitAnswer());
    }

    /** ACKs and BYEs a 2xx that this call will not keep. */
    private hangupFork(rs: Response) {
        const invite = this.invite;
        const tag = tagOf(rs.headers.get('to'));
        if (!invite) return;

        const fork: Dialog = {
            ...this.createDialog(rs, tag),
            routeSet: rs.headers.getAll('record-route').reverse(),
            state: 'Confirmed',
        };
        const destination = this.ctx.destination(fork);

        this.ctx.transactions.sendStateless(this.ctx.builder.ack(invite, fork), destination);

        fork.localCseq = cseqOf(invite) + 1;
        this.ctx.transactions.sendRequest(this.ctx.builder.inDialog('BYE', fork), destination, (outcome) => {
            if (outcome.type !== 'provisional') this.logger.debug({ outcome: outcome.type, tag }, 'stray fork released');
        });
    }

    private createDialog(rs: Response, tag: string | undefined): Dialog {
        const invite = this.invite;
        return {
            callId: this.callId,
            localTag: this.localTag,
            remoteTag: tag,
            localCseq: this.cseq,
            localUri: uriOf(invite?.headers.get('from')) ?? '',
            remoteUri: uriOf(invite?.headers.get('to')) ?? this.info.peerUri,
            remoteTarget: uriOf(rs.headers.get('contact')) ?? this.info.peerUri,
            routeSet: rs.headers.getAll('record-route').reverse(),
            state: 'Early',
        };
    }

    /** A response from this side of an inbound dialog: local tag, Contact and optional SDP. */
    private localResponse(rq: Request, status: number, content?: string): Response {
        const rs = sipParser.makeResponse(rq, status);
        const to = sipParser.parseNameAddr(rq.headers.get('to'));
        if (to) {
            to.params.tag = this.localTag;
            rs.headers.set('to', sipParser.stringifyNameAddr(to));
        }

        if (status > 100 && status < 300) {
            rs.headers.set('contact', this.ctx.builder.contact());
            rs.headers.set('allow', ALLOW);
            if (rq.headers.has('record-route')) rs.headers.set('record-route', rq.headers.getAll('record-route'));
        }

        if (content) {
            rs.headers.set('content-type', 'application/sdp');
            rs.content = content;
        }
        return rs;
    }

    private violation(message: string, context: Record<string, unknown>) {
        const err = new ProtocolViolationError(message, context);
        this.logger.warn({ err: formatError(err) }, 'protocol violation ignored');
    }
}

export default Call;
