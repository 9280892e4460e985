import { Protocol, Remote } from '#interfaces/ITransport';
import { Account } from '#models/Account';
import { Dialog } from '#models/Dialog';
import { Headers, Request, Response } from '#models/index';
import { Utils } from '#utils/Utils';
import { generateBranch } from '#utils/Tools';
import SIPParser from '#services/SIPParser';

export const USER_AGENT = 'sipua/1.0';
export const ALLOW = 'INVITE, ACK, CANCEL, BYE, OPTIONS, INFO';

export interface RequestInit {
    method: string;
    uri: string;
    from: string;
    to: string;
    callId: string;
    cseq: number;
    route?: string[];
    contact?: boolean;
    headers?: [string, string][];
    content?: string;
    contentType?: string;
}

/**
 * Builds outbound requests for one account: Via with a fresh branch, the
 * local identity in From and Contact, Route sets and the ACK/CANCEL variants
 * derived from an INVITE.
 */
class RequestBuilder {
    private sipParser = new SIPParser();
    private advertised?: Remote;

    constructor(
        private account: Account,
        private protocol: Protocol,
        private local: () => Remote,
        private publicAddress?: string,
    ) {}

    /** Address learnt from `received`/`rport`; used in Via and Contact from now on. */
    setAdvertisedAddress(remote: Remote | undefined): void {
        this.advertised = remote;
    }

    sentBy(): Remote {
        if (this.advertised) return this.advertised;
        const local = this.local();
        return { host: this.publicAddress || local.host, port: local.port };
    }

    via(branch: string = generateBranch()): string {
        const sentBy = this.sentBy();
        return this.sipParser.stringifyVia({
            version: '2.0',
            protocol: this.protocol,
            host: sentBy.host,
            port: sentBy.port,
            params: this.protocol === 'UDP' ? { branch, rport: null } : { branch },
        });
    }

    contact(params: Record<string, string | null> = {}): string {
        const sentBy = this.sentBy();
        const uri = this.sipParser.stringifyUri({
            schema: 'sip',
            user: this.account.username,
            host: sentBy.host,
            port: sentBy.port,
            params: this.protocol === 'UDP' ? {} : { transport: this.protocol.toLowerCase() },
            headers: {},
        });
        return this.sipParser.stringifyNameAddr({ uri, params });
    }

    /** The account's address of record as a From/To value. */
    identity(tag?: string): string {
        return this.sipParser.stringifyNameAddr({
            name: this.account.displayName ? Utils.q(this.account.displayName) : undefined,
            uri: `sip:${this.account.username}@${this.account.domain}`,
            params: tag ? { tag } : {},
        });
    }

    request(init: RequestInit): Request {
        const headers = new Headers([
            ['via', this.via()],
            ['max-forwards', '70'],
            ['from', init.from],
            ['to', init.to],
            ['call-id', init.callId],
            ['cseq', `${init.cseq} ${init.method}`],
        ]);

        if (init.route?.length) headers.set('route', init.route);
        if (init.contact) headers.set('contact', this.contact());
        headers.set('user-agent', USER_AGENT);
        for (const [name, value] of init.headers ?? []) headers.append(name, value);

        const content = init.content ?? '';
        if (content) headers.set('content-type', init.contentType ?? 'application/sdp');

        return { kind: 'request', method: init.method, uri: init.uri, version: '2.0', headers, content };
    }

    /** A request inside `dialog`; the caller advances `localCseq` first. */
    inDialog(method: string, dialog: Dialog, extra: Omit<Partial<RequestInit>, 'method'> = {}): Request {
        return this.request({
            method,
            uri: dialog.remoteTarget,
            from: this.sipParser.stringifyNameAddr({ uri: dialog.localUri, params: { tag: dialog.localTag } }),
            to: this.sipParser.stringifyNameAddr({ uri: dialog.remoteUri, params: dialog.remoteTag ? { tag: dialog.remoteTag } : {} }),
            callId: dialog.callId,
            cseq: dialog.localCseq,
            route: dialog.routeSet,
            ...extra,
        });
    }

    /** ACK for a 2xx: a new transaction sent along the dialog's route set. */
    ack(invite: Request, dialog: Dialog): Request {
        const cseq = this.sipParser.parseCSeq(invite.headers.get('cseq'));
        const ack = this.inDialog('ACK', dialog, { cseq: cseq?.seq ?? dialog.localCseq });
        for (const name of ['authorization', 'proxy-authorization']) {
            if (invite.headers.has(name)) ack.headers.set(name, invite.headers.getAll(name));
        }
        return ack;
    }

    /** CANCEL for a pending INVITE, sharing its branch. */
    cancel(invite: Request): Request {
        return deriveRequest(invite, 'CANCEL');
    }
}

/**
 * CANCEL, or ACK for a 3xx-6xx final, built from the INVITE it belongs to:
 * same top Via, Request-URI, From, Call-ID, CSeq number and Route.
 */
export function deriveRequest(invite: Request, method: 'ACK' | 'CANCEL', response?: Response): Request {
    const cseq = invite.headers.get('cseq')?.split(/\s+/)[0] ?? '1';
    const headers = new Headers([
        ['via', invite.headers.get('via') ?? ''],
        ['max-forwards', '70'],
        ['from', invite.headers.get('from') ?? ''],
        ['to', response?.headers.get('to') ?? invite.headers.get('to') ?? ''],
        ['call-id', invite.headers.get('call-id') ?? ''],
        ['cseq', `${cseq} ${method}`],
    ]);
    if (invite.headers.has('route')) headers.set('route', invite.headers.getAll('route'));
    headers.set('user-agent', USER_AGENT);

    return { kind: 'request', method, uri: invite.uri, version: invite.version, headers, content: '' };
}

export default RequestBuilder;
