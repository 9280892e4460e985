import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import TransactionManager, { ServerTransaction, TransactionOutcome } from '#src/TransactionManager';
import Scheduler from '#services/Scheduler';
import SIPParser from '#services/SIPParser';
import { Headers, Request } from '#models/index';
import { FakeTransport, PEER, flush, reply } from './helpers/FakeTransport';

const parser = new SIPParser();

function request(method: string, branch = 'z9hG4bKtest1'): Request {
    return {
        kind: 'request',
        method,
        uri: 'sip:bob@example.com',
        version: '2.0',
        headers: new Headers([
            ['via', `SIP/2.0/UDP 10.0.0.1:5060;branch=${branch};rport`],
            ['max-forwards', '70'],
            ['from', '<sip:alice@example.com>;tag=local'],
            ['to', '<sip:bob@example.com>'],
            ['call-id', 'tx-call'],
            ['cseq', `1 ${method}`],
        ]),
        content: '',
    };
}

const receive = (tm: TransactionManager, msg: Parameters<SIPParser['serialize']>[0]) => tm.receive(parser.serialize(msg), PEER);

describe('TransactionManager client transactions', () => {
    let transport: FakeTransport;
    let scheduler: Scheduler;
    let tm: TransactionManager;
    let outcomes: TransactionOutcome[];
    const user = (o: TransactionOutcome) => outcomes.push(o);

    beforeEach(() => {
        vi.useFakeTimers();
        transport = new FakeTransport();
        scheduler = new Scheduler();
        tm = new TransactionManager({ transport, scheduler });
        outcomes = [];
    });

    afterEach(() => {
        scheduler.stop();
        vi.useRealTimers();
    });

    it('retransmits an INVITE with Timer A doubling and times out with Timer B', () => {
        tm.sendRequest(request('INVITE'), PEER, user);

        vi.advanceTimersByTime(31999);
        expect(transport.requests('INVITE')).toHaveLength(7);
        expect(outcomes).toEqual([]);

        vi.advanceTimersByTime(1);
        expect(outcomes).toHaveLength(1);
        expect(outcomes[0].type).toBe('timeout');
        expect(tm.clientCount()).toBe(0);
    });

    it('retransmits a non-INVITE with Timer E capped at T2', () => {
        tm.sendRequest(request('OPTIONS'), PEER, user);

        const times: number[] = [];
        for (let t = 0; t <= 12000; t += 500) {
            while (transport.sent.length > times.length) times.push(t);
            vi.advanceTimersByTime(500);
        }
        expect(times).toEqual([0, 500, 1500, 3500, 7500, 11500]);
    });

    it('stops INVITE retransmissions and Timer B on a provisional response', () => {
        const rq = request('INVITE');
        tm.sendRequest(rq, PEER, user);
        receive(tm, reply(rq, 180));

        vi.advanceTimersByTime(60000);
        expect(transport.requests('INVITE')).toHaveLength(1);
        expect(outcomes.map((o) => o.type)).toEqual(['provisional']);
        expect(tm.clientCount()).toBe(1);
    });

    it('acknowledges a failure, absorbs its retransmissions and lingers for Timer D', () => {
        const rq = request('INVITE');
        tm.sendRequest(rq, PEER, user);
        const busy = reply(rq, 486, { toTag: 'uas' });

        receive(tm, busy);
        receive(tm, busy);

        const acks = transport.requests('ACK');
        expect(acks).toHaveLength(2);
        expect(acks[0].headers.get('via')).toBe(rq.headers.get('via'));
        expect(acks[0].headers.get('to')).toBe('<sip:bob@example.com>;tag=uas');
        expect(acks[0].headers.get('cseq')).toBe('1 ACK');
        expect(outcomes.map((o) => o.type)).toEqual(['final']);

        vi.advanceTimersByTime(31999);
        expect(tm.clientCount()).toBe(1);
        vi.advanceTimersByTime(1);
        expect(tm.clientCount()).toBe(0);
    });

    it('terminates an INVITE on 2xx and reports later copies as stray', () => {
        const stray = vi.fn();
        tm = new TransactionManager({ transport, scheduler, onStrayResponse: stray });
        const rq = request('INVITE');
        tm.sendRequest(rq, PEER, user);
        const ok = reply(rq, 200);

        receive(tm, ok);
        receive(tm, ok);

        expect(outcomes.map((o) => o.type)).toEqual(['final']);
        expect(tm.clientCount()).toBe(0);
        expect(stray).toHaveBeenCalledTimes(1);
        expect(transport.requests('ACK')).toHaveLength(0);
    });

    it('keeps a completed non-INVITE for T4 on UDP', () => {
        const rq = request('REGISTER');
        tm.sendRequest(rq, PEER, user);
        receive(tm, reply(rq, 200));

        expect(outcomes.map((o) => o.type)).toEqual(['final']);
        vi.advanceTimersByTime(4999);
        expect(tm.clientCount()).toBe(1);
        vi.advanceTimersByTime(1);
        expect(tm.clientCount()).toBe(0);
    });

    it('neither retransmits nor lingers over a reliable transport', () => {
        transport = new FakeTransport('TCP');
        tm = new TransactionManager({ transport, scheduler });
        const rq = request('REGISTER');
        tm.sendRequest(rq, PEER, user);

        vi.advanceTimersByTime(10000);
        expect(transport.requests('REGISTER')).toHaveLength(1);

        receive(tm, reply(rq, 200));
        expect(tm.clientCount()).toBe(0);
    });

    it('reports a transport error once and forgets the transaction', async () => {
        transport.unreachable = true;
        tm.sendRequest(request('OPTIONS'), PEER, user);
        await flush();

        expect(outcomes).toHaveLength(1);
        expect(outcomes[0].type).toBe('transport-error');
        expect(tm.clientCount()).toBe(0);
    });

    it('reports only the final response when the ACK for a failure cannot be sent', async () => {
        const rq = request('INVITE');
        tm.sendRequest(rq, PEER, user);
        transport.unreachable = true;

        receive(tm, reply(rq, 486, { toTag: 'uas' }));
        await flush();

        expect(outcomes.map((o) => o.type)).toEqual(['final']);
        expect(tm.clientCount()).toBe(0);
    });

    it('refuses an ACK and a request missing mandatory headers', () => {
        expect(() => tm.sendRequest(request('ACK'), PEER, user)).toThrow();
        const rq = request('OPTIONS');
        rq.headers.delete('call-id');
        expect(() => tm.sendRequest(rq, PEER, user)).toThrow(expect.objectContaining({ code: 'MissingMandatoryHeader' }));
    });

    it('uses the custom T1', () => {
        tm = new TransactionManager({ transport, scheduler, timers: { t1: 100 } });
        expect(tm.timeoutInterval).toBe(6400);
        tm.sendRequest(request('INVITE'), PEER, user);

        vi.advanceTimersByTime(6400);
        expect(outcomes.map((o) => o.type)).toEqual(['timeout']);
    });
});

describe('TransactionManager server transactions', () => {
    let transport: FakeTransport;
    let scheduler: Scheduler;
    let tm: TransactionManager;
    let received: { rq: Request; tx?: ServerTransaction }[];

    beforeEach(() => {
        vi.useFakeTimers();
        transport = new FakeTransport();
        scheduler = new Scheduler();
        received = [];
        tm = new TransactionManager({ transport, scheduler, onRequest: (rq, _remote, tx) => received.push({ rq, tx }) });
    });

    afterEach(() => {
        scheduler.stop();
        vi.useRealTimers();
    });

    it('answers a retransmitted request with the last response', () => {
        const rq = request('OPTIONS', 'z9hG4bKin1');
        receive(tm, rq);
        received[0].tx?.respond(parser.makeResponse(received[0].rq, 200));
        receive(tm, rq);

        expect(received).toHaveLength(1);
        expect(transport.responses(200)).toHaveLength(2);

        vi.advanceTimersByTime(32000);
        expect(tm.serverCount()).toBe(0);
    });

    it('retransmits an INVITE failure until the ACK arrives', () => {
        const rq = request('INVITE', 'z9hG4bKin2');
        receive(tm, rq);
        received[0].tx?.respond(parser.makeResponse(received[0].rq, 486));

        vi.advanceTimersByTime(1500);
        expect(transport.responses(486)).toHaveLength(3);

        const ack = request('ACK', 'z9hG4bKin2');
        ack.headers.set('cseq', '1 ACK');
        receive(tm, ack);
        expect(received).toHaveLength(1);
        expect(tm.findServer(rq)?.state).toBe('Confirmed');

        vi.advanceTimersByTime(5000);
        expect(transport.responses(486)).toHaveLength(3);
        expect(tm.serverCount()).toBe(0);
    });

    it('ends an INVITE server transaction on 2xx and passes the ACK up', () => {
        const rq = request('INVITE', 'z9hG4bKin3');
        receive(tm, rq);
        received[0].tx?.respond(parser.makeResponse(received[0].rq, 200));
        expect(tm.serverCount()).toBe(0);

        const ack = request('ACK', 'z9hG4bKother');
        receive(tm, ack);
        expect(received).toHaveLength(2);
        expect(received[1].tx).toBeUndefined();
    });

    it('ignores a second final response', () => {
        receive(tm, request('OPTIONS', 'z9hG4bKin4'));
        const tx = received[0].tx;
        tx?.respond(parser.makeResponse(received[0].rq, 200));
        tx?.respond(parser.makeResponse(received[0].rq, 500));
        expect(transport.responses()).toHaveLength(1);
    });

    it('answers 501 without a request handler', () => {
        tm = new TransactionManager({ transport, scheduler });
        receive(tm, request('MESSAGE', 'z9hG4bKin5'));
        expect(transport.responses(501)).toHaveLength(1);
    });

    it('drops unparseable input', () => {
        tm.receive(Buffer.from('garbage\r\n\r\n'), PEER);
        expect(received).toHaveLength(0);
        expect(transport.sent).toHaveLength(0);
    });
});
