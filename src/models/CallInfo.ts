import { Dialog } from '#models/Dialog';
import { NegotiatedMedia } from '#models/Media';

export enum CallState {
    Idle = 'Idle',
    Calling = 'Calling',
    Ringing = 'Ringing',
    Connected = 'Connected',
    Disconnected = 'Disconnected',
    Failed = 'Failed',
}

export type CallDirection = 'Outbound' | 'Inbound';

export interface CallInfo {
    callId: string;
    direction: CallDirection;
    peerUri: string;
    state: CallState;
    dialog?: Readonly<Dialog>;
    media?: NegotiatedMedia;
    reason?: string;
    startedAt: Date;
    connectedAt?: Date;
    endedAt?: Date;
}

const TRANSITIONS: Record<CallState, CallState[]> = {
    [CallState.Idle]: [CallState.Calling, CallState.Ringing, CallState.Failed, CallState.Disconnected],
    [CallState.Calling]: [CallState.Ringing, CallState.Connected, CallState.Disconnected, CallState.Failed],
    [CallState.Ringing]: [CallState.Connected, CallState.Disconnected, CallState.Failed],
    [CallState.Connected]: [CallState.Disconnected],
    [CallState.Disconnected]: [],
    [CallState.Failed]: [],
};

export function canTransition(from: CallState, to: CallState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function isFinished(state: CallState): boolean {
    return state === CallState.Disconnected || state === CallState.Failed;
}
