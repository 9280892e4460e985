import { CallState } from '#models/CallInfo';
import { SipError } from '#models/Errors';
import { RegistrationState } from '#models/Registration';

export interface RegistrationStateChanged {
    type: 'RegistrationStateChanged';
    previous: RegistrationState;
    state: RegistrationState;
    expires?: number;
    reason?: string;
}

export interface CallStateChanged {
    type: 'CallStateChanged';
    callId: string;
    previous: CallState;
    state: CallState;
}

export interface CallFailed {
    type: 'CallFailed';
    callId: string;
    reason: string;
    error?: SipError;
}

export interface IncomingCall {
    type: 'IncomingCall';
    callId: string;
    from: string;
}

export type UserAgentEvent = RegistrationStateChanged | CallStateChanged | CallFailed | IncomingCall;
