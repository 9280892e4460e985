export type InviteClientState = 'Calling' | 'Proceeding' | 'Completed' | 'Terminated';
export type NonInviteClientState = 'Trying' | 'Proceeding' | 'Completed' | 'Terminated';
export type ClientTransactionState = InviteClientState | NonInviteClientState;

export type ServerTransactionState = 'Proceeding' | 'Completed' | 'Confirmed' | 'Terminated';

export type TransactionInput =
    | 'provisional'
    | 'success'
    | 'failure'
    | 'timeout'
    | 'transport-error'
    | 'linger-expired';

export function classify(status: number): 'provisional' | 'success' | 'failure' {
    if (status < 200) return 'provisional';
    return status < 300 ? 'success' : 'failure';
}

export function initialState(invite: boolean): ClientTransactionState {
    return invite ? 'Calling' : 'Trying';
}

/** RFC 3261 17.1.1 (INVITE) and 17.1.2 (non-INVITE) client transitions. */
export function nextState(invite: boolean, state: ClientTransactionState, input: TransactionInput): ClientTransactionState {
    if (state === 'Terminated') return state;
    if (input === 'transport-error') return 'Terminated';

    switch (state) {
        case 'Calling':
        case 'Trying':
        case 'Proceeding':
            switch (input) {
                case 'provisional':
                    return 'Proceeding';
                case 'success':
                    return invite ? 'Terminated' : 'Completed';
                case 'failure':
                    return 'Completed';
                case 'timeout':
                    return 'Terminated';
                case 'linger-expired':
                    return state;
            }
            return state;
        case 'Completed':
            return input === 'linger-expired' ? 'Terminated' : 'Completed';
    }
    return state;
}
