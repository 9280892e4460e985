export type DialogState = 'Early' | 'Confirmed' | 'Terminated';

export interface Dialog {
    callId: string;
    localTag: string;
    remoteTag?: string;
    localCseq: number;
    remoteCseq?: number;
    localUri: string;
    remoteUri: string;
    /** Contact of the peer; Request-URI of in-dialog requests. */
    remoteTarget: string;
    /** Route header values in the order requests from this side use them. */
    routeSet: string[];
    state: DialogState;
}
