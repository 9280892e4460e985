export enum RegistrationState {
    Unregistered = 'Unregistered',
    Registering = 'Registering',
    Registered = 'Registered',
    Unregistering = 'Unregistering',
    Failed = 'Failed',
}

export interface RegistrationContext {
    state: RegistrationState;
    /** Seconds granted by the registrar for the current binding. */
    expires?: number;
    /** Epoch milliseconds at which the next refresh is due. */
    refreshAt?: number;
    cseq: number;
    failures: number;
}
