import { ConfigurationError } from '#models/Errors';

export interface Account {
    readonly username: string;
    readonly password: string;
    readonly domain: string;
    readonly port: number;
    readonly displayName?: string;
    /** Expected digest realm; any realm is answered when unset. */
    readonly realm?: string;
    /** Digest user name when it differs from the SIP user part. */
    readonly authUsername?: string;
}

export function validateAccount(account: Account): Readonly<Account> {
    if (!account.username) throw new ConfigurationError('username is required');
    if (!account.password) throw new ConfigurationError('password is required');
    if (!account.domain) throw new ConfigurationError('domain is required');
    if (!Number.isInteger(account.port) || account.port <= 0 || account.port > 65535) {
        throw new ConfigurationError('port must be between 1 and 65535', { port: account.port });
    }
    return Object.freeze({ ...account });
}
