import os from 'os';
import crypto from 'crypto';

/** RFC 3261 magic cookie that marks a branch as globally unique. */
export const BRANCH_PREFIX = 'z9hG4bK';

let branchCounter = 0;

export const generateBranch = (): string =>
    BRANCH_PREFIX + crypto.randomBytes(6).toString('hex') + (++branchCounter).toString(36);

export const generateTag = (): string => crypto.randomBytes(5).toString('hex');

export const generateCallId = (host?: string): string => {
    const id = `${Date.now().toString(36)}${crypto.randomBytes(8).toString('hex')}`;
    return host ? `${id}@${host}` : id;
};

export const generateCnonce = (): string => crypto.randomBytes(8).toString('hex');

/** First external IPv4 address of this host, falling back to its hostname. */
export const getLocalAddress = (): string => {
    const interfaces = os.networkInterfaces();
    for (const name of Object.keys(interfaces)) {
        for (const info of interfaces[name] ?? []) {
            if (info.family === 'IPv4' && !info.internal) return info.address;
        }
    }
    return os.hostname();
};
