import crypto from 'crypto';

export class Utils {
    static kd(...args: string[]): string {
        const hash = crypto.createHash('md5');
        hash.update(args.join(':'));
        return hash.digest('hex');
    }

    /** MD5 of a message body held as latin1 chars. */
    static hashBody(body: string): string {
        return crypto.createHash('md5').update(body, 'latin1').digest('hex');
    }

    static unq(a: string): string;
    static unq(a: string | undefined): string | undefined;
    static unq(a: string | undefined): string | undefined {
        if (a && a.length > 1 && a[0] === '"' && a[a.length - 1] === '"') {
            return a.substring(1, a.length - 1).replace(/\\(.)/g, '$1');
        }
        return a;
    }

    static q(a: string): string;
    static q(a: string | undefined): string | undefined;
    static q(a: string | undefined): string | undefined {
        if (typeof a === 'string' && a[0] !== '"') {
            return ['"', a.replace(/(["\\])/g, '\\$1'), '"'].join('');
        }
        return a;
    }

    static lowercase(a: string | undefined): string | undefined {
        return typeof a === 'string' ? a.toLowerCase() : a;
    }

    static numberTo8Hex(n: number): string {
        return n.toString(16).padStart(8, '0');
    }
}
