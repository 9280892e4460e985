export abstract class SipError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.context = context;
        Error.captureStackTrace(this, this.constructor);
    }
}

export type ParseErrorCode = 'MalformedStartLine' | 'MalformedHeader' | 'MissingMandatoryHeader' | 'ContentLengthMismatch';

export class ParseError extends SipError {
    declare readonly code: ParseErrorCode;

    constructor(code: ParseErrorCode, message: string, context?: Record<string, unknown>) {
        super(message, code, context);
    }
}

export type TransportErrorCode = 'Unreachable' | 'Closed';

export class TransportError extends SipError {
    declare readonly code: TransportErrorCode;

    constructor(code: TransportErrorCode, message: string, context?: Record<string, unknown>) {
        super(message, code, context);
    }
}

export class TransactionTimeoutError extends SipError {
    constructor(method: string, branch: string) {
        super(`no response to ${method} within the transaction timeout`, 'TransactionTimeout', { method, branch });
    }
}

export type AuthErrorCode = 'InvalidCredentials' | 'UnsupportedChallenge';

export class AuthError extends SipError {
    declare readonly code: AuthErrorCode;

    constructor(code: AuthErrorCode, message: string, context?: Record<string, unknown>) {
        super(message, code, context);
    }
}

export class ProtocolViolationError extends SipError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'ProtocolViolation', context);
    }
}

export class ConfigurationError extends SipError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'ConfigurationError', context);
    }
}

export function isSipError(error: unknown): error is SipError {
    return error instanceof SipError;
}

export function formatError(error: unknown): string {
    if (isSipError(error)) {
        let message = `[${error.code}] ${error.message}`;
        if (error.context) {
            message += ` ${JSON.stringify(error.context)}`;
        }
        return message;
    }

    if (error instanceof Error) {
        return error.message;
    }

    return String(error);
}
