export type MovieTallyErrorCode =
    | 'CONFIG_INVALID'
    | 'TRANSPORT_FAILURE'
    | 'AUTH_REJECTED'
    | 'MALFORMED_RESPONSE'
    | 'REAUTH_LIMIT'
    | 'PAGE_LIMIT';

export class MovieTallyError extends Error {
    constructor(public readonly code: MovieTallyErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigurationError extends MovieTallyError {
    constructor(public readonly issues: string[]) {
        super('CONFIG_INVALID', `Configuration validation failed:\n${issues.map(issue => `- ${issue}`).join('\n')}`);
    }
}

/** The server could not be reached at all. */
export class TransportFailureError extends MovieTallyError {
    constructor(target: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super('TRANSPORT_FAILURE', `Failed to connect to server at ${target}: ${reason}`, { cause });
    }
}

export class AuthRejectedError extends MovieTallyError {
    constructor(public readonly status: number) {
        super('AUTH_REJECTED', `Authentication failed. Username or password incorrect. (Status Code: ${status})`);
    }
}

export class MalformedResponseError extends MovieTallyError {
    constructor(what: string, detail: string) {
        super('MALFORMED_RESPONSE', `Malformed ${what}: ${detail}`);
    }
}

export class ReauthLimitExceededError extends MovieTallyError {
    constructor(public readonly year: number, public readonly attempts: number, public readonly page: number) {
        super(
            'REAUTH_LIMIT',
            `Year ${year}: session rejected at page ${page} after ${attempts} consecutive re-authentications`
        );
    }
}

export class PageLimitExceededError extends MovieTallyError {
    constructor(public readonly year: number, public readonly maxPage: number) {
        super('PAGE_LIMIT', `Year ${year}: no end of data found within ${maxPage} pages`);
    }
}
