import { AxiosResponse } from 'axios';
import { z } from 'zod';
import defaultLogger, { Logger } from '../util/logger';
import { RateLimitedAxios } from '../util/queues';
import { retryOperation } from '../util/retry';
import { Credentials } from '../util/config';
import { AuthRejectedError, MalformedResponseError, TransportFailureError } from '../util/errors';

const AuthResponseSchema = z.object({
    bearer: z.string().min(1),
});

export interface AuthenticatorOptions {
    /** Human readable server address, used in logs and errors. */
    target: string;
    retries?: number;
    retryDelay?: number;
    logger?: Logger;
}

export type Authenticate = () => Promise<string>;

class TransportAttemptError extends Error {
    constructor(public readonly original: unknown) {
        super(original instanceof Error ? original.message : String(original));
    }
}

function readBody(data: unknown): unknown {
    if (typeof data !== 'string') return data;
    try {
        return JSON.parse(data);
    } catch {
        return data;
    }
}

/**
 * Returns a function exchanging the credentials for a bearer token.
 * Only connection failures are retried; a rejected login fails at once.
 */
export function createAuthenticator(
    http: RateLimitedAxios,
    credentials: Credentials,
    options: AuthenticatorOptions
): Authenticate {
    const { target, retries = 3, retryDelay = 2000, logger = defaultLogger } = options;

    return async () => {
        logger.debug(`Connecting to server at ${target} with username ${credentials.username}`);

        let response: AxiosResponse<unknown>;
        try {
            response = await retryOperation(async () => {
                try {
                    return await http.post('/api/auth', {
                        username: credentials.username,
                        password: credentials.password,
                    });
                } catch (e) {
                    throw new TransportAttemptError(e);
                }
            }, `connect to ${target}`, {
                retries,
                delay: retryDelay,
                shouldRetry: error => error instanceof TransportAttemptError,
                logger,
            });
        } catch (e) {
            throw new TransportFailureError(target, e instanceof TransportAttemptError ? e.original : e);
        }

        if (response.status !== 200) {
            logger.debug(`Login failed! Status Code: ${response.status}`);
            throw new AuthRejectedError(response.status);
        }

        const parsed = AuthResponseSchema.safeParse(readBody(response.data));
        if (!parsed.success) {
            throw new MalformedResponseError('authentication response', 'no bearer token received');
        }

        logger.debug('Login successful!');
        return parsed.data.bearer;
    };
}
