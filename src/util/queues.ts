import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';
import { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import defaultLogger, { Logger } from './logger';

// ============================================================================
// P-QUEUE: Year Concurrency Control
// ============================================================================

/**
 * Year Queue
 * Limits how many years are scanned in parallel. Each year runs its own
 * bounded page fan-out, so this multiplies the outstanding request count.
 */
export function createYearQueue(concurrency: number): PQueue {
    return new PQueue({ concurrency });
}

// ============================================================================
// BOTTLENECK: HTTP Rate Limiting
// ============================================================================

/**
 * Movie Server Rate Limiter
 * No concurrency cap of its own (the scanner's TaskQueue owns that), only a
 * minimum spacing between requests. `minTime: 0` lets everything through.
 */
export function createRequestLimiter(minTime: number, logger: Logger = defaultLogger): Bottleneck {
    const limiter = new Bottleneck({ maxConcurrent: null, minTime });

    limiter.on('error', (err) => {
        logger.error({ err }, '[Movie Server Limiter] Unhandled error in queue');
    });

    // Retry policy lives with the callers, never inside Bottleneck
    limiter.on('failed', (err: Error) => {
        logger.debug(`[Movie Server] Job failed: ${err.message}`);
        return null;
    });

    return limiter;
}

// ============================================================================
// RATE-LIMITED AXIOS FACTORY
// ============================================================================

export interface RateLimitedAxios {
    get: (url: string, config?: AxiosRequestConfig) => Promise<AxiosResponse<unknown>>;
    post: (url: string, data?: unknown, config?: AxiosRequestConfig) => Promise<AxiosResponse<unknown>>;
}

/**
 * Creates a rate-limited axios facade using the provided limiter.
 * All HTTP calls through it are queued through Bottleneck. Bodies stay
 * `unknown`: callers validate what they read.
 */
export function createRateLimitedAxios(
    baseAxios: AxiosInstance,
    limiter: Bottleneck,
    serviceName: string,
    logger: Logger = defaultLogger
): RateLimitedAxios {
    return {
        get: (url, config) => {
            logger.trace(`[${serviceName}] Scheduling GET ${url}`);
            return limiter.schedule(() => baseAxios.get<unknown>(url, config));
        },
        post: (url, data, config) => {
            logger.trace(`[${serviceName}] Scheduling POST ${url}`);
            return limiter.schedule(() => baseAxios.post<unknown>(url, data, config));
        },
    };
}
