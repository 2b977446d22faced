import Axios, { AxiosAdapter } from 'axios';
import { z } from 'zod';
import defaultLogger, { Logger } from '../util/logger';
import { createRateLimitedAxios, createRequestLimiter, RateLimitedAxios } from '../util/queues';
import { ServerSettings } from '../util/config';
import { PageOutcome, PageStatus, Session } from '../scanner';
import PageSource from '../scanner/scanner.interface';

const MovieListSchema = z.array(z.unknown());

export function serverUrl(server: Pick<ServerSettings, 'host' | 'port'>): string {
    return `http://${server.host}:${server.port}`;
}

/**
 * Builds the rate-limited HTTP client shared by authentication and page
 * fetches. Every status code resolves; callers classify responses themselves.
 * `adapter` replaces the network transport (tests plug a fake server in here).
 */
export function createMovieServerHttp(
    server: ServerSettings,
    options: { adapter?: AxiosAdapter; logger?: Logger } = {}
): RateLimitedAxios {
    const { logger = defaultLogger } = options;

    const axios = Axios.create({
        baseURL: serverUrl(server),
        timeout: server.timeoutMs,
        validateStatus: () => true,
        adapter: options.adapter,
    });

    return createRateLimitedAxios(axios, createRequestLimiter(server.requestIntervalMs, logger), 'Movie Server', logger);
}

/**
 * Counts the entries of a page body. Only a JSON array is accepted; anything
 * else yields null.
 */
export function parseMovieList(body: unknown): number | null {
    let value = body;
    if (typeof body === 'string') {
        try {
            value = JSON.parse(body);
        } catch {
            return null;
        }
    }
    const result = MovieListSchema.safeParse(value);
    return result.success ? result.data.length : null;
}

export function classifyStatus(httpStatus: number): PageStatus {
    if (httpStatus === 200) return 'success';
    if (httpStatus === 401) return 'unauthorized';
    if (httpStatus === 404) return 'end_of_data';
    return 'other';
}

export class MovieServerClient implements PageSource {
    private readonly logger: Logger;

    constructor(private readonly http: RateLimitedAxios, options: { logger?: Logger } = {}) {
        this.logger = options.logger ?? defaultLogger;
    }

    async fetchPage(year: number, page: number, session: Session): Promise<PageOutcome> {
        let httpStatus: number;
        let body: unknown;

        try {
            const response = await this.http.get(`/api/movies/${year}/${page}`, {
                headers: { Authorization: `Bearer ${session.token}` },
                responseType: 'text',
            });
            httpStatus = response.status;
            body = response.data;
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            this.logger.warn(`Failed to fetch page ${page} for year ${year}: ${reason}`);
            return { year, page, count: 0, status: 'other', reason: 'transport' };
        }

        this.logger.debug(`Fetching page ${page} for year ${year}: Status Code ${httpStatus}`);

        const status = classifyStatus(httpStatus);
        if (status !== 'success') {
            return { year, page, count: 0, status, httpStatus };
        }

        const count = parseMovieList(body);
        if (count === null) {
            this.logger.warn(`Page ${page} for year ${year} returned a body that is not a movie list`);
            return { year, page, count: 0, status: 'other', httpStatus, reason: 'malformed' };
        }

        // An empty page ends the year just like a missing one
        if (count === 0) {
            return { year, page, count: 0, status: 'end_of_data', httpStatus };
        }

        return { year, page, count, status: 'success', httpStatus };
    }
}
