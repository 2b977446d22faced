import defaultLogger, { Logger } from '../util/logger';
import { ReauthLimitExceededError } from '../util/errors';
import { SessionManager } from '../api/session';
import { PassResult, ReauthDecision, Session, YearState } from '.';
import { finalizeAtBoundary, mergeScanResults, resumePageFor } from './results';

export interface ReauthCoordinatorOptions {
    /** Re-authentications allowed in a row without a newly fetched page. */
    maxReauthAttempts: number;
    logger?: Logger;
}

/**
 * Decides what follows a finished pass. An unauthorized boundary means the
 * session expired: a fresh one is obtained and the year resumes one page
 * before the boundary. Any other boundary is the end of the year's data.
 */
export class ReauthCoordinator {
    private readonly logger: Logger;

    constructor(private readonly sessions: SessionManager, private readonly options: ReauthCoordinatorOptions) {
        this.logger = options.logger ?? defaultLogger;
    }

    async decide(state: YearState, pass: PassResult, session: Session): Promise<ReauthDecision> {
        if (state.finalized) {
            throw new Error(`Year ${state.year} is already finalized`);
        }

        state.passes++;
        const gained = mergeScanResults(state.results, pass.outcomes, this.logger);
        const { boundary } = pass;

        if (boundary.status !== 'unauthorized') {
            finalizeAtBoundary(state.results, boundary.page, gained);
            state.finalized = true;
            this.logger.debug(`Year ${state.year}: end of data at page ${boundary.page} (${boundary.status})`);
            return { kind: 'done', boundary };
        }

        state.consecutiveReauths = gained.length > 0 ? 1 : state.consecutiveReauths + 1;
        if (state.consecutiveReauths > this.options.maxReauthAttempts) {
            throw new ReauthLimitExceededError(state.year, this.options.maxReauthAttempts, boundary.page);
        }

        this.logger.info('Session expired, re-authenticating...');
        const renewed = await this.sessions.renew(session);
        state.reauthentications++;
        state.resumePage = resumePageFor(boundary.page);
        this.logger.info(`Starting fetch from page ${state.resumePage} for year ${state.year}`);

        return { kind: 'retry', session: renewed, resumePage: state.resumePage };
    }
}
