import defaultLogger, { Logger } from '../util/logger';
import { TaskQueue } from '../util/queue';
import { PageLimitExceededError } from '../util/errors';
import { PageOutcome, PassResult, ScanResult, Session, isSuccess } from '.';
import PageSource from './scanner.interface';
import { findBoundary } from './results';

export interface PaginationScannerOptions {
    concurrency: number;
    maxPagesPerYear: number;
    logger?: Logger;
}

/**
 * Runs one pass over a year's pages: fetches consecutive pages from the start
 * page with at most `concurrency` requests outstanding, stops launching once
 * any page comes back non-successful, and waits for every launched request
 * before returning. Requests that land after the stop are kept, not
 * cancelled.
 */
export class PaginationScanner {
    private readonly logger: Logger;

    constructor(private readonly source: PageSource, private readonly options: PaginationScannerOptions) {
        this.logger = options.logger ?? defaultLogger;
        if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
            throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
        }
    }

    async scan(year: number, startPage: number, session: Session): Promise<PassResult> {
        const { concurrency, maxPagesPerYear } = this.options;
        const queue = new TaskQueue(concurrency);
        const outcomes: ScanResult = new Map();
        const inFlight: Promise<void>[] = [];
        let stopped = false;
        let nextPage = startPage;

        const record = (outcome: PageOutcome) => {
            outcomes.set(outcome.page, outcome);
            if (!isSuccess(outcome) && !stopped) {
                stopped = true;
                this.logger.debug(`Year ${year}: page ${outcome.page} returned ${outcome.status}, stopping new requests (${queue.active} in flight)`);
            }
        };

        this.logger.debug(`Starting fetch from page ${startPage} for year ${year}`);

        while (!stopped && nextPage <= maxPagesPerYear) {
            await queue.whenSlotAvailable();
            if (stopped) break;

            const page = nextPage++;
            inFlight.push(queue.add(() => this.source.fetchPage(year, page, session)).then(record));
        }

        // Barrier: every request of this pass lands before a decision is made
        await Promise.all(inFlight);

        const boundary = findBoundary(outcomes.values());
        if (!boundary) {
            throw new PageLimitExceededError(year, maxPagesPerYear);
        }

        this.logger.debug(
            `Year ${year}: pass from page ${startPage} fetched ${outcomes.size} pages, boundary at page ${boundary.page} (${boundary.status})`
        );

        return { year, startPage, outcomes, boundary };
    }
}
