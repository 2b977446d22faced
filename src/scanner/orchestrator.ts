import defaultLogger, { Logger } from '../util/logger';
import { runWithScanLabel } from '../util/context';
import { createYearQueue } from '../util/queues';
import { ScanSettings } from '../util/config';
import { SessionManager } from '../api/session';
import { createYearState, YearTotal } from '.';
import PageSource from './scanner.interface';
import { PaginationScanner } from './pagination';
import { ReauthCoordinator } from './reauth';
import { countSuccessPages, sumYearTotal } from './results';

export interface OrchestratorDeps {
    source: PageSource;
    sessions: SessionManager;
    settings: Pick<ScanSettings, 'concurrency' | 'yearConcurrency' | 'maxReauthAttempts' | 'maxPagesPerYear'>;
    logger?: Logger;
}

export class Orchestrator {
    private readonly scanner: PaginationScanner;
    private readonly coordinator: ReauthCoordinator;
    private readonly logger: Logger;

    constructor(private readonly deps: OrchestratorDeps) {
        this.logger = deps.logger ?? defaultLogger;
        this.scanner = new PaginationScanner(deps.source, {
            concurrency: deps.settings.concurrency,
            maxPagesPerYear: deps.settings.maxPagesPerYear,
            logger: this.logger,
        });
        this.coordinator = new ReauthCoordinator(deps.sessions, {
            maxReauthAttempts: deps.settings.maxReauthAttempts,
            logger: this.logger,
        });
    }

    /** Scans one year until its end of data is confirmed. */
    async scanYear(year: number): Promise<YearTotal> {
        const state = createYearState(year);
        let session = await this.deps.sessions.current();

        while (!state.finalized) {
            const pass = await this.scanner.scan(year, state.resumePage, session);
            const decision = await this.coordinator.decide(state, pass, session);
            if (decision.kind === 'retry') {
                session = decision.session;
            }
        }

        return {
            year,
            total: sumYearTotal(state.results),
            pages: countSuccessPages(state.results),
            passes: state.passes,
            reauthentications: state.reauthentications,
        };
    }

    /**
     * Scans every requested year. Totals are returned, and handed to
     * `onYearTotal`, in the order the years were given, whatever order the
     * scans finish in.
     */
    async run(years: number[], onYearTotal?: (total: YearTotal) => void): Promise<YearTotal[]> {
        // Authenticate once up front so bad credentials fail before any page request
        await this.deps.sessions.current();

        this.logger.debug(`Filtering movies by year(s): ${years.join(', ')}`);

        const queue = createYearQueue(this.deps.settings.yearConcurrency);
        const pending = years.map(year =>
            queue
                .add(() => runWithScanLabel(String(year), () => this.scanYear(year)))
                .then(
                    (total): { ok: true; total: YearTotal } => ({ ok: true, total }),
                    (error: unknown): { ok: false; error: unknown } => ({ ok: false, error })
                )
        );

        const totals: YearTotal[] = [];
        for (const settled of pending) {
            const result = await settled;
            if (!result.ok) {
                // Years not started yet are dropped; running ones finish unobserved
                queue.clear();
                throw result.error;
            }
            totals.push(result.total);
            onYearTotal?.(result.total);
        }
        return totals;
    }
}
