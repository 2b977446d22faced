export type PageStatus = 'success' | 'end_of_data' | 'unauthorized' | 'other';

export type PageFailureReason = 'transport' | 'malformed';

export interface PageOutcome {
    readonly year: number;
    readonly page: number;
    /** Number of movies on the page; 0 unless `status` is 'success'. */
    readonly count: number;
    readonly status: PageStatus;
    readonly httpStatus?: number;
    readonly reason?: PageFailureReason;
}

/** Page number -> outcome. Keys need not be contiguous. */
export type ScanResult = Map<number, PageOutcome>;

export interface PassResult {
    year: number;
    startPage: number;
    outcomes: ScanResult;
    /** Lowest-numbered non-success outcome of the pass. */
    boundary: PageOutcome;
}

export interface Session {
    readonly token: string;
    /** Increments every time the session is replaced. */
    readonly generation: number;
}

export interface YearState {
    readonly year: number;
    resumePage: number;
    results: ScanResult;
    passes: number;
    reauthentications: number;
    consecutiveReauths: number;
    finalized: boolean;
}

export type ReauthDecision =
    | { kind: 'done'; boundary: PageOutcome }
    | { kind: 'retry'; session: Session; resumePage: number };

export interface YearTotal {
    year: number;
    total: number;
    /** Pages that contributed to the total. */
    pages: number;
    passes: number;
    reauthentications: number;
}

export const isSuccess = (outcome: PageOutcome): boolean => outcome.status === 'success';

export function createYearState(year: number): YearState {
    return {
        year,
        resumePage: 1,
        results: new Map(),
        passes: 0,
        reauthentications: 0,
        consecutiveReauths: 0,
        finalized: false,
    };
}
