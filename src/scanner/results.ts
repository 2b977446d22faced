import defaultLogger, { Logger } from '../util/logger';
import { isSuccess, PageOutcome, ScanResult } from '.';

/**
 * Lowest-numbered non-success outcome, or undefined when every page succeeded.
 * Completion order is irrelevant here: a later page failing first must not
 * hide an earlier one.
 */
export function findBoundary(outcomes: Iterable<PageOutcome>): PageOutcome | undefined {
    let boundary: PageOutcome | undefined;
    for (const outcome of outcomes) {
        if (isSuccess(outcome)) continue;
        if (!boundary || outcome.page < boundary.page) {
            boundary = outcome;
        }
    }
    return boundary;
}

/**
 * Folds a pass into the accumulated result, in place. A success is never
 * replaced; anything else is overwritten by the newer outcome.
 *
 * @returns pages that became successful with this pass
 */
export function mergeScanResults(accumulated: ScanResult, pass: ScanResult, logger: Logger = defaultLogger): number[] {
    const gained: number[] = [];

    for (const [page, outcome] of pass) {
        const existing = accumulated.get(page);

        if (existing && isSuccess(existing)) {
            if (isSuccess(outcome) && outcome.count !== existing.count) {
                logger.warn(`Page ${page} of year ${outcome.year} changed from ${existing.count} to ${outcome.count} movies between passes, keeping ${existing.count}`);
            }
            continue;
        }

        accumulated.set(page, outcome);
        if (isSuccess(outcome)) gained.push(page);
    }

    return gained.sort((a, b) => a - b);
}

/**
 * Settles a year's result at its final boundary. Failures are dropped. A
 * success at or beyond the boundary is dropped only when the final pass
 * produced it; one confirmed by an earlier pass stays.
 */
export function finalizeAtBoundary(results: ScanResult, boundaryPage: number, gainedInPass: readonly number[]): void {
    const fresh = new Set(gainedInPass);
    for (const [page, outcome] of [...results]) {
        if (!isSuccess(outcome) || (page >= boundaryPage && fresh.has(page))) {
            results.delete(page);
        }
    }
}

export function resumePageFor(boundaryPage: number): number {
    return Math.max(1, boundaryPage - 1);
}

export function countSuccessPages(results: ScanResult): number {
    let pages = 0;
    for (const outcome of results.values()) {
        if (isSuccess(outcome)) pages++;
    }
    return pages;
}

/** Year total: the movie counts of all successful pages. */
export function sumYearTotal(results: ScanResult): number {
    let total = 0;
    for (const outcome of results.values()) {
        if (isSuccess(outcome)) total += outcome.count;
    }
    return total;
}
