import { PageOutcome, Session } from '.';

interface PageSource {
    /**
     * Fetches one page of a year's movie listing and classifies the result.
     *
     * Issues exactly one request and never retries. Every failure, including
     * an unreachable server or an unparseable body, comes back as a
     * non-success outcome instead of a rejection, so a scan pass can always
     * finish.
     */
    fetchPage(year: number, page: number, session: Session): Promise<PageOutcome>;
}

export default PageSource;
