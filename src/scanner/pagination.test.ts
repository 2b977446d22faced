jest.mock('../util/logger', () => ({
  __esModule: true,
  default: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { PageOutcome, PageStatus, Session } from '.';
import PageSource from './scanner.interface';
import { PaginationScanner } from './pagination';
import { PageLimitExceededError } from '../util/errors';

const session: Session = { token: 'test-token', generation: 1 };

const ticks = async (n: number) => {
  for (let i = 0; i < n; i++) {
    await new Promise(resolve => setImmediate(resolve));
  }
};

interface ScriptedPage {
  status: PageStatus;
  count?: number;
  /** Event-loop turns before the page answers. */
  delay?: number;
}

/** Answers from a script; unlisted pages are past the end. */
class ScriptedSource implements PageSource {
  readonly requested: number[] = [];
  readonly tokens: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly script: Record<number, ScriptedPage>) {}

  async fetchPage(year: number, page: number, session: Session): Promise<PageOutcome> {
    this.requested.push(page);
    this.tokens.push(session.token);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);

    const entry = this.script[page] ?? { status: 'end_of_data' };
    await ticks(entry.delay ?? 1);

    this.active--;
    const count = entry.status === 'success' ? entry.count ?? 1 : 0;
    return { year, page, count, status: entry.status };
  }
}

function successPages(...counts: number[]): Record<number, ScriptedPage> {
  const script: Record<number, ScriptedPage> = {};
  counts.forEach((count, i) => {
    script[i + 1] = { status: 'success', count };
  });
  return script;
}

describe('PaginationScanner', () => {
  it('should reject a non-positive concurrency', () => {
    expect(() => new PaginationScanner(new ScriptedSource({}), { concurrency: 0, maxPagesPerYear: 10 })).toThrow(RangeError);
  });

  it('should fetch pages in order one at a time with concurrency 1', async () => {
    const source = new ScriptedSource(successPages(10, 6));
    const scanner = new PaginationScanner(source, { concurrency: 1, maxPagesPerYear: 100 });

    const pass = await scanner.scan(1905, 1, session);

    expect(source.requested).toEqual([1, 2, 3]);
    expect(source.maxActive).toBe(1);
    expect(pass.startPage).toBe(1);
    expect(pass.boundary).toEqual({ year: 1905, page: 3, count: 0, status: 'end_of_data' });
    expect([...pass.outcomes.keys()].sort((a, b) => a - b)).toEqual([1, 2, 3]);
  });

  it('should keep at most the concurrency limit in flight', async () => {
    const source = new ScriptedSource(successPages(1, 1, 1, 1, 1, 1, 1, 1, 1, 1));
    const scanner = new PaginationScanner(source, { concurrency: 3, maxPagesPerYear: 100 });

    const pass = await scanner.scan(1930, 1, session);

    expect(source.maxActive).toBe(3);
    expect(pass.boundary.page).toBe(11);
  });

  it('should let speculative requests land and record them', async () => {
    const source = new ScriptedSource(successPages(5, 5));
    const scanner = new PaginationScanner(source, { concurrency: 4, maxPagesPerYear: 100 });

    const pass = await scanner.scan(1894, 1, session);

    // Pages 1-4 start together, every one of them is waited for
    expect(source.requested.slice(0, 4)).toEqual([1, 2, 3, 4]);
    expect(source.active).toBe(0);
    for (const page of source.requested) {
      expect(pass.outcomes.has(page)).toBe(true);
    }
    expect(pass.boundary.page).toBe(3);
  });

  it('should choose the lowest failing page, not the first to fail', async () => {
    const source = new ScriptedSource({
      1: { status: 'success', count: 4 },
      2: { status: 'success', count: 4 },
      3: { status: 'other', delay: 6 },
      4: { status: 'success', count: 4 },
      5: { status: 'unauthorized', delay: 1 },
    });
    const scanner = new PaginationScanner(source, { concurrency: 5, maxPagesPerYear: 100 });

    const pass = await scanner.scan(2021, 1, session);

    expect(pass.outcomes.get(5)?.status).toBe('unauthorized');
    expect(pass.boundary).toEqual({ year: 2021, page: 3, count: 0, status: 'other' });
  });

  it('should start from the requested page with the given session', async () => {
    const source = new ScriptedSource({ ...successPages(1, 1, 1), 4: { status: 'success', count: 2 } });
    const scanner = new PaginationScanner(source, { concurrency: 1, maxPagesPerYear: 100 });

    const pass = await scanner.scan(2020, 3, session);

    expect(source.requested).toEqual([3, 4, 5]);
    expect(new Set(source.tokens)).toEqual(new Set(['test-token']));
    expect(pass.boundary.page).toBe(5);
  });

  it('should give up after the page limit without an end of data', async () => {
    const source = new ScriptedSource(successPages(...Array.from({ length: 20 }, () => 1)));
    const scanner = new PaginationScanner(source, { concurrency: 2, maxPagesPerYear: 5 });

    await expect(scanner.scan(2022, 1, session)).rejects.toBeInstanceOf(PageLimitExceededError);
    expect([...source.requested].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
    expect(source.active).toBe(0);
  });
});
