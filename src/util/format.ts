import { YearTotal } from '../scanner';

export function formatYearTotal({ year, total }: Pick<YearTotal, 'year' | 'total'>): string {
    const suffix = total === 1 ? '' : 's';
    return `Year ${year}: ${total} movie${suffix}`;
}
