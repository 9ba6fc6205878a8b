import { load } from 'cheerio';
import { MalformedSourceError, isDay, isMonth } from '@mempool-archive/archive';
import { httpGet } from './source';

export interface ListingService {
  listMonths(): Promise<string[]>;
  listDays(month: string): Promise<string[]>;
}

export function parseMonthIndex(html: string): string[] {
  const $ = load(html);
  const months = $('ul.root-months li a')
    .map((_, el) => $(el).text().trim())
    .get()
    .filter(isMonth);
  return [...new Set(months)].sort();
}

// Month pages list every dump of the month; the day is the stem of each .csv.zip.
export function parseDayIndex(html: string): string[] {
  const $ = load(html);
  const days = $('table.pure-table tbody tr.c1 td.fn a')
    .map((_, el) => $(el).text().trim())
    .get()
    .filter((name) => name.endsWith('.csv.zip'))
    .map((name) => name.slice(0, -'.csv.zip'.length))
    .filter(isDay);
  return [...new Set(days)].sort();
}

export class DumpsterListing implements ListingService {
  constructor(
    private readonly indexUrl: string,
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
  ) {}

  async listMonths(): Promise<string[]> {
    const res = await httpGet(this.indexUrl, this.timeoutMs);
    const months = parseMonthIndex(await res.text());
    if (months.length === 0) throw new MalformedSourceError('month index', `no months listed at ${this.indexUrl}`);
    return months;
  }

  async listDays(month: string): Promise<string[]> {
    if (!isMonth(month)) throw new MalformedSourceError('month', `"${month}" is not YYYY-MM`);
    const url = `${this.baseUrl.replace(/\/+$/, '')}/${month}/index.html`;
    const res = await httpGet(url, this.timeoutMs);
    const days = parseDayIndex(await res.text());
    if (days.length === 0) throw new MalformedSourceError('day index', `no days listed at ${url}`);
    return days;
  }
}
