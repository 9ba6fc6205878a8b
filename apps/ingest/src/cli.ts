import { parseArgs } from 'node:util';
import {
  InvalidDayError,
  createLogger,
  ensureLayout,
  isDay,
  isDirectory,
  isMonth,
  type PartitionKind,
} from '@mempool-archive/archive';
import type { ListingService } from './listing';
import type { BatchEntry, Ingestor } from './pipeline';

export type Command =
  | { name: 'list-months' }
  | { name: 'list-days'; month: string }
  | {
      name: 'get';
      target: string;
      kinds: PartitionKind[];
      dataDir: string;
      overwrite: boolean;
      ignoreErrors: boolean;
    };

export const USAGE = `usage: mempool-archive [options] <command>

commands:
  list-months                 list months available upstream
  list-days <month>           list days available in a month (YYYY-MM)
  get <day|month>             ingest one day (YYYY-MM-DD) or every day of a month

options:
  -d, --datadir <dir>         archive directory (default: $MEMPOOL_DATADIR or ./data)
  -o, --overwrite             replace partitions that already exist
  -i, --ignore-errors         log failed days and continue
      --sourcelog             ingest sourcelog partitions
      --transaction-data      ingest transaction-data partitions
      --transactions          ingest transactions partitions (raw payloads)
  -h, --help                  show this help

With no kind flag, get ingests sourcelog and transaction-data.`;

export class UsageError extends Error {}

function parseArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        datadir: { type: 'string', short: 'd' },
        overwrite: { type: 'boolean', short: 'o', default: false },
        'ignore-errors': { type: 'boolean', short: 'i', default: false },
        sourcelog: { type: 'boolean', default: false },
        'transaction-data': { type: 'boolean', default: false },
        transactions: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCommand(argv: string[], defaultDataDir: string): Command | 'help' {
  const { values, positionals } = parseArgv(argv);
  if (values.help) return 'help';

  const [name, arg, ...rest] = positionals;
  if (rest.length > 0) throw new UsageError(`unexpected arguments: ${rest.join(' ')}`);

  switch (name) {
    case 'list-months':
      if (arg !== undefined) throw new UsageError('list-months takes no argument');
      return { name };
    case 'list-days':
      if (arg === undefined || !isMonth(arg)) throw new UsageError('list-days needs a month (YYYY-MM)');
      return { name, month: arg };
    case 'get': {
      if (arg === undefined) throw new UsageError('get needs a day (YYYY-MM-DD) or a month (YYYY-MM)');
      const selected: PartitionKind[] = [];
      if (values.sourcelog) selected.push('sourcelog');
      if (values['transaction-data']) selected.push('transaction-data');
      if (values.transactions) selected.push('transactions');
      return {
        name,
        target: arg,
        kinds: selected.length > 0 ? selected : ['sourcelog', 'transaction-data'],
        dataDir: values.datadir ?? defaultDataDir,
        overwrite: values.overwrite ?? false,
        ignoreErrors: values['ignore-errors'] ?? false,
      };
    }
    case undefined:
      throw new UsageError('missing command');
    default:
      throw new UsageError(`unknown command "${name}"`);
  }
}

export interface CliDeps {
  listing: ListingService;
  ingestorFor(dataDir: string): Ingestor;
  print(line: string): void;
}

/** Day list for `get`: a day as given, a month (or a day-less prefix of one) via the listing. */
export async function resolveDays(target: string, listing: ListingService): Promise<string[]> {
  const parts = target.split('-');
  if (parts.length === 3) {
    if (!isDay(target)) throw new InvalidDayError(target);
    return [target];
  }
  const month = parts.slice(0, 2).join('-');
  if (!isMonth(month)) throw new UsageError(`"${target}" is neither a day nor a month`);
  return listing.listDays(month);
}

export function summarize(entries: BatchEntry[]): { written: number; skipped: number; failed: number } {
  return {
    written: entries.filter((e) => e.status === 'written').length,
    skipped: entries.filter((e) => e.status === 'skipped').length,
    failed: entries.filter((e) => e.status === 'failed').length,
  };
}

export async function runCommand(cmd: Command, deps: CliDeps): Promise<number> {
  const log = createLogger('ingest:cli');
  switch (cmd.name) {
    case 'list-months':
      for (const month of await deps.listing.listMonths()) deps.print(month);
      return 0;
    case 'list-days':
      for (const day of await deps.listing.listDays(cmd.month)) deps.print(day);
      return 0;
    case 'get': {
      if (!(await isDirectory(cmd.dataDir))) throw new UsageError(`datadir does not exist: ${cmd.dataDir}`);
      await ensureLayout(cmd.dataDir);
      const days = await resolveDays(cmd.target, deps.listing);
      const entries = await deps.ingestorFor(cmd.dataDir).ingestBatch(days, cmd.kinds, {
        overwrite: cmd.overwrite,
        strict: !cmd.ignoreErrors,
        progress: true,
      });
      const summary = summarize(entries);
      log.info({ ...summary, days: days.length, kinds: cmd.kinds }, 'done');
      return summary.failed > 0 ? 1 : 0;
    }
  }
}
