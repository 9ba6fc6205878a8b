import {
  DayFileNotFoundError,
  InvalidTimestampError,
  assertTimestampMs,
  createLogger,
  enumerateDays,
  locatePartition,
} from '@mempool-archive/archive';
import { partitionsReadTotal, queryRowsTotal } from './metrics';
import { PartitionReader, type RawTransaction } from './partitionReader';

export type { RawTransaction };

export class RangeQueryEngine {
  private log = createLogger('api:query');

  constructor(readonly dataDir: string) {}

  /**
   * Raw signed payloads with fromMs <= timestamp < toMs, ascending by timestamp.
   * Every day in the window must have a transactions partition; nothing is read
   * until all of them are located.
   */
  async queryRawTransactions(fromMs: number, toMs: number): Promise<RawTransaction[]> {
    assertTimestampMs('from', fromMs);
    assertTimestampMs('to', toMs);
    if (fromMs > toMs) throw new InvalidTimestampError('from', fromMs, `must not be after to=${toMs}`);

    const readers = await this.preflight(enumerateDays(fromMs, toMs));
    const rows: RawTransaction[] = [];
    for (const reader of readers) {
      partitionsReadTotal.inc();
      for (const row of await reader.readRange(fromMs, toMs)) rows.push(row);
    }
    // Array#sort is stable: ties keep day order, then file order.
    rows.sort((a, b) => a.timestampMs - b.timestampMs);

    queryRowsTotal.inc(rows.length);
    this.log.debug({ fromMs, toMs, days: readers.length, rows: rows.length }, 'range query');
    return rows;
  }

  private async preflight(days: string[]): Promise<PartitionReader[]> {
    const readers: PartitionReader[] = [];
    for (const day of days) {
      const file = await locatePartition(this.dataDir, 'transactions', day);
      if (!file) throw new DayFileNotFoundError(day, 'transactions');
      readers.push(new PartitionReader(day, file));
    }
    return readers;
  }
}
