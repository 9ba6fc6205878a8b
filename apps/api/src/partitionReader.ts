import { open, type FileHandle } from 'node:fs/promises';
import { gunzipSync } from 'fflate';
import { parquetMetadataAsync, parquetReadObjects, type AsyncBuffer, type FileMetaData } from 'hyparquet';
import { PartitionReadError, errorMessage } from '@mempool-archive/archive';
import { rowGroupsTotal } from './metrics';

export type RawTransaction = {
  timestampMs: number;
  rawTx: Uint8Array;
};

type RowGroup = FileMetaData['row_groups'][number];

export type RowRange = { start: number; end: number };

const TIMESTAMP = 'timestamp';
const RAW_TX = 'rawTx';

/** Every slice goes through the one handle, so a rename over the path mid-read is not observed. */
function handleBuffer(handle: FileHandle, byteLength: number): AsyncBuffer {
  return {
    byteLength,
    async slice(start: number, end: number = byteLength): Promise<ArrayBuffer> {
      const length = end - start;
      const out = new ArrayBuffer(length);
      const { bytesRead } = await handle.read(new Uint8Array(out), 0, length, start);
      if (bytesRead !== length) throw new Error(`short read at offset ${start}: ${bytesRead} of ${length} bytes`);
      return out;
    },
  };
}

function toMillis(value: unknown): number | undefined {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  return undefined;
}

function timestampBounds(group: RowGroup): { min: number; max: number } | undefined {
  const chunk = group.columns.find((c) => c.meta_data?.path_in_schema.join('.') === TIMESTAMP);
  const stats = chunk?.meta_data?.statistics;
  if (!stats) return undefined;
  const min = toMillis(stats.min_value ?? stats.min);
  const max = toMillis(stats.max_value ?? stats.max);
  return min === undefined || max === undefined ? undefined : { min, max };
}

/** Row ranges of the groups whose timestamp stats overlap [fromMs, toMs); groups without stats are kept. */
export function candidateRanges(metadata: FileMetaData, fromMs: number, toMs: number): RowRange[] {
  const ranges: RowRange[] = [];
  let offset = 0;
  for (const group of metadata.row_groups) {
    const rows = Number(group.num_rows);
    const bounds = timestampBounds(group);
    const overlaps = !bounds || (bounds.min < toMs && bounds.max >= fromMs);
    rowGroupsTotal.inc({ outcome: overlaps ? 'read' : 'pruned' });
    if (overlaps && rows > 0) {
      const last = ranges.at(-1);
      if (last && last.end === offset) last.end = offset + rows;
      else ranges.push({ start: offset, end: offset + rows });
    }
    offset += rows;
  }
  return ranges;
}

export class PartitionReader {
  constructor(
    private readonly day: string,
    private readonly file: string,
  ) {}

  /** Rows of the partition with fromMs <= timestamp < toMs, in file order. */
  async readRange(fromMs: number, toMs: number): Promise<RawTransaction[]> {
    const handle = await open(this.file, 'r').catch((err: unknown) => {
      throw this.fail(errorMessage(err), err);
    });
    try {
      const { size } = await handle.stat();
      const file = handleBuffer(handle, size);
      const metadata = await this.footer(file);
      const rows: RawTransaction[] = [];
      for (const range of candidateRanges(metadata, fromMs, toMs)) {
        for (const row of await this.decode(file, metadata, range)) {
          if (row.timestampMs >= fromMs && row.timestampMs < toMs) rows.push(row);
        }
      }
      return rows;
    } finally {
      await handle.close();
    }
  }

  private async footer(file: AsyncBuffer): Promise<FileMetaData> {
    let metadata: FileMetaData;
    try {
      metadata = await parquetMetadataAsync(file);
    } catch (err) {
      throw this.fail(`unreadable footer: ${errorMessage(err)}`, err);
    }
    const names = new Set(metadata.schema.slice(1).map((e) => e.name));
    for (const column of [TIMESTAMP, RAW_TX]) {
      if (!names.has(column)) throw this.fail(`missing column ${column}`);
    }
    return metadata;
  }

  private async decode(file: AsyncBuffer, metadata: FileMetaData, range: RowRange): Promise<RawTransaction[]> {
    let objects: Record<string, unknown>[];
    try {
      objects = await parquetReadObjects({
        file,
        metadata,
        columns: [TIMESTAMP, RAW_TX],
        rowStart: range.start,
        rowEnd: range.end,
        utf8: false,
        compressors: { GZIP: (input) => gunzipSync(input) },
      });
    } catch (err) {
      throw this.fail(`rows ${range.start}-${range.end}: ${errorMessage(err)}`, err);
    }
    return objects.map((object, i) => {
      const row = range.start + i;
      const timestampMs = toMillis(object[TIMESTAMP]);
      if (timestampMs === undefined) throw this.fail(`row ${row}: ${TIMESTAMP} is null or malformed`);
      const rawTx = object[RAW_TX];
      if (!(rawTx instanceof Uint8Array)) throw this.fail(`row ${row}: ${RAW_TX} is null or malformed`);
      return { timestampMs, rawTx };
    });
  }

  private fail(reason: string, cause?: unknown): PartitionReadError {
    return new PartitionReadError(this.day, this.file, reason, cause === undefined ? undefined : { cause });
  }
}
