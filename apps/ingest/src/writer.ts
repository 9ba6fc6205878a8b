import { randomUUID } from 'node:crypto';
import { mkdir, open, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { gzipSync } from 'fflate';
import { parquetWriteBuffer } from 'hyparquet-writer';
import {
  PARTITION_COLUMNS,
  PartitionWriteError,
  assertDay,
  createLogger,
  errorMessage,
  fileExists,
  legacyPartitionPath,
  locatePartition,
  partitionPath,
  type PartitionKind,
} from '@mempool-archive/archive';
import type { PartitionColumns } from './types';

export type WriteOutcome =
  | { status: 'written'; path: string; rows: number; bytes: number }
  | { status: 'skipped'; path: string };

export interface PartitionWriterOptions {
  dataDir: string;
  rowGroupSize?: number;
}

export const DEFAULT_ROW_GROUP_SIZE = 10_000;

export class PartitionWriter {
  private log = createLogger('ingest:writer');
  readonly dataDir: string;
  private rowGroupSize: number;

  constructor(opts: PartitionWriterOptions) {
    this.dataDir = opts.dataDir;
    this.rowGroupSize = opts.rowGroupSize ?? DEFAULT_ROW_GROUP_SIZE;
  }

  existing(day: string, kind: PartitionKind): Promise<string | undefined> {
    return locatePartition(this.dataDir, kind, day);
  }

  async write(day: string, kind: PartitionKind, partition: PartitionColumns, opts: { overwrite: boolean }): Promise<WriteOutcome> {
    assertDay(day);
    this.checkSchema(day, kind, partition);

    const found = await this.existing(day, kind);
    if (found && !opts.overwrite) {
      this.log.info({ day, kind, path: found }, 'partition exists, skipping');
      return { status: 'skipped', path: found };
    }

    const target = partitionPath(this.dataDir, kind, day);
    const encoded = this.encode(day, kind, target, partition);
    await this.replace(day, kind, target, encoded);

    await this.retireLegacy(day, kind);

    this.log.info({ day, kind, path: target, rows: partition.rowCount, bytes: encoded.byteLength }, 'partition written');
    return { status: 'written', path: target, rows: partition.rowCount, bytes: encoded.byteLength };
  }

  private checkSchema(day: string, kind: PartitionKind, partition: PartitionColumns): void {
    const expected: readonly string[] = PARTITION_COLUMNS[kind];
    const names = partition.columns.map((c) => c.name);
    if (partition.kind !== kind || names.join(',') !== expected.join(',')) {
      throw new PartitionWriteError(day, kind, undefined, `columns [${names.join(', ')}] of ${partition.kind} do not match the ${kind} schema`);
    }
    const ragged = partition.columns.find((c) => c.data.length !== partition.rowCount);
    if (ragged) {
      throw new PartitionWriteError(day, kind, undefined, `column ${ragged.name} has ${ragged.data.length} rows, expected ${partition.rowCount}`);
    }
  }

  // Gzip pages (archival size over write speed), min/max statistics per column chunk.
  private encode(day: string, kind: PartitionKind, target: string, partition: PartitionColumns): Uint8Array {
    try {
      const buffer = parquetWriteBuffer({
        columnData: partition.columns.map((c) => ({ name: c.name, data: c.data, type: c.type })),
        codec: 'GZIP',
        compressors: { GZIP: (input) => gzipSync(input) },
        statistics: true,
        rowGroupSize: this.rowGroupSize,
      });
      return new Uint8Array(buffer);
    } catch (err) {
      throw new PartitionWriteError(day, kind, target, `encoding failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Temp file beside the target, fsync, rename: readers never observe a partial partition. */
  private async replace(day: string, kind: PartitionKind, target: string, encoded: Uint8Array): Promise<void> {
    const dir = path.dirname(target);
    const tmp = path.join(dir, `.${path.basename(target)}.${process.pid}.${randomUUID()}.tmp`);
    try {
      await mkdir(dir, { recursive: true });
      const handle = await open(tmp, 'wx');
      try {
        await handle.writeFile(encoded);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmp, target);
    } catch (err) {
      await rm(tmp, { force: true });
      throw new PartitionWriteError(day, kind, target, errorMessage(err), { cause: err });
    }
  }

  private async retireLegacy(day: string, kind: PartitionKind): Promise<void> {
    const legacy = legacyPartitionPath(this.dataDir, kind, day);
    try {
      if (!(await fileExists(legacy))) return;
      await rm(legacy);
    } catch (err) {
      throw new PartitionWriteError(day, kind, legacy, `removing legacy partition failed: ${errorMessage(err)}`, { cause: err });
    }
    this.log.info({ day, kind, path: legacy }, 'legacy partition removed');
  }
}
