import { assertDay, createLogger, type PartitionKind } from '@mempool-archive/archive';
import { decodeDump } from './decoder';
import { ingestDurationMs, partitionsTotal } from './metrics';
import { normalize } from './normalizer';
import { SHAPES } from './shapes';
import type { SourceFetcher } from './source';
import type { SourceBatch } from './types';
import type { PartitionWriter } from './writer';

export interface IngestOptions {
  overwrite: boolean;
}

export interface BatchOptions extends IngestOptions {
  /** Rethrow the first failure instead of recording it and moving on. */
  strict: boolean;
  progress: boolean;
}

export type IngestResult =
  | { day: string; kind: PartitionKind; status: 'written'; path: string; rows: number }
  | { day: string; kind: PartitionKind; status: 'skipped'; path: string };

export type BatchEntry = IngestResult | { day: string; kind: PartitionKind; status: 'failed'; error: Error };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class Ingestor {
  private log = createLogger('ingest:pipeline');

  constructor(
    private readonly source: SourceFetcher,
    private readonly writer: PartitionWriter,
  ) {}

  async ingest(day: string, kind: PartitionKind, opts: IngestOptions): Promise<IngestResult> {
    assertDay(day);

    // checked before downloading so reruns over an archived month cost nothing
    const found = await this.writer.existing(day, kind);
    if (found && !opts.overwrite) {
      partitionsTotal.inc({ kind, result: 'skipped' });
      this.log.info({ day, kind, path: found }, 'partition exists, skipping download');
      return { day, kind, status: 'skipped', path: found };
    }

    const started = performance.now();
    try {
      const bytes = await this.source.fetchDump(kind, day);
      const batch = await this.decode(kind, bytes);
      const partition = normalize(batch);
      const outcome = await this.writer.write(day, kind, partition, opts);
      partitionsTotal.inc({ kind, result: outcome.status });
      return outcome.status === 'written'
        ? { day, kind, status: 'written', path: outcome.path, rows: outcome.rows }
        : { day, kind, status: 'skipped', path: outcome.path };
    } catch (err) {
      partitionsTotal.inc({ kind, result: 'failed' });
      throw err;
    } finally {
      ingestDurationMs.observe({ kind }, performance.now() - started);
    }
  }

  async ingestBatch(days: string[], kinds: PartitionKind[], opts: BatchOptions): Promise<BatchEntry[]> {
    const entries: BatchEntry[] = [];
    for (const [i, day] of days.entries()) {
      for (const kind of kinds) {
        try {
          entries.push(await this.ingest(day, kind, opts));
        } catch (err) {
          if (opts.strict) throw err;
          this.log.error({ err, day, kind }, 'ingestion failed, continuing');
          entries.push({ day, kind, status: 'failed', error: toError(err) });
        }
      }
      if (opts.progress) this.log.info({ day, done: i + 1, total: days.length }, `ingested ${i + 1}/${days.length}`);
    }
    return entries;
  }

  private async decode(kind: PartitionKind, bytes: Uint8Array): Promise<SourceBatch> {
    switch (kind) {
      case 'sourcelog':
        return { kind, records: await decodeDump(bytes, SHAPES.sourcelog) };
      case 'transaction-data':
        return { kind, records: await decodeDump(bytes, SHAPES['transaction-data']) };
      case 'transactions':
        return { kind, records: await decodeDump(bytes, SHAPES.transactions) };
    }
  }
}
