import { rm } from 'node:fs/promises';
import {
  InvalidDayError,
  SourceFetchError,
  partitionPath,
  type PartitionKind,
} from '@mempool-archive/archive';
import { Ingestor } from '../src/pipeline';
import type { SourceFetcher } from '../src/source';
import { PartitionWriter } from '../src/writer';
import { csv, signedTx, tempDir, transactionsLine, zipOf } from './helpers';

class FakeSource implements SourceFetcher {
  calls: string[] = [];
  missing = new Set<string>();

  async fetchDump(kind: PartitionKind, day: string): Promise<Uint8Array> {
    this.calls.push(`${kind}/${day}`);
    if (this.missing.has(day)) throw new SourceFetchError({ url: `https://dumps.test/${day}`, status: 404, kind, day }, 'HTTP 404');
    const base = Date.parse(`${day}T00:00:00Z`);
    if (kind === 'transactions') {
      return zipOf({ [`${day}_transactions.csv`]: csv([transactionsLine(base, signedTx(0)), transactionsLine(base + 1, signedTx(1))]) });
    }
    return zipOf({ [`${day}_sourcelog.csv`]: csv([`${base},0xaa,local`, `${base + 1},0xbb,local`, `bad,0xcc,local`]) });
  }
}

let dataDir: string;
let source: FakeSource;
let ingestor: Ingestor;

beforeEach(async () => {
  dataDir = await tempDir('archive-pipeline-');
  source = new FakeSource();
  ingestor = new Ingestor(source, new PartitionWriter({ dataDir }));
});

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true });
});

describe('Ingestor.ingest', () => {
  it('fetches, decodes and writes one day', async () => {
    const result = await ingestor.ingest('2023-08-31', 'sourcelog', { overwrite: false });
    expect(result).toEqual({
      day: '2023-08-31',
      kind: 'sourcelog',
      status: 'written',
      path: partitionPath(dataDir, 'sourcelog', '2023-08-31'),
      rows: 2,
    });
  });

  it('writes transactions partitions from signed payloads', async () => {
    const result = await ingestor.ingest('2023-08-31', 'transactions', { overwrite: false });
    expect(result).toMatchObject({ status: 'written', rows: 2 });
  });

  it('skips an archived day without downloading it', async () => {
    await ingestor.ingest('2023-08-31', 'sourcelog', { overwrite: false });
    const again = await ingestor.ingest('2023-08-31', 'sourcelog', { overwrite: false });

    expect(again.status).toBe('skipped');
    expect(source.calls).toEqual(['sourcelog/2023-08-31']);
  });

  it('downloads again when overwriting', async () => {
    await ingestor.ingest('2023-08-31', 'sourcelog', { overwrite: false });
    const again = await ingestor.ingest('2023-08-31', 'sourcelog', { overwrite: true });

    expect(again.status).toBe('written');
    expect(source.calls).toHaveLength(2);
  });

  it('rejects a malformed day before fetching', async () => {
    await expect(ingestor.ingest('2023-02-30', 'sourcelog', { overwrite: false })).rejects.toThrow(InvalidDayError);
    expect(source.calls).toEqual([]);
  });
});

describe('Ingestor.ingestBatch', () => {
  const days = ['2023-08-30', '2023-08-31', '2023-09-01'];

  it('records failures and continues when not strict', async () => {
    source.missing.add('2023-08-31');
    const entries = await ingestor.ingestBatch(days, ['sourcelog'], { overwrite: false, strict: false, progress: true });

    expect(entries.map((e) => `${e.day}:${e.status}`)).toEqual(['2023-08-30:written', '2023-08-31:failed', '2023-09-01:written']);
    const failed = entries[1];
    expect(failed?.status === 'failed' && failed.error).toBeInstanceOf(SourceFetchError);
  });

  it('stops at the first failure when strict', async () => {
    source.missing.add('2023-08-31');
    await expect(
      ingestor.ingestBatch(days, ['sourcelog'], { overwrite: false, strict: true, progress: false }),
    ).rejects.toThrow(SourceFetchError);
    expect(source.calls).toEqual(['sourcelog/2023-08-30', 'sourcelog/2023-08-31']);
  });

  it('ingests every requested kind per day', async () => {
    const entries = await ingestor.ingestBatch(['2023-08-31'], ['sourcelog', 'transactions'], { overwrite: false, strict: true, progress: false });
    expect(entries.map((e) => e.kind)).toEqual(['sourcelog', 'transactions']);
    expect(source.calls).toEqual(['sourcelog/2023-08-31', 'transactions/2023-08-31']);
  });
});
