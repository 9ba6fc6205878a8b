import {
  SourceFetchError,
  createLogger,
  errorMessage,
  monthOf,
  type PartitionKind,
} from '@mempool-archive/archive';
import { sourceBytesTotal } from './metrics';

export interface SourceFetcher {
  fetchDump(kind: PartitionKind, day: string): Promise<Uint8Array>;
}

const FILE_NAMES: Record<PartitionKind, (day: string) => string> = {
  sourcelog: (day) => `${day}_sourcelog.csv.zip`,
  'transaction-data': (day) => `${day}.csv.zip`,
  transactions: (day) => `${day}_transactions.csv.zip`,
};

export function dumpUrl(baseUrl: string, kind: PartitionKind, day: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${monthOf(day)}/${FILE_NAMES[kind](day)}`;
}

export async function httpGet(url: string, timeoutMs: number, ctx: { kind?: PartitionKind; day?: string } = {}): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    throw new SourceFetchError({ url, ...ctx }, errorMessage(err), { cause: err });
  }
  if (!res.ok) {
    throw new SourceFetchError({ url, status: res.status, ...ctx }, `HTTP ${res.status}`);
  }
  return res;
}

export class HttpSource implements SourceFetcher {
  private log = createLogger('ingest:source');

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
  ) {}

  async fetchDump(kind: PartitionKind, day: string): Promise<Uint8Array> {
    const url = dumpUrl(this.baseUrl, kind, day);
    this.log.debug({ url }, 'downloading dump');
    const res = await httpGet(url, this.timeoutMs, { kind, day });
    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(await res.arrayBuffer());
    } catch (err) {
      throw new SourceFetchError({ url, status: res.status, kind, day }, `body read failed: ${errorMessage(err)}`, { cause: err });
    }
    sourceBytesTotal.inc({ kind }, bytes.byteLength);
    this.log.debug({ url, bytes: bytes.byteLength }, 'downloaded dump');
    return bytes;
  }
}
