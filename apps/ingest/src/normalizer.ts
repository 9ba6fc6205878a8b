import { createLogger } from '@mempool-archive/archive';
import { normalizerDroppedTotal } from './metrics';
import { decodeRawTx } from './rawTx';
import type {
  ArchiveColumn,
  PartitionColumns,
  SourceBatch,
  SourcelogRecord,
  TransactionDataRecord,
  TransactionsRecord,
} from './types';

const log = createLogger('ingest:normalizer');

const timestamps = (name: string, data: number[]): ArchiveColumn => ({ name, type: 'TIMESTAMP', data: data.map((ms) => BigInt(ms)) });
const strings = (name: string, data: string[]): ArchiveColumn => ({ name, type: 'STRING', data });
const int64s = (name: string, data: number[]): ArchiveColumn => ({ name, type: 'INT64', data: data.map((n) => BigInt(n)) });
const bytes = (name: string, data: Uint8Array[]): ArchiveColumn => ({ name, type: 'BYTE_ARRAY', data });

function sourcelogColumns(records: SourcelogRecord[]): ArchiveColumn[] {
  return [
    timestamps('timestamp', records.map((r) => r.timestampMs)),
    strings('hash', records.map((r) => r.hash)),
    strings('source', records.map((r) => r.source)),
  ];
}

function transactionDataColumns(records: TransactionDataRecord[]): ArchiveColumn[] {
  return [
    timestamps('timestamp', records.map((r) => r.timestampMs)),
    strings('hash', records.map((r) => r.hash)),
    strings('chainId', records.map((r) => r.chainId)),
    strings('from', records.map((r) => r.from.toLowerCase())),
    strings('to', records.map((r) => r.to.toLowerCase())),
    strings('value', records.map((r) => r.value)),
    strings('nonce', records.map((r) => r.nonce)),
    strings('gas', records.map((r) => r.gas)),
    strings('gasPrice', records.map((r) => r.gasPrice)),
    strings('gasTipCap', records.map((r) => r.gasTipCap)),
    strings('gasFeeCap', records.map((r) => r.gasFeeCap)),
    int64s('dataSize', records.map((r) => r.dataSize)),
    strings('data4Bytes', records.map((r) => r.data4Bytes)),
  ];
}

function transactionsColumns(records: TransactionsRecord[]): ArchiveColumn[] {
  const kept: TransactionDataRecord[] = [];
  const payloads: Uint8Array[] = [];
  for (const record of records) {
    const decoded = decodeRawTx(record.rawTx);
    const reason = !decoded.ok
      ? decoded.reason
      : decoded.payload.hash.toLowerCase() !== record.hash.toLowerCase()
        ? `payload hashes to ${decoded.payload.hash}`
        : undefined;
    if (!decoded.ok || reason !== undefined) {
      normalizerDroppedTotal.inc({ kind: 'transactions' });
      log.warn({ hash: record.hash, timestampMs: record.timestampMs, reason }, 'dropping undecodable transaction');
      continue;
    }
    kept.push({
      timestampMs: record.timestampMs,
      hash: record.hash,
      chainId: record.chainId,
      from: record.from,
      to: record.to,
      value: record.value,
      nonce: record.nonce,
      gas: record.gas,
      gasPrice: record.gasPrice,
      gasTipCap: record.gasTipCap,
      gasFeeCap: record.gasFeeCap,
      dataSize: decoded.payload.dataSize,
      data4Bytes: decoded.payload.data4Bytes,
    });
    payloads.push(decoded.payload.bytes);
  }
  return [...transactionDataColumns(kept), bytes('rawTx', payloads)];
}

function rowCountOf(columns: ArchiveColumn[]): number {
  return columns.length > 0 ? columns[0].data.length : 0;
}

function columnsOf(batch: SourceBatch): ArchiveColumn[] {
  switch (batch.kind) {
    case 'sourcelog':
      return sourcelogColumns(batch.records);
    case 'transaction-data':
      return transactionDataColumns(batch.records);
    case 'transactions':
      return transactionsColumns(batch.records);
  }
}

/** Maps a decoded batch onto the kind's canonical column set, in on-disk order. */
export function normalize(batch: SourceBatch): PartitionColumns {
  const columns = columnsOf(batch);
  return { kind: batch.kind, rowCount: rowCountOf(columns), columns };
}
