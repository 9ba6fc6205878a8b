import type { PartitionKind } from '@mempool-archive/archive';

export type SourcelogRecord = {
  timestampMs: number;
  hash: string;
  source: string;
};

export type TransactionDataRecord = {
  timestampMs: number;
  hash: string;
  chainId: string;
  from: string;
  to: string;
  value: string;
  nonce: string;
  gas: string;
  gasPrice: string;
  gasTipCap: string;
  gasFeeCap: string;
  dataSize: number;
  data4Bytes: string;
};

// dataSize and data4Bytes are derived from rawTx during normalization.
export type TransactionsRecord = Omit<TransactionDataRecord, 'dataSize' | 'data4Bytes'> & {
  rawTx: string;
};

export type SourceRecordByKind = {
  sourcelog: SourcelogRecord;
  'transaction-data': TransactionDataRecord;
  transactions: TransactionsRecord;
};

export type SourceBatch =
  | { kind: 'sourcelog'; records: SourcelogRecord[] }
  | { kind: 'transaction-data'; records: TransactionDataRecord[] }
  | { kind: 'transactions'; records: TransactionsRecord[] };

export type ArchiveColumn =
  | { name: string; type: 'TIMESTAMP'; data: bigint[] }
  | { name: string; type: 'STRING'; data: string[] }
  | { name: string; type: 'INT64'; data: bigint[] }
  | { name: string; type: 'BYTE_ARRAY'; data: Uint8Array[] };

export type PartitionColumns = {
  kind: PartitionKind;
  rowCount: number;
  columns: ArchiveColumn[];
};
