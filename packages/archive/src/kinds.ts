export const PARTITION_KINDS = ['sourcelog', 'transaction-data', 'transactions'] as const;

export type PartitionKind = (typeof PARTITION_KINDS)[number];

const TRANSACTION_DATA_COLUMNS = [
  'timestamp',
  'hash',
  'chainId',
  'from',
  'to',
  'value',
  'nonce',
  'gas',
  'gasPrice',
  'gasTipCap',
  'gasFeeCap',
  'dataSize',
  'data4Bytes',
] as const;

// On-disk column order. Readers and writers both depend on it; never reorder.
export const PARTITION_COLUMNS = {
  sourcelog: ['timestamp', 'hash', 'source'],
  'transaction-data': TRANSACTION_DATA_COLUMNS,
  transactions: [...TRANSACTION_DATA_COLUMNS, 'rawTx'],
} as const satisfies Record<PartitionKind, readonly string[]>;

export type ColumnName<K extends PartitionKind = PartitionKind> = (typeof PARTITION_COLUMNS)[K][number];

export function isPartitionKind(value: string): value is PartitionKind {
  return (PARTITION_KINDS as readonly string[]).includes(value);
}
