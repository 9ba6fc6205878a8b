import { z } from 'zod';
import { isValidTimestampMs, type PartitionKind } from '@mempool-archive/archive';
import type { SourceRecordByKind } from './types';

const timestampMs = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform(Number)
  .refine(isValidTimestampMs, 'not a valid calendar timestamp');

const integer = z.string().regex(/^\d+$/, 'expected a non-negative integer');

const transactionBase = {
  timestamp_ms: timestampMs,
  hash: z.string().min(1),
  chain_id: z.string(),
  from: z.string().min(1),
  to: z.string(),
  // decimal strings of arbitrary size, stored verbatim
  value: z.string(),
  nonce: z.string(),
  gas: z.string(),
  gas_price: z.string(),
  gas_tip_cap: z.string(),
  gas_fee_cap: z.string(),
};

type TransactionBase = z.infer<z.ZodObject<typeof transactionBase>>;

function transactionFields(row: TransactionBase) {
  return {
    timestampMs: row.timestamp_ms,
    hash: row.hash,
    chainId: row.chain_id,
    from: row.from,
    to: row.to,
    value: row.value,
    nonce: row.nonce,
    gas: row.gas,
    gasPrice: row.gas_price,
    gasTipCap: row.gas_tip_cap,
    gasFeeCap: row.gas_fee_cap,
  };
}

/** Layout of one CSV member: positional field names plus the per-row schema. */
export interface RecordShape<K extends PartitionKind> {
  kind: K;
  fields: readonly string[];
  row: z.ZodType<SourceRecordByKind[K], z.ZodTypeDef, unknown>;
}

export const sourcelogShape: RecordShape<'sourcelog'> = {
  kind: 'sourcelog',
  fields: ['timestamp_ms', 'hash', 'source'],
  row: z
    .object({ timestamp_ms: timestampMs, hash: z.string().min(1), source: z.string() })
    .transform((r) => ({ timestampMs: r.timestamp_ms, hash: r.hash, source: r.source })),
};

export const transactionDataShape: RecordShape<'transaction-data'> = {
  kind: 'transaction-data',
  fields: [
    'timestamp_ms',
    'hash',
    'chain_id',
    'from',
    'to',
    'value',
    'nonce',
    'gas',
    'gas_price',
    'gas_tip_cap',
    'gas_fee_cap',
    'data_size',
    'data_4bytes',
  ],
  row: z
    .object({
      ...transactionBase,
      data_size: integer.transform(Number),
      data_4bytes: z.string(),
    })
    .transform((r) => ({ ...transactionFields(r), dataSize: r.data_size, data4Bytes: r.data_4bytes })),
};

export const transactionsShape: RecordShape<'transactions'> = {
  kind: 'transactions',
  fields: [
    'timestamp_ms',
    'hash',
    'chain_id',
    'from',
    'to',
    'value',
    'nonce',
    'gas',
    'gas_price',
    'gas_tip_cap',
    'gas_fee_cap',
    'raw_tx',
  ],
  row: z
    .object({ ...transactionBase, raw_tx: z.string().min(1) })
    .transform((r) => ({ ...transactionFields(r), rawTx: r.raw_tx })),
};

export const SHAPES: { [K in PartitionKind]: RecordShape<K> } = {
  sourcelog: sourcelogShape,
  'transaction-data': transactionDataShape,
  transactions: transactionsShape,
};
