import { PARTITION_COLUMNS } from '@mempool-archive/archive';
import { getBytes } from 'ethers';
import { normalize } from '../src/normalizer';
import type { ArchiveColumn, PartitionColumns, TransactionDataRecord, TransactionsRecord } from '../src/types';
import { RECIPIENT, signedTx, unsignedRawTx } from './helpers';

const AUG_31 = 1693440000000;
const TRANSFER_DATA = `0xa9059cbb${'00'.repeat(32)}`;

function column(partition: PartitionColumns, name: string): ArchiveColumn {
  const found = partition.columns.find((c) => c.name === name);
  if (!found) throw new Error(`no column ${name}`);
  return found;
}

function txRecord(timestampMs: number, hash: string, rawTx: string): TransactionsRecord {
  return {
    timestampMs,
    hash,
    chainId: '1',
    from: '0xF39FD6E51AAD88F6F4CE6AB8827279CFFFB92266',
    to: RECIPIENT,
    value: '1000',
    nonce: '0',
    gas: '21000',
    gasPrice: '',
    gasTipCap: '1000000000',
    gasFeeCap: '30000000000',
    rawTx,
  };
}

describe('normalize', () => {
  it('emits sourcelog columns in on-disk order', () => {
    const partition = normalize({
      kind: 'sourcelog',
      records: [{ timestampMs: AUG_31, hash: '0xaa', source: 'local' }],
    });
    expect(partition.kind).toBe('sourcelog');
    expect(partition.rowCount).toBe(1);
    expect(partition.columns.map((c) => c.name)).toEqual([...PARTITION_COLUMNS.sourcelog]);
    expect(column(partition, 'timestamp')).toEqual({ name: 'timestamp', type: 'TIMESTAMP', data: [BigInt(AUG_31)] });
  });

  it('lowercases addresses and keeps amounts verbatim', () => {
    const record: TransactionDataRecord = {
      timestampMs: AUG_31,
      hash: '0xAA',
      chainId: '1',
      from: '0xF39FD6E51AAD88F6F4CE6AB8827279CFFFB92266',
      to: '0xABCDEF0000000000000000000000000000000001',
      value: '123456789012345678901234567890',
      nonce: '7',
      gas: '21000',
      gasPrice: '',
      gasTipCap: '1',
      gasFeeCap: '2',
      dataSize: 36,
      data4Bytes: '0xa9059cbb',
    };
    const partition = normalize({ kind: 'transaction-data', records: [record] });

    expect(partition.columns.map((c) => c.name)).toEqual([...PARTITION_COLUMNS['transaction-data']]);
    expect(column(partition, 'from').data).toEqual(['0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266']);
    expect(column(partition, 'to').data).toEqual(['0xabcdef0000000000000000000000000000000001']);
    expect(column(partition, 'hash').data).toEqual(['0xAA']);
    expect(column(partition, 'value').data).toEqual(['123456789012345678901234567890']);
    expect(column(partition, 'dataSize')).toEqual({ name: 'dataSize', type: 'INT64', data: [36n] });
  });

  it('derives data size and selector from the raw payload', () => {
    const transfer = signedTx(0, TRANSFER_DATA);
    const plain = signedTx(1);
    const partition = normalize({
      kind: 'transactions',
      records: [txRecord(AUG_31, transfer.hash, transfer.raw), txRecord(AUG_31 + 1, plain.hash, plain.raw)],
    });

    expect(partition.columns.map((c) => c.name)).toEqual([...PARTITION_COLUMNS.transactions]);
    expect(partition.rowCount).toBe(2);
    expect(column(partition, 'dataSize').data).toEqual([36n, 0n]);
    expect(column(partition, 'data4Bytes').data).toEqual(['0xa9059cbb', '']);
    expect(column(partition, 'rawTx')).toEqual({
      name: 'rawTx',
      type: 'BYTE_ARRAY',
      data: [getBytes(transfer.raw), getBytes(plain.raw)],
    });
  });

  it('accepts payloads without a 0x prefix', () => {
    const tx = signedTx(2);
    const partition = normalize({ kind: 'transactions', records: [txRecord(AUG_31, tx.hash, tx.raw.slice(2))] });
    expect(partition.rowCount).toBe(1);
    expect(column(partition, 'rawTx').data).toEqual([getBytes(tx.raw)]);
  });

  it('drops undecodable, unsigned and mismatched payloads only', () => {
    const good = signedTx(0);
    const other = signedTx(1);
    const partition = normalize({
      kind: 'transactions',
      records: [
        txRecord(AUG_31, '0x01', 'zz'),
        txRecord(AUG_31 + 1, '0x02', '0x02c0'),
        txRecord(AUG_31 + 2, '0x03', unsignedRawTx(3)),
        txRecord(AUG_31 + 3, other.hash, good.raw),
        txRecord(AUG_31 + 4, good.hash.toUpperCase().replace('0X', '0x'), good.raw),
      ],
    });

    expect(partition.rowCount).toBe(1);
    expect(column(partition, 'timestamp').data).toEqual([BigInt(AUG_31 + 4)]);
    for (const c of partition.columns) expect(c.data).toHaveLength(1);
  });
});
