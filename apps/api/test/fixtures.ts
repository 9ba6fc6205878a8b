import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SigningKey, Transaction } from 'ethers';
import { PartitionWriter, normalize, type TransactionsRecord } from '@mempool-archive/ingest';

const signer = new SigningKey(`0x${'22'.repeat(32)}`);

export type Sample = { timestampMs: number; raw: string };

function signed(nonce: number): { raw: string; hash: string } {
  const tx = Transaction.from({
    type: 2,
    chainId: 1n,
    nonce,
    to: `0x${'cd'.repeat(20)}`,
    value: 1n,
    gasLimit: 21_000n,
    maxFeePerGas: 20_000_000_000n,
    maxPriorityFeePerGas: 1_000_000_000n,
  });
  tx.signature = signer.sign(tx.unsignedHash);
  if (tx.hash === null) throw new Error('signed transaction has no hash');
  return { raw: tx.serialized, hash: tx.hash };
}

function record(timestampMs: number, nonce: number): { record: TransactionsRecord; raw: string } {
  const { raw, hash } = signed(nonce);
  return {
    raw,
    record: {
      timestampMs,
      hash,
      chainId: '1',
      from: `0x${'ef'.repeat(20)}`,
      to: `0x${'cd'.repeat(20)}`,
      value: '1',
      nonce: String(nonce),
      gas: '21000',
      gasPrice: '',
      gasTipCap: '1000000000',
      gasFeeCap: '20000000000',
      rawTx: raw,
    },
  };
}

/**
 * Writes a transactions partition holding one signed payload per timestamp,
 * in the given order, and returns the samples.
 */
export async function writeDay(dataDir: string, day: string, timestamps: number[], rowGroupSize?: number): Promise<Sample[]> {
  const rows = timestamps.map((t, i) => record(t, i));
  const partition = normalize({ kind: 'transactions', records: rows.map((r) => r.record) });
  await new PartitionWriter({ dataDir, rowGroupSize }).write(day, 'transactions', partition, { overwrite: true });
  return rows.map((r) => ({ timestampMs: r.record.timestampMs, raw: r.raw }));
}

export function tempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}
