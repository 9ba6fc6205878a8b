import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SigningKey, Transaction } from 'ethers';
import { strToU8, zipSync } from 'fflate';

const signer = new SigningKey(`0x${'11'.repeat(32)}`);

export const RECIPIENT = `0x${'ab'.repeat(20)}`;

export type SignedTx = { raw: string; hash: string };

function unsignedTx(nonce: number, data: string): Transaction {
  return Transaction.from({
    type: 2,
    chainId: 1n,
    nonce,
    to: RECIPIENT,
    value: 1000n,
    gasLimit: 21_000n,
    maxFeePerGas: 30_000_000_000n,
    maxPriorityFeePerGas: 1_000_000_000n,
    data,
  });
}

export function signedTx(nonce: number, data = '0x'): SignedTx {
  const tx = unsignedTx(nonce, data);
  tx.signature = signer.sign(tx.unsignedHash);
  const hash = tx.hash;
  if (hash === null) throw new Error('signed transaction has no hash');
  return { raw: tx.serialized, hash };
}

export function unsignedRawTx(nonce: number): string {
  return unsignedTx(nonce, '0x').unsignedSerialized;
}

/** Zip container with the given members, in insertion order. */
export function zipOf(members: Record<string, string>): Uint8Array {
  const files: Record<string, Uint8Array> = {};
  for (const [name, text] of Object.entries(members)) files[name] = strToU8(text);
  return zipSync(files);
}

export function csv(lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

/** One `transactions` CSV line: base transaction fields then raw_tx. */
export function transactionsLine(timestampMs: number, tx: SignedTx, overrides: { hash?: string; raw?: string } = {}): string {
  return [
    timestampMs,
    overrides.hash ?? tx.hash,
    '1',
    '0xF39FD6E51AAD88F6F4CE6AB8827279CFFFB92266',
    RECIPIENT,
    '1000',
    '0',
    '21000',
    '',
    '1000000000',
    '30000000000',
    overrides.raw ?? tx.raw,
  ].join(',');
}

export function tempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}
