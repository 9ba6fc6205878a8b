import { Transaction, getBytes, hexlify, isHexString } from 'ethers';
import { errorMessage } from '@mempool-archive/archive';

export type DecodedPayload = {
  bytes: Uint8Array;
  hash: string;
  dataSize: number;
  data4Bytes: string;
};

export type PayloadResult = { ok: true; payload: DecodedPayload } | { ok: false; reason: string };

/** Parses a signed serialized transaction; anything unsigned or malformed is rejected with a reason. */
export function decodeRawTx(raw: string): PayloadResult {
  const hex = raw.startsWith('0x') || raw.startsWith('0X') ? `0x${raw.slice(2)}` : `0x${raw}`;
  if (!isHexString(hex, true) || hex.length === 2) return { ok: false, reason: 'payload is not hex' };

  let tx: Transaction;
  try {
    tx = Transaction.from(hex);
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }
  if (!tx.isSigned()) return { ok: false, reason: 'transaction is not signed' };

  const data = getBytes(tx.data);
  return {
    ok: true,
    payload: {
      bytes: getBytes(hex),
      hash: tx.hash ?? '',
      dataSize: data.length,
      data4Bytes: data.length >= 4 ? hexlify(data.subarray(0, 4)) : '',
    },
  };
}
