import { parseString } from '@fast-csv/parse';
import { strFromU8, unzipSync } from 'fflate';
import {
  DecodeError,
  MalformedSourceError,
  createLogger,
  errorMessage,
  type PartitionKind,
} from '@mempool-archive/archive';
import { decodedRowsTotal } from './metrics';
import type { RecordShape } from './shapes';
import type { SourceRecordByKind } from './types';

type CsvRow = Record<string, string>;

type RowResult<T> = { ok: true; record: T } | { ok: false; error: DecodeError };

const log = createLogger('ingest:decoder');

/** Inflates the first file entry of a zip container; every other entry is left compressed. */
export function extractFirstMember(bytes: Uint8Array): { name: string; text: string } {
  const picked: string[] = [];
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(bytes, {
      filter: (file) => {
        if (picked.length > 0 || file.name.endsWith('/')) return false;
        picked.push(file.name);
        return true;
      },
    });
  } catch (err) {
    throw new MalformedSourceError('zip container', errorMessage(err), { cause: err });
  }
  const name = picked[0];
  const data = name === undefined ? undefined : files[name];
  if (name === undefined || data === undefined) {
    throw new MalformedSourceError('zip container', 'no file entry');
  }
  return { name, text: strFromU8(data) };
}

function stripCell(cell: string): string {
  return cell.replace(/^\uFEFF/, '').trim().replace(/^"(.*)"$/, '$1');
}

/** `true` when the first line names the columns, otherwise the shape's field list. */
function resolveHeaders(text: string, shape: { kind: PartitionKind; fields: readonly string[] }): string[] | true {
  const firstLine = text.slice(0, text.search(/\r?\n|$/));
  const header = firstLine.split(',').map(stripCell);
  if (header[0] !== shape.fields[0]) return [...shape.fields];
  const missing = shape.fields.filter((f) => !header.includes(f));
  if (missing.length > 0) {
    throw new MalformedSourceError(`${shape.kind} csv`, `header is missing ${missing.join(', ')}`);
  }
  return true;
}

type NumberedRow = { row: CsvRow; rowNumber: number };

// Rows are numbered from 1 in source order, header excluded, invalid rows included.
function parseRows(text: string, headers: string[] | true, onInvalid: (rowNumber: number) => void): Promise<NumberedRow[]> {
  return new Promise((resolve, reject) => {
    const rows: NumberedRow[] = [];
    let rowNumber = 0;
    parseString<CsvRow, CsvRow>(text, { headers, strictColumnHandling: true, ignoreEmpty: true, trim: true })
      .on('error', reject)
      .on('data', (row: CsvRow) => {
        rows.push({ row, rowNumber: ++rowNumber });
      })
      .on('data-invalid', () => onInvalid(++rowNumber))
      .on('end', () => resolve(rows));
  });
}

function decodeRow<K extends PartitionKind>(
  shape: RecordShape<K>,
  row: CsvRow,
  rowNumber: number,
): RowResult<SourceRecordByKind[K]> {
  const parsed = shape.row.safeParse(row);
  if (parsed.success) return { ok: true, record: parsed.data };
  const issue = parsed.error.issues[0];
  const field = issue?.path.length ? issue.path.join('.') : undefined;
  return { ok: false, error: new DecodeError(shape.kind, rowNumber, field, issue?.message ?? 'invalid row') };
}

/**
 * Parses one per-day dump into typed records. Rows that fail coercion are
 * logged and skipped; output order follows the source member.
 */
export async function decodeDump<K extends PartitionKind>(
  bytes: Uint8Array,
  shape: RecordShape<K>,
): Promise<SourceRecordByKind[K][]> {
  const member = extractFirstMember(bytes);
  const headers = resolveHeaders(member.text, shape);

  let rejected = 0;
  const reject = (error: DecodeError) => {
    rejected++;
    log.warn({ err: error, member: member.name }, 'skipping malformed row');
  };

  const rows = await parseRows(member.text, headers, (rowNumber) =>
    reject(new DecodeError(shape.kind, rowNumber, undefined, 'column count mismatch')),
  );

  const records: SourceRecordByKind[K][] = [];
  for (const { row, rowNumber } of rows) {
    const result = decodeRow(shape, row, rowNumber);
    if (result.ok) records.push(result.record);
    else reject(result.error);
  }

  decodedRowsTotal.inc({ kind: shape.kind, outcome: 'accepted' }, records.length);
  decodedRowsTotal.inc({ kind: shape.kind, outcome: 'rejected' }, rejected);
  log.info({ kind: shape.kind, member: member.name, records: records.length, rejected }, 'decoded dump');
  return records;
}
