import type { PartitionKind } from './kinds';

export type ArchiveErrorCode =
  | 'DECODE_ERROR'
  | 'INVALID_TIMESTAMP'
  | 'INVALID_DAY'
  | 'DAY_FILE_NOT_FOUND'
  | 'PARTITION_WRITE_ERROR'
  | 'PARTITION_READ_ERROR'
  | 'SOURCE_FETCH_ERROR'
  | 'MALFORMED_SOURCE';

export class ArchiveError extends Error {
  readonly code: ArchiveErrorCode;

  constructor(code: ArchiveErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A single CSV row that could not be coerced into a record. Never thrown past the decoder. */
export class DecodeError extends ArchiveError {
  constructor(
    readonly kind: PartitionKind,
    readonly rowNumber: number,
    readonly field: string | undefined,
    reason: string,
  ) {
    super('DECODE_ERROR', `${kind} row ${rowNumber}${field ? ` (${field})` : ''}: ${reason}`);
  }
}

export class InvalidTimestampError extends ArchiveError {
  constructor(
    readonly field: string,
    readonly value: unknown,
    reason = 'not a valid epoch millisecond timestamp',
  ) {
    super('INVALID_TIMESTAMP', `${field}=${String(value)}: ${reason}`);
  }
}

export class InvalidDayError extends ArchiveError {
  constructor(readonly day: string) {
    super('INVALID_DAY', `invalid day "${day}", expected YYYY-MM-DD`);
  }
}

export class DayFileNotFoundError extends ArchiveError {
  constructor(
    readonly day: string,
    readonly kind: PartitionKind,
  ) {
    super('DAY_FILE_NOT_FOUND', `no ${kind} partition for ${day}`);
  }
}

export class PartitionWriteError extends ArchiveError {
  constructor(
    readonly day: string,
    readonly kind: PartitionKind,
    readonly path: string | undefined,
    reason: string,
    options?: ErrorOptions,
  ) {
    super('PARTITION_WRITE_ERROR', `failed to write ${kind} partition for ${day}: ${reason}`, options);
  }
}

export class PartitionReadError extends ArchiveError {
  constructor(
    readonly day: string,
    readonly path: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super('PARTITION_READ_ERROR', `failed to read partition ${path} (${day}): ${reason}`, options);
  }
}

export interface SourceFetchContext {
  url: string;
  status?: number;
  kind?: PartitionKind;
  day?: string;
}

export class SourceFetchError extends ArchiveError {
  readonly url: string;
  readonly status: number | undefined;
  readonly kind: PartitionKind | undefined;
  readonly day: string | undefined;

  constructor(ctx: SourceFetchContext, reason: string, options?: ErrorOptions) {
    super('SOURCE_FETCH_ERROR', `GET ${ctx.url} failed: ${reason}`, options);
    this.url = ctx.url;
    this.status = ctx.status;
    this.kind = ctx.kind;
    this.day = ctx.day;
  }

  get notFound(): boolean {
    return this.status === 404;
  }
}

export class MalformedSourceError extends ArchiveError {
  constructor(
    readonly source: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super('MALFORMED_SOURCE', `malformed ${source}: ${reason}`, options);
  }
}

export function isArchiveError(err: unknown): err is ArchiveError {
  return err instanceof ArchiveError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
