import { access, mkdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { PARTITION_KINDS, type PartitionKind } from './kinds';

export function partitionPath(dataDir: string, kind: PartitionKind, day: string): string {
  return path.join(dataDir, kind, `${day}.parquet`);
}

// Older archives kept every kind flat in the data directory.
export function legacyPartitionPath(dataDir: string, kind: PartitionKind, day: string): string {
  return path.join(dataDir, `${day}_${kind}.parquet`);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

/** Path of the day's partition, preferring the current layout over the legacy one. */
export async function locatePartition(dataDir: string, kind: PartitionKind, day: string): Promise<string | undefined> {
  for (const candidate of [partitionPath(dataDir, kind, day), legacyPartitionPath(dataDir, kind, day)]) {
    if (await fileExists(candidate)) return candidate;
  }
  return undefined;
}

export async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export async function ensureLayout(dataDir: string): Promise<void> {
  for (const kind of PARTITION_KINDS) {
    await mkdir(path.join(dataDir, kind), { recursive: true });
  }
}
