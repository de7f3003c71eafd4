import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { SnapshotMetadata } from '../types/compatibility.js';
import { PreconditionError } from './compat-errors.js';

export const SNAPSHOT_LAYOUT = {
  repoDir: 'repo',
  dumpFile: 'dump.sql',
  metadataFile: 'snapshot.json',
} as const;

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function requireString(record: Record<string, unknown>, key: string, source: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new PreconditionError(`Snapshot metadata '${source}' has no valid '${key}'.`);
  }
  return value;
}

/** Returns null when the snapshot predates metadata files. */
export async function readSnapshotMetadata(snapshotRoot: string): Promise<SnapshotMetadata | null> {
  const metadataPath = path.join(snapshotRoot, SNAPSHOT_LAYOUT.metadataFile);
  let raw: string;
  try {
    raw = await readFile(metadataPath, 'utf8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    throw new PreconditionError(`Snapshot metadata '${metadataPath}' is not valid JSON.`, error);
  }
  if (!isObjectRecord(parsed) || parsed.metadataVersion !== 1) {
    throw new PreconditionError(`Snapshot metadata '${metadataPath}' has an unsupported format.`);
  }

  return {
    metadataVersion: 1,
    tenantId: requireString(parsed, 'tenantId', metadataPath),
    timelineId: requireString(parsed, 'timelineId', metadataPath),
    lsn: requireString(parsed, 'lsn', metadataPath),
    captureRepoDir: requireString(parsed, 'captureRepoDir', metadataPath),
    pgVersion: requireString(parsed, 'pgVersion', metadataPath),
    capturedAt: requireString(parsed, 'capturedAt', metadataPath),
  };
}

export async function writeSnapshotMetadata(snapshotRoot: string, metadata: SnapshotMetadata): Promise<string> {
  const metadataPath = path.join(snapshotRoot, SNAPSHOT_LAYOUT.metadataFile);
  await writeFile(metadataPath, `${JSON.stringify(metadata, null, 2)}\n`, 'utf8');
  return metadataPath;
}
