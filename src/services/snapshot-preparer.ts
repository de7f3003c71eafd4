import { cp, rm, unlink } from 'node:fs/promises';
import path from 'node:path';
import type { PrepareSnapshotOptions, SnapshotMetadata, WorkingCopy } from '../types/compatibility.js';
import {
  REMOTE_STORAGE_DIRNAME,
  loadConfigDocument,
  remoteStoragePath,
} from '../config/service-config.js';
import { listDirectory, pathExists, walkFiles } from '../utils/fs-tree.js';
import { logThought } from '../utils/logger.js';
import { PreconditionError, SanitizationError } from './compat-errors.js';
import { findResidualReferences, sanitizeRepoConfig } from './path-sanitizer.js';
import { PortRemapper } from './port-remapper.js';
import { SNAPSHOT_LAYOUT, readSnapshotMetadata, writeSnapshotMetadata } from './snapshot-metadata.js';

const WAL_REDO_SCRATCH_DIR = 'wal-redo-datadir.___temp';

async function assertSnapshotShape(snapshotSource: string): Promise<void> {
  if (!(await pathExists(snapshotSource))) {
    throw new PreconditionError(`Snapshot '${snapshotSource}' doesn't exist.`);
  }
  if (!(await pathExists(path.join(snapshotSource, SNAPSHOT_LAYOUT.repoDir)))) {
    throw new PreconditionError(`Snapshot '${snapshotSource}' doesn't contain a ${SNAPSHOT_LAYOUT.repoDir} directory.`);
  }
  if (!(await pathExists(path.join(snapshotSource, SNAPSHOT_LAYOUT.dumpFile)))) {
    throw new PreconditionError(`Snapshot '${snapshotSource}' doesn't contain a ${SNAPSHOT_LAYOUT.dumpFile}.`);
  }
}

/** Stale logs, compute data dirs and redo scratch space are regenerated, never restored. */
async function purgeRunArtifacts(repoDir: string): Promise<number> {
  let removed = 0;

  const logFiles: string[] = [];
  for await (const filePath of walkFiles(repoDir)) {
    if (filePath.endsWith('.log')) {
      logFiles.push(filePath);
    }
  }
  for (const logFile of logFiles) {
    await unlink(logFile);
    removed += 1;
  }

  for (const computeDir of await listDirectory(path.join(repoDir, 'pgdatadirs', 'tenants'))) {
    await rm(computeDir, { recursive: true, force: true });
    removed += 1;
  }

  for (const tenantDir of await listDirectory(path.join(repoDir, 'tenants'))) {
    const scratch = path.join(tenantDir, WAL_REDO_SCRATCH_DIR);
    if (await pathExists(scratch)) {
      await rm(scratch, { recursive: true, force: true });
      removed += 1;
    }
  }

  return removed;
}

async function resolveCaptureRepoDir(
  repoDir: string,
  metadata: SnapshotMetadata | null,
): Promise<string | undefined> {
  if (metadata) {
    return metadata.captureRepoDir;
  }
  const serviceDocument = await loadConfigDocument(repoDir, 'service');
  const localPath = remoteStoragePath(serviceDocument);
  if (localPath && path.basename(localPath) === REMOTE_STORAGE_DIRNAME) {
    return path.dirname(localPath);
  }
  return undefined;
}

/**
 * Copy an immutable snapshot into a fresh working directory and rebind it to
 * the current environment: new ports, new paths, no stale run artifacts.
 *
 * Fails with `PreconditionError` for malformed input and `SanitizationError`
 * when any file in the working copy still names the capture-time path.
 */
export async function prepareSnapshot(options: PrepareSnapshotOptions): Promise<WorkingCopy> {
  const snapshotSource = path.resolve(options.snapshotSource);
  const destination = path.resolve(options.destination);

  await assertSnapshotShape(snapshotSource);
  if (await pathExists(destination)) {
    throw new PreconditionError(`Working copy destination '${destination}' already exists.`);
  }

  await logThought(`[SnapshotPreparer] Copying snapshot from ${snapshotSource} to ${destination}.`);
  await cp(snapshotSource, destination, { recursive: true });

  const repoDir = path.join(destination, SNAPSHOT_LAYOUT.repoDir);
  const removed = await purgeRunArtifacts(repoDir);

  const metadata = await readSnapshotMetadata(destination);
  const inferredCaptureDir = await resolveCaptureRepoDir(repoDir, metadata);
  const needle = inferredCaptureDir ?? options.captureMarker;
  if (!needle) {
    throw new PreconditionError(
      `Snapshot '${snapshotSource}' carries no ${SNAPSHOT_LAYOUT.metadataFile} and its capture path cannot be inferred; pass a capture marker.`,
    );
  }

  const remapper = new PortRemapper(options.portAllocator);
  const documents = await sanitizeRepoConfig({
    repoDir,
    captureRepoDir: inferredCaptureDir ?? repoDir,
    remapper,
    overrideDistribDir: options.overrideDistribDir,
  });

  // The copied metadata names the capture repo too; bind it to this copy.
  if (metadata) {
    await writeSnapshotMetadata(destination, { ...metadata, captureRepoDir: repoDir });
  }

  const offendingFiles = await findResidualReferences(destination, needle);
  if (offendingFiles.length > 0) {
    throw new SanitizationError(needle, offendingFiles);
  }

  const portMappings = remapper.mappings();
  await logThought(
    `[SnapshotPreparer] Working copy ${destination} ready: ${removed} stale artifact(s) removed, ${portMappings.length} port(s) remapped.`,
  );

  return {
    rootDir: destination,
    repoDir,
    baselineDumpPath: path.join(destination, SNAPSHOT_LAYOUT.dumpFile),
    captureRepoDir: needle,
    metadata,
    portMappings,
    rewrittenDocuments: documents.map((document) => document.path),
  };
}
