import { cp, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { ControlPlaneFactory, PgTools, Workload } from '../types/collaborators.js';
import type { ServiceBinaries, Snapshot, SnapshotMetadata } from '../types/compatibility.js';
import { describeCluster, loadConfigDocument } from '../config/service-config.js';
import { pathExists } from '../utils/fs-tree.js';
import { logThought } from '../utils/logger.js';
import { parseLsn } from '../utils/lsn.js';
import { withTeardown } from '../utils/teardown-scope.js';
import type { ClusterLifecycleDriver } from './cluster-driver.js';
import { LifecycleError, PreconditionError } from './compat-errors.js';
import { HttpControlPlaneClient, endpointFromAddress } from './control-plane-client.js';
import { type DurabilityWaitOptions, waitForLastRecordLsn, waitForUpload } from './durability.js';
import { SNAPSHOT_LAYOUT, writeSnapshotMetadata } from './snapshot-metadata.js';

const DEFAULT_SAFEKEEPERS = 3;
const FLUSH_LSN_QUERY = 'SELECT pg_current_wal_flush_lsn()';

export type CaptureDriver = Pick<ClusterLifecycleDriver, 'init' | 'start' | 'stop' | 'startCompute'>;

export interface CaptureInput {
  driver: CaptureDriver;
  workload: Workload;
  binaries: ServiceBinaries;
  /** Scratch directory; the repo is created at `<workDir>/repo`. */
  workDir: string;
  /** Final frozen location. Must not exist yet. */
  snapshotDir: string;
}

export interface SnapshotCapturerOptions {
  pgTools: PgTools;
  controlPlaneFactory?: ControlPlaneFactory;
  safekeepers?: number;
  branchName?: string;
  durability?: DurabilityWaitOptions;
  now?: () => Date;
}

/**
 * Produces a baseline snapshot: fresh cluster, workload, baseline dump, then
 * waits until everything up to the flush LSN is durable remotely before
 * stopping the cluster and freezing the directory tree.
 */
export class SnapshotCapturer {
  readonly #pgTools: PgTools;
  readonly #controlPlaneFactory: ControlPlaneFactory;
  readonly #safekeepers: number;
  readonly #branchName: string;
  readonly #durability: DurabilityWaitOptions;
  readonly #now: () => Date;

  constructor(options: SnapshotCapturerOptions) {
    this.#pgTools = options.pgTools;
    this.#controlPlaneFactory =
      options.controlPlaneFactory ?? ((endpoint) => new HttpControlPlaneClient(endpoint));
    this.#safekeepers = options.safekeepers ?? DEFAULT_SAFEKEEPERS;
    this.#branchName = options.branchName ?? 'main';
    this.#durability = options.durability ?? {};
    this.#now = options.now ?? (() => new Date());
  }

  async capture(input: CaptureInput): Promise<Snapshot> {
    const workDir = path.resolve(input.workDir);
    const snapshotDir = path.resolve(input.snapshotDir);
    const repoDir = path.join(workDir, SNAPSHOT_LAYOUT.repoDir);
    const dumpPath = path.join(workDir, SNAPSHOT_LAYOUT.dumpFile);

    if (await pathExists(snapshotDir)) {
      throw new PreconditionError(`Snapshot destination '${snapshotDir}' already exists; snapshots are never overwritten.`);
    }
    await mkdir(workDir, { recursive: true });

    const { driver, workload, binaries } = input;
    await driver.init(repoDir, binaries, {
      safekeepers: this.#safekeepers,
      localFsRemoteStorage: true,
    });

    const captured = await withTeardown(
      async (scope) => {
        scope.defer('cluster stop', () => driver.stop());
        await driver.start({ repoDir }, binaries);
        const connection = await driver.startCompute(this.#branchName);

        await workload.initialize(connection);
        await workload.run(connection);
        await this.#pgTools.dumpAll(connection.connstr, dumpPath);

        const identity = describeCluster(await loadConfigDocument(repoDir, 'root'), this.#branchName);
        const lsn = (await this.#pgTools.query(connection.connstr, FLUSH_LSN_QUERY)).trim();
        parseLsn(lsn);

        const client = this.#controlPlaneFactory(
          endpointFromAddress(identity.pageserverHttpAddr, identity.authToken),
        );
        await waitForLastRecordLsn(client, identity.tenantId, identity.timelineId, lsn, this.#durability);
        await client.timelineCheckpoint(identity.tenantId, identity.timelineId);
        await waitForUpload(client, identity.tenantId, identity.timelineId, lsn, this.#durability);

        await driver.stop();
        return { ...identity, lsn };
      },
      (failures) =>
        new LifecycleError(
          `Teardown after snapshot capture failed: ${failures.map((failure) => `${failure.label}: ${failure.message}`).join('; ')}`,
        ),
    );

    await cp(workDir, snapshotDir, {
      recursive: true,
      filter: (source) => source !== snapshotDir && !source.startsWith(`${snapshotDir}${path.sep}`),
    });

    const metadata: SnapshotMetadata = {
      metadataVersion: 1,
      tenantId: captured.tenantId,
      timelineId: captured.timelineId,
      lsn: captured.lsn,
      captureRepoDir: repoDir,
      pgVersion: binaries.pgVersion,
      capturedAt: this.#now().toISOString(),
    };
    const metadataPath = await writeSnapshotMetadata(snapshotDir, metadata);
    await logThought(
      `[SnapshotCapturer] Snapshot frozen at ${snapshotDir} (tenant ${metadata.tenantId}, timeline ${metadata.timelineId}, lsn ${metadata.lsn}).`,
    );

    return {
      rootDir: snapshotDir,
      repoDir: path.join(snapshotDir, SNAPSHOT_LAYOUT.repoDir),
      dumpPath: path.join(snapshotDir, SNAPSHOT_LAYOUT.dumpFile),
      metadataPath,
      metadata,
    };
  }
}
