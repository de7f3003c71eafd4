import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import type {
  ControlPlaneClient,
  ControlPlaneFactory,
  PgTools,
  Workload,
} from '../types/collaborators.js';
import type {
  ComputeConnection,
  DumpComparatorLike,
  ProbeResult,
  RecoveryReport,
  ServiceBinaries,
  WorkingCopy,
} from '../types/compatibility.js';
import {
  REMOTE_STORAGE_DIRNAME,
  describeCluster,
  loadConfigDocument,
} from '../config/service-config.js';
import { pathExists } from '../utils/fs-tree.js';
import { logThought } from '../utils/logger.js';
import { withTeardown } from '../utils/teardown-scope.js';
import type { ClusterLifecycleDriver } from './cluster-driver.js';
import { CompatError, CompatibilityError, LifecycleError, describeError } from './compat-errors.js';
import { HttpControlPlaneClient, endpointFromAddress } from './control-plane-client.js';
import { DumpComparator } from './dump-comparator.js';
import { PgbenchWorkload } from './pg-tools.js';

export const RECOVERY_ARTIFACTS = {
  dump: 'dump.sql',
  initialDiff: 'dump.filediff',
  recoveredDump: 'dump-from-wal.sql',
  recoveryDiff: 'dump-from-wal.filediff',
} as const;

const POST_RECOVERY_WORKLOAD_SECONDS = 10;

export type ClusterDriver = Pick<ClusterLifecycleDriver, 'start' | 'stop' | 'startCompute' | 'stopCompute'>;

export interface RecoveryValidatorOptions {
  pgTools: PgTools;
  /** Run-specific directory that receives dumps and diff artifacts. */
  outputDir: string;
  controlPlaneFactory?: ControlPlaneFactory;
  /** Post-recovery read/write workload. Defaults to a short pgbench run. */
  workload?: Workload;
  /** Queries whose output must be identical before and after recovery. */
  probes?: string[];
  branchName?: string;
  /**
   * Directories under the repo holding non-log state the service could reuse
   * instead of replaying its log. All are removed before the timeline is recreated.
   */
  mirrorDirs?: string[];
}

export interface ValidateInput {
  workingCopy: WorkingCopy;
  driver: ClusterDriver;
  binaries: ServiceBinaries;
  comparator?: DumpComparatorLike;
}

/**
 * Forced-recovery protocol: boot the snapshot, dump it, throw away every
 * cached copy of the timeline, make the service rebuild it from its durable
 * log, dump again, and check that writes still work.
 */
export class RecoveryValidator {
  readonly #pgTools: PgTools;
  readonly #outputDir: string;
  readonly #controlPlaneFactory: ControlPlaneFactory;
  readonly #workload: Workload;
  readonly #probes: string[];
  readonly #branchName: string;
  readonly #mirrorDirs: string[];

  constructor(options: RecoveryValidatorOptions) {
    this.#pgTools = options.pgTools;
    this.#outputDir = options.outputDir;
    this.#controlPlaneFactory =
      options.controlPlaneFactory ?? ((endpoint) => new HttpControlPlaneClient(endpoint));
    this.#workload =
      options.workload ??
      new PgbenchWorkload(options.pgTools, { durationSeconds: POST_RECOVERY_WORKLOAD_SECONDS });
    this.#probes = options.probes ?? [];
    this.#branchName = options.branchName ?? 'main';
    this.#mirrorDirs = options.mirrorDirs ?? [REMOTE_STORAGE_DIRNAME];
  }

  async validate(input: ValidateInput): Promise<RecoveryReport> {
    const { workingCopy, driver, binaries } = input;
    const comparator = input.comparator ?? new DumpComparator();
    await mkdir(this.#outputDir, { recursive: true });

    const identity = describeCluster(await loadConfigDocument(workingCopy.repoDir, 'root'), this.#branchName);
    const client = this.#controlPlaneFactory(
      endpointFromAddress(identity.pageserverHttpAddr, identity.authToken),
    );

    return withTeardown(
      async (scope) => {
        scope.defer('cluster stop', () => driver.stop());
        await driver.start(workingCopy, binaries);
        const connection = await driver.startCompute(this.#branchName);
        return this.#runProtocol({
          workingCopy,
          connection,
          client,
          comparator,
          tenantId: identity.tenantId,
          timelineId: identity.timelineId,
        });
      },
      (failures) =>
        new LifecycleError(
          `Teardown after recovery validation failed: ${failures.map((failure) => `${failure.label}: ${failure.message}`).join('; ')}`,
        ),
    );
  }

  async #runProtocol(context: {
    workingCopy: WorkingCopy;
    connection: ComputeConnection;
    client: ControlPlaneClient;
    comparator: DumpComparatorLike;
    tenantId: string;
    timelineId: string;
  }): Promise<RecoveryReport> {
    const { workingCopy, connection, client, comparator, tenantId, timelineId } = context;
    const dumpPath = path.join(this.#outputDir, RECOVERY_ARTIFACTS.dump);
    const recoveredDumpPath = path.join(this.#outputDir, RECOVERY_ARTIFACTS.recoveredDump);
    const initialDiffPath = path.join(this.#outputDir, RECOVERY_ARTIFACTS.initialDiff);
    const recoveryDiffPath = path.join(this.#outputDir, RECOVERY_ARTIFACTS.recoveryDiff);
    // Listed on failure only once written.
    const artifacts = [dumpPath, initialDiffPath, recoveredDumpPath, recoveryDiffPath];

    await this.#step('Initial dump', artifacts, () => this.#pgTools.dumpAll(connection.connstr, dumpPath));
    const initialDiff = await comparator.differs(workingCopy.baselineDumpPath, dumpPath, initialDiffPath);

    const before = await this.#step('Pre-recovery probes', artifacts, () => this.#runProbes(connection));

    // Every cached copy must be gone before recreation, or replay could read it.
    for (const mirrorDir of this.#mirrorDirs) {
      await rm(path.join(workingCopy.repoDir, mirrorDir), { recursive: true, force: true });
    }
    await this.#step('Timeline delete', artifacts, () => client.timelineDelete(tenantId, timelineId));
    await logThought(
      `[RecoveryValidator] Removed ${this.#mirrorDirs.join(', ')} and timeline ${timelineId}; recreating from the log.`,
    );
    await this.#step('Timeline recreate', artifacts, () => client.timelineCreate(tenantId, timelineId));

    await this.#step('Dump from log replay', artifacts, () =>
      this.#pgTools.dumpAll(connection.connstr, recoveredDumpPath),
    );
    const recoveryDiff = await comparator.differs(dumpPath, recoveredDumpPath, recoveryDiffPath);

    const after = await this.#step('Post-recovery probes', artifacts, () => this.#runProbes(connection));
    const probes: ProbeResult[] = this.#probes.map((query, index) => ({
      query,
      before: before[index],
      after: after[index],
      matches: before[index] === after[index],
    }));

    await this.#step(`Post-recovery ${this.#workload.name} workload`, artifacts, () =>
      this.#workload.run(connection),
    );

    const report: RecoveryReport = {
      initialDiffers: initialDiff.differs,
      recoveryDiffers: recoveryDiff.differs,
      initialDiff,
      recoveryDiff,
      dumpPath,
      recoveredDumpPath,
      probes,
      tenantId,
      timelineId,
    };
    await logThought(
      `[RecoveryValidator] initialDiffers=${report.initialDiffers} recoveryDiffers=${report.recoveryDiffers} probes=${probes.filter((probe) => probe.matches).length}/${probes.length} matching.`,
    );
    return report;
  }

  async #runProbes(connection: ComputeConnection): Promise<string[]> {
    const results: string[] = [];
    for (const query of this.#probes) {
      results.push((await this.#pgTools.query(connection.connstr, query)).trim());
    }
    return results;
  }

  async #step<T>(label: string, artifacts: string[], action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error: unknown) {
      if (error instanceof CompatError) {
        throw error;
      }
      const written: string[] = [];
      for (const artifact of artifacts) {
        if (await pathExists(artifact)) {
          written.push(artifact);
        }
      }
      throw new CompatibilityError(`${label} failed: ${describeError(error)}`, written, error);
    }
  }
}

/** Fail when either dump comparison or any probe shows a difference. */
export function assertRecoveryReport(report: RecoveryReport): RecoveryReport {
  const problems: string[] = [];
  if (report.recoveryDiffers) {
    problems.push('dump from WAL differs');
  }
  if (report.initialDiffers) {
    problems.push('initial dump differs');
  }
  for (const probe of report.probes.filter((candidate) => !candidate.matches)) {
    problems.push(`probe '${probe.query}' changed from '${probe.before}' to '${probe.after}'`);
  }
  if (problems.length > 0) {
    throw new CompatibilityError(problems.join('; '), [report.initialDiff.diffPath, report.recoveryDiff.diffPath]);
  }
  return report;
}
