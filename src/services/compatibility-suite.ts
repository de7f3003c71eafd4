import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CommandRunner, ControlPlaneFactory, PgTools, Workload } from '../types/collaborators.js';
import type {
  BreakageWaiver,
  CompatibilityDirection,
  CompatibilityRunReport,
  PortAllocator,
  RecoveryReport,
  ServiceBinaries,
  Snapshot,
} from '../types/compatibility.js';
import {
  assertRunConfigured,
  readBackwardSnapshotDir,
  readBreakageWaiver,
  readCurrentBinaries,
  readForwardBinaries,
} from '../config/compat-env.js';
import { logThought } from '../utils/logger.js';
import { ClusterLifecycleDriver } from './cluster-driver.js';
import { CompatibilityError, describeError } from './compat-errors.js';
import { CompatibilityGate } from './compatibility-gate.js';
import type { DurabilityWaitOptions } from './durability.js';
import { PgBin, PgbenchWorkload } from './pg-tools.js';
import { claimPortRange } from './port-distributor.js';
import { RecoveryValidator, assertRecoveryReport } from './recovery-validator.js';
import { SnapshotCapturer } from './snapshot-capturer.js';
import { prepareSnapshot } from './snapshot-preparer.js';

export const REPORT_FILE = 'compat-report.json';
export const SNAPSHOT_DIRNAME = 'compatibility_snapshot';
const CAPTURE_WORK_DIRNAME = 'snapshot-capture';
const WORKING_COPY_DIRNAME = 'compatibility_snapshot';

export type SuiteDriver = Pick<ClusterLifecycleDriver, 'init' | 'start' | 'stop' | 'startCompute' | 'stopCompute'>;

export interface CompatibilitySuiteOptions {
  /** Every run writes below this directory. */
  outputRoot: string;
  env?: NodeJS.ProcessEnv;
  portAllocator?: PortAllocator;
  commandRunner?: CommandRunner;
  controlPlaneFactory?: ControlPlaneFactory;
  createPgTools?: (binaries: ServiceBinaries) => PgTools;
  createDriver?: (portAllocator: PortAllocator) => SuiteDriver;
  captureWorkload?: (pgTools: PgTools) => Workload;
  recoveryWorkload?: (pgTools: PgTools) => Workload;
  probes?: string[];
  durability?: DurabilityWaitOptions;
  now?: () => Date;
}

export interface RunOptions {
  snapshotDir?: string;
}

export interface CreateSnapshotOptions {
  snapshotDir?: string;
  workDir?: string;
}

/**
 * Wires the harness together for the three supported runs: capturing a
 * baseline snapshot, and replaying one in the backward or forward direction.
 */
export class CompatibilitySuite {
  readonly #outputRoot: string;
  readonly #env: NodeJS.ProcessEnv;
  readonly #options: CompatibilitySuiteOptions;
  readonly #gate = new CompatibilityGate();
  readonly #now: () => Date;

  constructor(options: CompatibilitySuiteOptions) {
    this.#outputRoot = path.resolve(options.outputRoot);
    this.#env = options.env ?? process.env;
    this.#options = options;
    this.#now = options.now ?? (() => new Date());
  }

  get defaultSnapshotDir(): string {
    return path.join(this.#outputRoot, SNAPSHOT_DIRNAME);
  }

  async createSnapshot(options: CreateSnapshotOptions = {}): Promise<Snapshot> {
    const binaries = readCurrentBinaries(this.#env);
    const pgTools = this.#pgTools(binaries);
    const capturer = new SnapshotCapturer({
      pgTools,
      controlPlaneFactory: this.#options.controlPlaneFactory,
      durability: this.#options.durability,
      now: this.#now,
    });
    const ports = await this.#claimPorts();
    try {
      return await capturer.capture({
        driver: this.#driver(ports.allocator),
        workload: this.#options.captureWorkload?.(pgTools) ?? new PgbenchWorkload(pgTools),
        binaries,
        workDir: options.workDir ?? path.join(this.#outputRoot, CAPTURE_WORK_DIRNAME),
        snapshotDir: options.snapshotDir ?? this.defaultSnapshotDir,
      });
    } finally {
      await ports.release();
    }
  }

  /** Previous-release snapshot against the current binaries. */
  async runBackward(options: RunOptions = {}): Promise<CompatibilityRunReport> {
    assertRunConfigured('run:backward', this.#env, options.snapshotDir ? ['COMPATIBILITY_SNAPSHOT_DIR'] : []);
    const snapshotDir = options.snapshotDir ?? readBackwardSnapshotDir(this.#env);
    return this.#run('backward', snapshotDir, readCurrentBinaries(this.#env), undefined);
  }

  /** Current-build snapshot against the previous-release binaries. */
  async runForward(options: RunOptions = {}): Promise<CompatibilityRunReport> {
    assertRunConfigured('run:forward', this.#env);
    const binaries = readForwardBinaries(this.#env);
    const snapshotDir = options.snapshotDir ?? this.defaultSnapshotDir;
    return this.#run('forward', snapshotDir, binaries, binaries.distribDir);
  }

  async #run(
    direction: CompatibilityDirection,
    snapshotDir: string,
    binaries: ServiceBinaries,
    overrideDistribDir: string | undefined,
  ): Promise<CompatibilityRunReport> {
    const startedAt = this.#now().toISOString();
    const waiver = readBreakageWaiver(direction, this.#env);
    const runDir = path.join(this.#outputRoot, `${direction}-${startedAt.replace(/[:.]/g, '-')}`);
    await mkdir(runDir, { recursive: true });
    await logThought(`[CompatibilitySuite] ${direction} run from ${snapshotDir} into ${runDir}.`);

    const ports = await this.#claimPorts();
    try {
      return await this.#validateWorkingCopy(direction, snapshotDir, binaries, overrideDistribDir, {
        startedAt,
        runDir,
        waiver,
        portAllocator: ports.allocator,
      });
    } finally {
      await ports.release();
    }
  }

  async #validateWorkingCopy(
    direction: CompatibilityDirection,
    snapshotDir: string,
    binaries: ServiceBinaries,
    overrideDistribDir: string | undefined,
    run: { startedAt: string; runDir: string; waiver: BreakageWaiver; portAllocator: PortAllocator },
  ): Promise<CompatibilityRunReport> {
    const { startedAt, runDir, waiver, portAllocator } = run;
    const workingCopy = await prepareSnapshot({
      snapshotSource: snapshotDir,
      destination: path.join(runDir, WORKING_COPY_DIRNAME),
      portAllocator,
      overrideDistribDir,
    });

    const pgTools = this.#pgTools(binaries);
    const validator = new RecoveryValidator({
      pgTools,
      outputDir: runDir,
      controlPlaneFactory: this.#options.controlPlaneFactory,
      workload: this.#options.recoveryWorkload?.(pgTools),
      probes: this.#options.probes,
    });
    const driver = this.#driver(portAllocator);

    // Kept outside the gate so a failed assertion still reports the diffs.
    const observed: { recovery: RecoveryReport | null } = { recovery: null };
    const gateReport = await this.#gate.run(async () => {
      observed.recovery = await validator.validate({ workingCopy, driver, binaries });
      return assertRecoveryReport(observed.recovery);
    }, waiver);

    const reportPath = path.join(runDir, REPORT_FILE);
    const report: CompatibilityRunReport = {
      reportVersion: 1,
      direction,
      snapshotDir: path.resolve(snapshotDir),
      workingCopyDir: workingCopy.rootDir,
      startedAt,
      completedAt: this.#now().toISOString(),
      verdict: gateReport.verdict,
      summary: gateReport.summary,
      recovery: observed.recovery,
      diagnostics: gateReport.error === undefined ? [] : diagnosticsFor(gateReport.error),
      reportPath,
    };
    await writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    await logThought(`[CompatibilitySuite] ${direction}: ${report.verdict}. Report written to ${reportPath}.`);

    this.#gate.enforce(gateReport);
    return report;
  }

  /** The injected allocator, or a port range claimed for this run alone. */
  async #claimPorts(): Promise<{ allocator: PortAllocator; release: () => Promise<void> }> {
    if (this.#options.portAllocator) {
      return { allocator: this.#options.portAllocator, release: async () => undefined };
    }
    const lease = await claimPortRange(this.#env);
    return { allocator: lease.distributor, release: lease.release };
  }

  #pgTools(binaries: ServiceBinaries): PgTools {
    return (
      this.#options.createPgTools?.(binaries) ??
      new PgBin({ binaries, commandRunner: this.#options.commandRunner })
    );
  }

  #driver(portAllocator: PortAllocator): SuiteDriver {
    return (
      this.#options.createDriver?.(portAllocator) ??
      new ClusterLifecycleDriver({ portAllocator, commandRunner: this.#options.commandRunner })
    );
  }
}

function diagnosticsFor(error: unknown): string[] {
  const lines = [describeError(error)];
  if (error instanceof CompatibilityError) {
    lines.push(...error.artifacts);
  }
  return lines;
}
