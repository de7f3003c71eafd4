import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'smol-toml';
import type { CommandExecutionResult, CommandRunner } from '../types/collaborators.js';
import type { ComputeConnection, PortAllocator, ServiceBinaries, WorkingCopy } from '../types/compatibility.js';
import {
  REMOTE_STORAGE_DIRNAME,
  injectDistribution,
  loadConfigDocument,
  persistConfigDocument,
} from '../config/service-config.js';
import { defaultCommandRunner, formatCommand, summarizeOutput } from '../utils/command-runner.js';
import { collectLogTails } from '../utils/fs-tree.js';
import { logThought } from '../utils/logger.js';
import { ClusterUsageError, LifecycleError, describeError } from './compat-errors.js';

const DEFAULT_CLI_NAME = 'neon_local';
const DEFAULT_COMPUTE_HOST = '127.0.0.1';
const DEFAULT_COMPUTE_USER = 'cloud_admin';
const DEFAULT_COMPUTE_DB = 'postgres';
const DEFAULT_COMMAND_TIMEOUT_MS = 5 * 60_000;

/** Repo directories with a live cluster in this process. */
const LIVE_REPO_DIRS = new Set<string>();

export interface InitClusterOptions {
  safekeepers?: number;
  /** Store remote layers under `<repo>/local_fs_remote_storage`. */
  localFsRemoteStorage?: boolean;
}

export interface ClusterLifecycleDriverOptions {
  portAllocator: PortAllocator;
  commandRunner?: CommandRunner;
  cliName?: string;
  computeHost?: string;
  computeUser?: string;
  computeDb?: string;
  commandTimeoutMs?: number;
}

type RunningCluster = {
  repoDir: string;
  binaries: ServiceBinaries;
};

/**
 * Starts and stops the storage service and its compute endpoints through the
 * service's local CLI, rooted at one repo directory at a time.
 */
export class ClusterLifecycleDriver {
  readonly #portAllocator: PortAllocator;
  readonly #commandRunner: CommandRunner;
  readonly #cliName: string;
  readonly #computeHost: string;
  readonly #computeUser: string;
  readonly #computeDb: string;
  readonly #commandTimeoutMs: number;
  readonly #computes = new Map<string, ComputeConnection>();
  #running: RunningCluster | null = null;

  constructor(options: ClusterLifecycleDriverOptions) {
    this.#portAllocator = options.portAllocator;
    this.#commandRunner = options.commandRunner ?? defaultCommandRunner;
    this.#cliName = options.cliName ?? DEFAULT_CLI_NAME;
    this.#computeHost = options.computeHost ?? DEFAULT_COMPUTE_HOST;
    this.#computeUser = options.computeUser ?? DEFAULT_COMPUTE_USER;
    this.#computeDb = options.computeDb ?? DEFAULT_COMPUTE_DB;
    this.#commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  /** Create a fresh repo with the requested topology. The repo dir must not exist yet. */
  async init(repoDir: string, binaries: ServiceBinaries, options: InitClusterOptions = {}): Promise<void> {
    const resolvedRepo = path.resolve(repoDir);
    const safekeepers = Math.max(1, options.safekeepers ?? 1);

    const pageserver = {
      listen_pg_addr: `${this.#computeHost}:${await this.#portAllocator.allocate()}`,
      listen_http_addr: `${this.#computeHost}:${await this.#portAllocator.allocate()}`,
      auth_type: 'Trust',
    };
    const brokerEndpoint = `http://${this.#computeHost}:${await this.#portAllocator.allocate()}`;
    const safekeeperEntries: Record<string, unknown>[] = [];
    for (let id = 1; id <= safekeepers; id += 1) {
      safekeeperEntries.push({
        id,
        pg_port: await this.#portAllocator.allocate(),
        http_port: await this.#portAllocator.allocate(),
        sync: false,
      });
    }
    const initConfig = {
      pageserver,
      etcd_broker: { broker_endpoints: [brokerEndpoint] },
      safekeepers: safekeeperEntries,
    };

    const configDir = path.dirname(resolvedRepo);
    await mkdir(configDir, { recursive: true });
    const configPath = path.join(configDir, 'cluster-init.toml');
    await writeFile(configPath, `${stringify(initConfig)}\n`, 'utf8');

    const args = ['init', `--config=${configPath}`, `--pg-version=${binaries.pgVersion}`];
    if (options.localFsRemoteStorage) {
      const remotePath = path.join(resolvedRepo, REMOTE_STORAGE_DIRNAME);
      args.push(`--pageserver-config-override=remote_storage={local_path='${remotePath}'}`);
    }
    await this.#runCli(resolvedRepo, binaries, args, 'init');
    await logThought(`[ClusterDriver] Initialized repo ${resolvedRepo} with ${safekeepers} safekeeper(s).`);
  }

  /**
   * Point the repo's root config at `binaries`, then start every service
   * daemon. Starting a second cluster on the same repo, or a second cluster
   * on this driver, is a usage error.
   */
  async start(workingCopy: Pick<WorkingCopy, 'repoDir'>, binaries: ServiceBinaries): Promise<void> {
    const repoDir = path.resolve(workingCopy.repoDir);
    if (this.#running) {
      throw new ClusterUsageError(
        `Cluster for ${this.#running.repoDir} is already running on this driver; stop it first.`,
      );
    }
    if (LIVE_REPO_DIRS.has(repoDir)) {
      throw new ClusterUsageError(`A cluster is already running against ${repoDir}.`);
    }

    const rootDocument = await loadConfigDocument(repoDir, 'root');
    await persistConfigDocument(
      injectDistribution(rootDocument, { binDir: binaries.binDir, distribDir: binaries.distribDir }),
    );

    LIVE_REPO_DIRS.add(repoDir);
    try {
      await this.#runCli(repoDir, binaries, ['start'], 'start');
    } catch (error: unknown) {
      // A partial start may have left daemons behind.
      await this.#runCli(repoDir, binaries, ['stop'], 'stop').catch(async (stopError: unknown) => {
        const message = stopError instanceof Error ? stopError.message : String(stopError);
        await logThought(`[ClusterDriver] Cleanup after failed start also failed: ${message}`);
      });
      LIVE_REPO_DIRS.delete(repoDir);
      throw error;
    }

    this.#running = { repoDir, binaries };
    await logThought(`[ClusterDriver] Cluster started for ${repoDir} (pg v${binaries.pgVersion}).`);
  }

  /**
   * Stop computes, then the cluster. No-op when nothing is running. Every
   * stop command is attempted even when an earlier one fails; the failures
   * are raised together afterwards.
   */
  async stop(): Promise<void> {
    const running = this.#running;
    if (!running) {
      return;
    }

    const failures: string[] = [];
    let firstError: unknown;
    const attempt = async (label: string, action: () => Promise<unknown>): Promise<void> => {
      try {
        await action();
      } catch (error: unknown) {
        if (failures.length === 0) {
          firstError = error;
        }
        failures.push(`${label}: ${describeError(error)}`);
      }
    };

    for (const branch of [...this.#computes.keys()].reverse()) {
      await attempt(`pg stop ${branch}`, () => this.stopCompute(branch));
    }

    this.#running = null;
    this.#computes.clear();
    LIVE_REPO_DIRS.delete(running.repoDir);
    await attempt('stop', () => this.#runCli(running.repoDir, running.binaries, ['stop'], 'stop'));

    if (failures.length > 0) {
      throw new LifecycleError(
        `Stopping the cluster for ${running.repoDir} failed: ${failures.join('; ')}`,
        '',
        firstError,
      );
    }
    await logThought(`[ClusterDriver] Cluster stopped for ${running.repoDir}.`);
  }

  async startCompute(branchName: string): Promise<ComputeConnection> {
    const running = this.#requireRunning('startCompute');
    if (this.#computes.has(branchName)) {
      throw new ClusterUsageError(`Compute for branch '${branchName}' is already running.`);
    }

    const port = await this.#portAllocator.allocate();
    await this.#runCli(
      running.repoDir,
      running.binaries,
      ['pg', 'start', branchName, `--port=${port}`, `--pg-version=${running.binaries.pgVersion}`],
      `pg start ${branchName}`,
    );

    const connection: ComputeConnection = {
      branchName,
      host: this.#computeHost,
      port,
      user: this.#computeUser,
      dbname: this.#computeDb,
      connstr: `host=${this.#computeHost} port=${port} user=${this.#computeUser} dbname=${this.#computeDb}`,
    };
    this.#computes.set(branchName, connection);
    return connection;
  }

  async stopCompute(branchName: string): Promise<void> {
    const running = this.#running;
    if (!running || !this.#computes.has(branchName)) {
      return;
    }
    this.#computes.delete(branchName);
    await this.#runCli(running.repoDir, running.binaries, ['pg', 'stop', branchName], `pg stop ${branchName}`);
  }

  #requireRunning(operation: string): RunningCluster {
    if (!this.#running) {
      throw new ClusterUsageError(`${operation} requires a running cluster.`);
    }
    return this.#running;
  }

  async #runCli(
    repoDir: string,
    binaries: ServiceBinaries,
    args: string[],
    label: string,
  ): Promise<CommandExecutionResult> {
    const request = {
      file: path.join(binaries.binDir, this.#cliName),
      args,
      cwd: path.dirname(repoDir),
      env: {
        NEON_REPO_DIR: repoDir,
        POSTGRES_DISTRIB_DIR: binaries.distribDir,
        RUST_BACKTRACE: '1',
      },
      timeoutMs: this.#commandTimeoutMs,
    };
    const result = await this.#commandRunner(request);
    if (!result.ok) {
      const logs = await collectLogTails(repoDir);
      throw new LifecycleError(
        `Service CLI '${label}' failed (exit ${result.exitCode}): ${formatCommand(request)}\n${summarizeOutput(result.output)}`,
        logs,
      );
    }
    return result;
  }
}
