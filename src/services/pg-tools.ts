import path from 'node:path';
import type { CommandRunner, PgTools, Workload } from '../types/collaborators.js';
import type { ComputeConnection, ServiceBinaries } from '../types/compatibility.js';
import { defaultCommandRunner, formatCommand, summarizeOutput } from '../utils/command-runner.js';
import { CompatibilityError } from './compat-errors.js';

export interface PgBinOptions {
  binaries: Pick<ServiceBinaries, 'distribDir' | 'pgVersion'>;
  commandRunner?: CommandRunner;
  cwd?: string;
}

/** Postgres client tools from the distribution directory of one version. */
export class PgBin implements PgTools {
  readonly #binDir: string;
  readonly #libDir: string;
  readonly #commandRunner: CommandRunner;
  readonly #cwd?: string;

  constructor(options: PgBinOptions) {
    const versionDir = path.join(options.binaries.distribDir, `v${options.binaries.pgVersion}`);
    this.#binDir = path.join(versionDir, 'bin');
    this.#libDir = path.join(versionDir, 'lib');
    this.#commandRunner = options.commandRunner ?? defaultCommandRunner;
    this.#cwd = options.cwd;
  }

  async dumpAll(connstr: string, outputFile: string): Promise<void> {
    await this.#run('pg_dumpall', [`--dbname=${connstr}`, `--file=${outputFile}`]);
  }

  async bench(connstr: string, args: string[]): Promise<void> {
    await this.#run('pgbench', [...args, connstr]);
  }

  async query(connstr: string, sql: string): Promise<string> {
    return this.#run('psql', [
      `--dbname=${connstr}`,
      '--no-align',
      '--tuples-only',
      '--no-psqlrc',
      '--set=ON_ERROR_STOP=1',
      `--command=${sql}`,
    ]);
  }

  async #run(tool: string, args: string[]): Promise<string> {
    const request = {
      file: path.join(this.#binDir, tool),
      args,
      cwd: this.#cwd,
      env: { LD_LIBRARY_PATH: this.#libDir, DYLD_LIBRARY_PATH: this.#libDir },
    };
    const result = await this.#commandRunner(request);
    if (!result.ok) {
      throw new CompatibilityError(
        `${tool} failed (exit ${result.exitCode}): ${formatCommand(request)}\n${summarizeOutput(result.output)}`,
      );
    }
    return result.output;
  }
}

export interface PgbenchWorkloadOptions {
  scale?: number;
  durationSeconds?: number;
}

/** pgbench's TPC-B-like workload: `initialize` loads tables, `run` drives writes. */
export class PgbenchWorkload implements Workload {
  readonly name = 'pgbench';
  readonly #tools: PgTools;
  readonly #scale: number;
  readonly #durationSeconds: number;

  constructor(tools: PgTools, options: PgbenchWorkloadOptions = {}) {
    this.#tools = tools;
    this.#scale = options.scale ?? 10;
    this.#durationSeconds = options.durationSeconds ?? 60;
  }

  async initialize(connection: ComputeConnection): Promise<void> {
    await this.#tools.bench(connection.connstr, ['--initialize', `--scale=${this.#scale}`]);
  }

  async run(connection: ComputeConnection): Promise<void> {
    await this.#tools.bench(connection.connstr, [`--time=${this.#durationSeconds}`, '--progress=2']);
  }
}
