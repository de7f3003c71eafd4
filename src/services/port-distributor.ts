import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import type { PortAllocator } from '../types/compatibility.js';
import { getConfigNumber, getConfigValue } from '../config/config-loader.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_BASE_PORT = 15_000;
const DEFAULT_PORT_COUNT = 1_000;
const DEFAULT_RANGE_SLOTS = 16;
const MAX_PORT = 65_535;

export type PortProbe = (port: number) => Promise<boolean>;

export interface PortDistributorOptions {
  basePort?: number;
  portCount?: number;
  probe?: PortProbe;
}

export interface WorkerRangeOptions {
  portCount?: number;
  probe?: PortProbe;
  env?: NodeJS.ProcessEnv;
}

/** Resolves true when nothing is listening on `port` on the loopback interface. */
export function canBind(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.once('error', () => resolve(false));
    server.listen({ port, host: '127.0.0.1', exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });
}

/**
 * Hands out ports from a contiguous range, skipping ones that are in use.
 * Each concurrent run should own its own range; see `claimPortRange`.
 */
export class PortDistributor implements PortAllocator {
  readonly #basePort: number;
  readonly #portCount: number;
  readonly #probe: PortProbe;
  #cursor: number;

  constructor(options: PortDistributorOptions = {}) {
    this.#basePort = options.basePort ?? DEFAULT_BASE_PORT;
    this.#portCount = Math.max(1, options.portCount ?? DEFAULT_PORT_COUNT);
    this.#probe = options.probe ?? canBind;
    this.#cursor = this.#basePort;

    if (this.#basePort < 1 || this.#basePort + this.#portCount - 1 > MAX_PORT) {
      throw new Error(
        `Port range ${this.#basePort}-${this.#basePort + this.#portCount - 1} is outside 1-${MAX_PORT}.`,
      );
    }
  }

  /**
   * Range number `workerIndex`, taken from `COMPAT_PORT_BASE` /
   * `COMPAT_PORT_COUNT` when set. Ranges of distinct indexes never overlap.
   */
  static forWorker(workerIndex: number, options: WorkerRangeOptions = {}): PortDistributor {
    const env = options.env ?? process.env;
    const base = getConfigNumber('COMPAT_PORT_BASE', DEFAULT_BASE_PORT, env);
    const count = options.portCount ?? getConfigNumber('COMPAT_PORT_COUNT', DEFAULT_PORT_COUNT, env);
    return new PortDistributor({
      probe: options.probe,
      basePort: base + Math.max(0, Math.floor(workerIndex)) * count,
      portCount: count,
    });
  }

  get range(): { first: number; last: number } {
    return { first: this.#basePort, last: this.#basePort + this.#portCount - 1 };
  }

  async allocate(): Promise<number> {
    const end = this.#basePort + this.#portCount;
    while (this.#cursor < end) {
      const candidate = this.#cursor;
      this.#cursor += 1;
      if (await this.#probe(candidate)) {
        return candidate;
      }
    }
    throw new Error(
      `No free ports left in range ${this.range.first}-${this.range.last}.`,
    );
  }
}

export interface PortRangeLease {
  distributor: PortDistributor;
  workerIndex: number;
  release: () => Promise<void>;
}

export interface PortRangeRegistryOptions {
  lockDir?: string;
  slots?: number;
  pid?: number;
  isAlive?: (pid: number) => boolean;
  probe?: PortProbe;
  env?: NodeJS.ProcessEnv;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    // EPERM: the process exists but belongs to someone else.
    return hasErrorCode(error, 'EPERM');
  }
}

/**
 * Host-wide registry of port ranges shared by separate processes. A run owns
 * range N while `<lockDir>/ports-<first>-<last>.lock` holds its pid; locks of
 * processes that are gone are taken over.
 */
export class PortRangeRegistry {
  readonly #lockDir: string;
  readonly #slots: number;
  readonly #pid: number;
  readonly #isAlive: (pid: number) => boolean;
  readonly #probe?: PortProbe;
  readonly #env: NodeJS.ProcessEnv;

  constructor(options: PortRangeRegistryOptions = {}) {
    this.#env = options.env ?? process.env;
    this.#lockDir =
      options.lockDir ??
      getConfigValue('COMPAT_PORT_LOCK_DIR', this.#env) ??
      path.join(os.tmpdir(), 'storage-compat-ports');
    this.#slots = Math.max(1, options.slots ?? DEFAULT_RANGE_SLOTS);
    this.#pid = options.pid ?? process.pid;
    this.#isAlive = options.isAlive ?? isProcessAlive;
    this.#probe = options.probe;
  }

  async claim(): Promise<PortRangeLease> {
    await mkdir(this.#lockDir, { recursive: true });
    for (let workerIndex = 0; workerIndex < this.#slots; workerIndex += 1) {
      const distributor = PortDistributor.forWorker(workerIndex, { probe: this.#probe, env: this.#env });
      const { first, last } = distributor.range;
      const lockPath = path.join(this.#lockDir, `ports-${first}-${last}.lock`);
      if (await this.#tryLock(lockPath)) {
        await logThought(`[PortRangeRegistry] Claimed ports ${first}-${last} for pid ${this.#pid}.`);
        return {
          distributor,
          workerIndex,
          release: () => rm(lockPath, { force: true }),
        };
      }
    }
    throw new Error(`All ${this.#slots} port ranges under ${this.#lockDir} are claimed by live runs.`);
  }

  async #tryLock(lockPath: string): Promise<boolean> {
    if (await this.#createLock(lockPath)) {
      return true;
    }
    let owner: number;
    try {
      owner = Number((await readFile(lockPath, 'utf8')).trim());
    } catch (error: unknown) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
      // Released between the two calls.
      return this.#createLock(lockPath);
    }
    if (this.#isAlive(owner)) {
      return false;
    }
    await rm(lockPath, { force: true });
    return this.#createLock(lockPath);
  }

  async #createLock(lockPath: string): Promise<boolean> {
    try {
      await writeFile(lockPath, `${this.#pid}\n`, { encoding: 'utf8', flag: 'wx' });
      return true;
    } catch (error: unknown) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Port range for one run. `COMPAT_WORKER_INDEX` pins the range explicitly;
 * otherwise a free range is claimed from the registry and must be released
 * when the run ends.
 */
export async function claimPortRange(
  env: NodeJS.ProcessEnv = process.env,
  options: Omit<PortRangeRegistryOptions, 'env'> = {},
): Promise<PortRangeLease> {
  if (getConfigValue('COMPAT_WORKER_INDEX', env) !== undefined) {
    const workerIndex = getConfigNumber('COMPAT_WORKER_INDEX', 0, env);
    return {
      distributor: PortDistributor.forWorker(workerIndex, { probe: options.probe, env }),
      workerIndex,
      release: async () => undefined,
    };
  }
  return new PortRangeRegistry({ ...options, env }).claim();
}
