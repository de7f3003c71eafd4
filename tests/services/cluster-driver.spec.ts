import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parse } from 'smol-toml';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logCommand: vi.fn(async () => undefined),
}));

import { ClusterLifecycleDriver } from '../../src/services/cluster-driver.js';
import { ClusterUsageError, LifecycleError } from '../../src/services/compat-errors.js';
import type { CommandExecutionResult, CommandRequest } from '../../src/types/collaborators.js';
import type { ServiceBinaries } from '../../src/types/compatibility.js';
import { SequentialPorts } from '../harness/fake-storage.js';
import { writeRepoConfig } from '../harness/snapshot-fixture.js';

const BINARIES: ServiceBinaries = { binDir: '/opt/neon/current', distribDir: '/opt/pg_install', pgVersion: '14' };

function createRunner(failures: Record<string, Partial<CommandExecutionResult>> = {}) {
  const requests: CommandRequest[] = [];
  const runner = async (request: CommandRequest): Promise<CommandExecutionResult> => {
    requests.push(request);
    const failure = failures[request.args.slice(0, 2).join(' ')] ?? failures[request.args[0]];
    return { ok: true, exitCode: 0, output: '', durationMs: 1, ...failure };
  };
  return { requests, runner };
}

describe('ClusterLifecycleDriver', () => {
  const createdWorkspaces: string[] = [];

  afterEach(async () => {
    await Promise.all(
      createdWorkspaces.splice(0).map((workspace) => rm(workspace, { recursive: true, force: true })),
    );
  });

  async function createRepo(): Promise<string> {
    const workspace = await mkdtemp(path.join(os.tmpdir(), 'cluster-driver-'));
    createdWorkspaces.push(workspace);
    const repoDir = path.join(workspace, 'repo');
    await mkdir(repoDir, { recursive: true });
    await writeRepoConfig(repoDir, { captureRepoDir: repoDir });
    return repoDir;
  }

  it('injects the binaries into the root config and starts the cluster', async () => {
    const repoDir = await createRepo();
    const { requests, runner } = createRunner();
    const driver = new ClusterLifecycleDriver({ portAllocator: new SequentialPorts(), commandRunner: runner });

    await driver.start({ repoDir }, BINARIES);

    const root = parse(await readFile(path.join(repoDir, 'config'), 'utf8'));
    expect(root.neon_distrib_dir).toBe('/opt/neon/current');
    expect(root.postgres_distrib_dir).toBe('/opt/pg_install');
    expect(requests[0]).toMatchObject({
      file: path.join('/opt/neon/current', 'neon_local'),
      args: ['start'],
      cwd: path.dirname(repoDir),
      env: { NEON_REPO_DIR: repoDir, POSTGRES_DISTRIB_DIR: '/opt/pg_install', RUST_BACKTRACE: '1' },
    });
    await driver.stop();
    expect(requests.map((request) => request.args[0])).toEqual(['start', 'stop']);
  });

  it('starts computes on allocated ports and stops them before the cluster', async () => {
    const repoDir = await createRepo();
    const { requests, runner } = createRunner();
    const driver = new ClusterLifecycleDriver({ portAllocator: new SequentialPorts(25000), commandRunner: runner });

    await driver.start({ repoDir }, BINARIES);
    const connection = await driver.startCompute('main');
    await driver.stop();
    await driver.stop();

    expect(connection.connstr).toBe('host=127.0.0.1 port=25000 user=cloud_admin dbname=postgres');
    expect(requests.map((request) => request.args.join(' '))).toEqual([
      'start',
      'pg start main --port=25000 --pg-version=14',
      'pg stop main',
      'stop',
    ]);
  });

  it('refuses a second start against the same repo', async () => {
    const repoDir = await createRepo();
    const first = new ClusterLifecycleDriver({ portAllocator: new SequentialPorts(), commandRunner: createRunner().runner });
    const second = new ClusterLifecycleDriver({ portAllocator: new SequentialPorts(), commandRunner: createRunner().runner });

    await first.start({ repoDir }, BINARIES);
    await expect(first.start({ repoDir }, BINARIES)).rejects.toBeInstanceOf(ClusterUsageError);
    await expect(second.start({ repoDir }, BINARIES)).rejects.toThrow(
      `A cluster is already running against ${repoDir}.`,
    );
    await first.stop();
    await second.start({ repoDir }, BINARIES);
    await second.stop();
  });

  it('raises a lifecycle error with captured logs and cleans up after a failed start', async () => {
    const repoDir = await createRepo();
    await writeFile(path.join(repoDir, 'pageserver.log'), 'line one\nFATAL: bad config\n', 'utf8');
    const { requests, runner } = createRunner({ start: { ok: false, exitCode: 2, output: 'pageserver exited' } });
    const driver = new ClusterLifecycleDriver({ portAllocator: new SequentialPorts(), commandRunner: runner });

    const attempt = driver.start({ repoDir }, BINARIES);

    await expect(attempt).rejects.toBeInstanceOf(LifecycleError);
    await expect(attempt).rejects.toThrow('==> pageserver.log <==\nline one\nFATAL: bad config');
    expect(requests.map((request) => request.args[0])).toEqual(['start', 'stop']);
    await expect(driver.startCompute('main')).rejects.toThrow('startCompute requires a running cluster.');
  });

  it('still stops the cluster when a compute fails to stop', async () => {
    const repoDir = await createRepo();
    const { requests, runner } = createRunner({ 'pg stop': { ok: false, exitCode: 1, output: 'compute is wedged' } });
    const driver = new ClusterLifecycleDriver({ portAllocator: new SequentialPorts(), commandRunner: runner });

    await driver.start({ repoDir }, BINARIES);
    await driver.startCompute('main');
    const stopping = driver.stop();

    await expect(stopping).rejects.toBeInstanceOf(LifecycleError);
    await expect(stopping).rejects.toThrow(`Stopping the cluster for ${repoDir} failed: pg stop main:`);
    expect(requests.map((request) => request.args.join(' '))).toEqual([
      'start',
      'pg start main --port=20000 --pg-version=14',
      'pg stop main',
      'stop',
    ]);

    await driver.stop();
    expect(requests).toHaveLength(4);

    const next = new ClusterLifecycleDriver({ portAllocator: new SequentialPorts(), commandRunner: createRunner().runner });
    await next.start({ repoDir }, BINARIES);
    await next.stop();
  });

  it('writes an init config with the requested safekeepers and remote storage', async () => {
    const workspace = await mkdtemp(path.join(os.tmpdir(), 'cluster-driver-'));
    createdWorkspaces.push(workspace);
    const repoDir = path.join(workspace, 'repo');
    const { requests, runner } = createRunner();
    const driver = new ClusterLifecycleDriver({ portAllocator: new SequentialPorts(26000), commandRunner: runner });

    await driver.init(repoDir, BINARIES, { safekeepers: 3, localFsRemoteStorage: true });

    const initConfig = parse(await readFile(path.join(workspace, 'cluster-init.toml'), 'utf8'));
    expect(initConfig.pageserver).toEqual({
      listen_pg_addr: '127.0.0.1:26000',
      listen_http_addr: '127.0.0.1:26001',
      auth_type: 'Trust',
    });
    expect(initConfig.etcd_broker).toEqual({ broker_endpoints: ['http://127.0.0.1:26002'] });
    expect(initConfig.safekeepers).toEqual([
      { id: 1, pg_port: 26003, http_port: 26004, sync: false },
      { id: 2, pg_port: 26005, http_port: 26006, sync: false },
      { id: 3, pg_port: 26007, http_port: 26008, sync: false },
    ]);
    expect(requests[0].args).toEqual([
      'init',
      `--config=${path.join(workspace, 'cluster-init.toml')}`,
      '--pg-version=14',
      `--pageserver-config-override=remote_storage={local_path='${path.join(repoDir, 'local_fs_remote_storage')}'}`,
    ]);
  });
});
