import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
}));

import {
  PortDistributor,
  PortRangeRegistry,
  claimPortRange,
} from '../../src/services/port-distributor.js';

describe('PortDistributor', () => {
  const savedBase = process.env.COMPAT_PORT_BASE;
  const savedCount = process.env.COMPAT_PORT_COUNT;

  afterEach(() => {
    restore('COMPAT_PORT_BASE', savedBase);
    restore('COMPAT_PORT_COUNT', savedCount);
  });

  it('hands out ports sequentially and skips ports that are taken', async () => {
    const busy = new Set([15001]);
    const distributor = new PortDistributor({
      basePort: 15000,
      portCount: 4,
      probe: async (port) => !busy.has(port),
    });

    expect(await distributor.allocate()).toBe(15000);
    expect(await distributor.allocate()).toBe(15002);
    expect(await distributor.allocate()).toBe(15003);
    await expect(distributor.allocate()).rejects.toThrow('No free ports left in range 15000-15003.');
  });

  it('rejects a range that leaves the valid port space', () => {
    expect(() => new PortDistributor({ basePort: 65000, portCount: 1000 })).toThrow(
      'Port range 65000-65999 is outside 1-65535.',
    );
  });

  it('gives each worker a disjoint range', () => {
    process.env.COMPAT_PORT_BASE = '20000';
    process.env.COMPAT_PORT_COUNT = '100';

    const first = PortDistributor.forWorker(0, { probe: async () => true });
    const third = PortDistributor.forWorker(2, { probe: async () => true });

    expect(first.range).toEqual({ first: 20000, last: 20099 });
    expect(third.range).toEqual({ first: 20200, last: 20299 });
  });
});

describe('PortRangeRegistry', () => {
  const ENV = { COMPAT_PORT_BASE: '30000', COMPAT_PORT_COUNT: '50' };
  const createdDirs: string[] = [];
  const freePorts = async () => true;

  afterEach(async () => {
    await Promise.all(createdDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  async function createLockDir(): Promise<string> {
    const lockDir = await mkdtemp(path.join(os.tmpdir(), 'port-ranges-'));
    createdDirs.push(lockDir);
    return lockDir;
  }

  function registry(lockDir: string, pid: number, isAlive: (pid: number) => boolean = () => true) {
    return new PortRangeRegistry({ lockDir, pid, isAlive, probe: freePorts, env: ENV });
  }

  it('gives concurrent runs with default settings disjoint ranges', async () => {
    const lockDir = await createLockDir();

    const backward = await registry(lockDir, 101).claim();
    const forward = await registry(lockDir, 102).claim();

    expect(backward.distributor.range).toEqual({ first: 30000, last: 30049 });
    expect(forward.distributor.range).toEqual({ first: 30050, last: 30099 });
    expect(await backward.distributor.allocate()).toBe(30000);
    expect(await forward.distributor.allocate()).toBe(30050);
    expect((await readdir(lockDir)).sort()).toEqual(['ports-30000-30049.lock', 'ports-30050-30099.lock']);
  });

  it('hands a released range to the next run', async () => {
    const lockDir = await createLockDir();
    const first = await registry(lockDir, 101).claim();
    await first.release();

    const next = await registry(lockDir, 102).claim();

    expect(next.workerIndex).toBe(0);
  });

  it('takes over ranges whose owner has exited', async () => {
    const lockDir = await createLockDir();
    await writeFile(path.join(lockDir, 'ports-30000-30049.lock'), '999\n', 'utf8');

    const lease = await registry(lockDir, 102, (pid) => pid !== 999).claim();

    expect(lease.workerIndex).toBe(0);
  });

  it('fails when every range is held by a live run', async () => {
    const lockDir = await createLockDir();
    const registryOfOne = new PortRangeRegistry({ lockDir, pid: 101, slots: 1, isAlive: () => true, env: ENV });
    await registryOfOne.claim();

    await expect(
      new PortRangeRegistry({ lockDir, pid: 102, slots: 1, isAlive: () => true, env: ENV }).claim(),
    ).rejects.toThrow(`All 1 port ranges under ${lockDir} are claimed by live runs.`);
  });

  it('uses a pinned worker index without taking a lock', async () => {
    const lockDir = await createLockDir();

    const lease = await claimPortRange({ ...ENV, COMPAT_WORKER_INDEX: '3' }, { lockDir, probe: freePorts });

    expect(lease.workerIndex).toBe(3);
    expect(lease.distributor.range).toEqual({ first: 30150, last: 30199 });
    expect(await readdir(lockDir)).toEqual([]);
  });
});

function restore(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}
