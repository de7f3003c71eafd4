import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type {
  ControlPlaneClient,
  ControlPlaneEndpoint,
  PgTools,
  TimelineDetail,
  Workload,
} from '../../src/types/collaborators.js';
import type {
  ComputeConnection,
  PortAllocator,
  ServiceBinaries,
  WorkingCopy,
} from '../../src/types/compatibility.js';
import type { InitClusterOptions } from '../../src/services/cluster-driver.js';
import type { SuiteDriver } from '../../src/services/compatibility-suite.js';
import { FLUSH_LSN, type TableData, rangeKeys, renderDump, writeRepoConfig } from './snapshot-fixture.js';

export { FLUSH_LSN, TENANT_ID, TIMELINE_ID, type TableData, rangeKeys, renderDump } from './snapshot-fixture.js';

function cloneTables(tables: TableData): TableData {
  return new Map([...tables.entries()].map(([name, keys]) => [name, [...keys]]));
}

/**
 * In-process stand-in for the storage service. Live tables are what computes
 * see; the durable log is what a recreated timeline is rebuilt from.
 */
export class FakeStorageService {
  tables: TableData;
  durableLog: TableData;
  timelineDeleted = false;
  /** What computes report as flushed; `lastRecordLsn` is what the service has ingested. */
  flushLsn = FLUSH_LSN;
  lastRecordLsn = FLUSH_LSN;
  remoteConsistentLsn: string | null = null;
  /** Rows lost from every table when the timeline is rebuilt from the log. */
  replayDropsRows = 0;
  readonly events: string[] = [];
  readonly endpoints: ControlPlaneEndpoint[] = [];

  constructor(tables: TableData = new Map()) {
    this.tables = cloneTables(tables);
    this.durableLog = cloneTables(tables);
  }

  deleteTimeline(): void {
    this.timelineDeleted = true;
    this.tables = new Map();
  }

  recreateTimeline(): void {
    const replayed = cloneTables(this.durableLog);
    for (const [name, keys] of replayed) {
      replayed.set(name, keys.slice(0, Math.max(0, keys.length - this.replayDropsRows)));
    }
    this.tables = replayed;
    this.timelineDeleted = false;
  }

  checkpoint(): void {
    this.durableLog = cloneTables(this.tables);
    this.remoteConsistentLsn = this.lastRecordLsn;
  }
}

export class FakePgTools implements PgTools {
  readonly benchCalls: string[][] = [];

  constructor(private readonly service: FakeStorageService) {}

  async dumpAll(_connstr: string, outputFile: string): Promise<void> {
    if (this.service.timelineDeleted) {
      throw new Error('timeline is not available');
    }
    this.service.events.push(`dump ${path.basename(outputFile)}`);
    await writeFile(outputFile, renderDump(this.service.tables), 'utf8');
  }

  async bench(_connstr: string, args: string[]): Promise<void> {
    this.benchCalls.push(args);
    this.service.events.push(`bench ${args.join(' ')}`);
  }

  async query(_connstr: string, sql: string): Promise<string> {
    if (/pg_current_wal_flush_lsn/i.test(sql)) {
      return `${this.service.flushLsn}\n`;
    }
    const count = /count\(\*\) FROM (\w+)/i.exec(sql);
    if (count) {
      return `${this.service.tables.get(count[1])?.length ?? 0}\n`;
    }
    const sum = /sum\(key\) FROM (\w+) WHERE key > (\d+)/i.exec(sql);
    if (sum) {
      const threshold = Number(sum[2]);
      const keys = this.service.tables.get(sum[1]) ?? [];
      return `${keys.filter((key) => key > threshold).reduce((total, key) => total + key, 0)}\n`;
    }
    throw new Error(`unsupported query: ${sql}`);
  }
}

export class FakeControlPlane implements ControlPlaneClient {
  constructor(private readonly service: FakeStorageService) {}

  async timelineDetail(tenantId: string, timelineId: string): Promise<TimelineDetail> {
    return {
      tenantId,
      timelineId,
      lastRecordLsn: this.service.lastRecordLsn,
      remoteConsistentLsn: this.service.remoteConsistentLsn,
    };
  }

  async timelineCheckpoint(): Promise<void> {
    this.service.events.push('checkpoint');
    this.service.checkpoint();
  }

  async timelineDelete(): Promise<void> {
    this.service.events.push('timeline delete');
    this.service.deleteTimeline();
  }

  async timelineCreate(tenantId: string, timelineId: string): Promise<TimelineDetail> {
    this.service.events.push('timeline create');
    this.service.recreateTimeline();
    return this.timelineDetail(tenantId, timelineId);
  }
}

export function fakeControlPlaneFactory(service: FakeStorageService): (endpoint: ControlPlaneEndpoint) => ControlPlaneClient {
  return (endpoint) => {
    service.endpoints.push(endpoint);
    return new FakeControlPlane(service);
  };
}

/** Inserts rows into `foo` on initialize; `run` is a no-op write burst. */
export class FooWorkload implements Workload {
  readonly name = 'foo-insert';

  constructor(
    private readonly service: FakeStorageService,
    private readonly rows = 1000,
  ) {}

  async initialize(): Promise<void> {
    this.service.tables.set('foo', rangeKeys(this.rows));
    this.service.events.push('workload initialize');
  }

  async run(): Promise<void> {
    this.service.events.push('workload run');
  }
}

export class SequentialPorts implements PortAllocator {
  #next: number;

  constructor(first = 20000) {
    this.#next = first;
  }

  async allocate(): Promise<number> {
    const port = this.#next;
    this.#next += 1;
    return port;
  }
}

/** Driver double that records calls and lays out a repo on `init`. */
export class FakeDriver implements SuiteDriver {
  readonly calls: string[] = [];
  running = false;
  failStart = false;

  constructor(
    private readonly service: FakeStorageService,
    private readonly portAllocator: PortAllocator = new SequentialPorts(),
  ) {}

  async init(repoDir: string, _binaries: ServiceBinaries, options: InitClusterOptions = {}): Promise<void> {
    this.calls.push(`init safekeepers=${options.safekeepers ?? 1} localFs=${options.localFsRemoteStorage === true}`);
    await mkdir(repoDir, { recursive: true });
    await writeRepoConfig(repoDir, {
      captureRepoDir: repoDir,
      pageserverHttpPort: await this.portAllocator.allocate(),
      pageserverPgPort: await this.portAllocator.allocate(),
      brokerPort: await this.portAllocator.allocate(),
      safekeeperPorts: [await this.portAllocator.allocate(), await this.portAllocator.allocate()],
    });
    await writeFile(path.join(repoDir, 'pageserver.log'), 'started\n', 'utf8');
  }

  async start(workingCopy: Pick<WorkingCopy, 'repoDir'>): Promise<void> {
    this.calls.push(`start ${path.basename(path.dirname(workingCopy.repoDir))}`);
    if (this.failStart) {
      throw new Error('pageserver exited during startup');
    }
    this.running = true;
    this.service.events.push('cluster start');
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.calls.push('stop');
    this.service.events.push('cluster stop');
  }

  async startCompute(branchName: string): Promise<ComputeConnection> {
    this.calls.push(`startCompute ${branchName}`);
    const port = await this.portAllocator.allocate();
    return {
      branchName,
      host: '127.0.0.1',
      port,
      user: 'cloud_admin',
      dbname: 'postgres',
      connstr: `host=127.0.0.1 port=${port} user=cloud_admin dbname=postgres`,
    };
  }

  async stopCompute(branchName: string): Promise<void> {
    this.calls.push(`stopCompute ${branchName}`);
  }
}
