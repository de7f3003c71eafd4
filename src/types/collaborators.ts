import type { ComputeConnection } from './compatibility.js';

// ─── Command Execution ───────────────────────────────────────────────────────

export interface CommandRequest {
  file: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface CommandExecutionResult {
  ok: boolean;
  exitCode: number;
  output: string;
  durationMs: number;
}

export type CommandRunner = (request: CommandRequest) => Promise<CommandExecutionResult>;

// ─── Control Plane ───────────────────────────────────────────────────────────

export interface TimelineDetail {
  tenantId: string;
  timelineId: string;
  lastRecordLsn: string;
  remoteConsistentLsn: string | null;
}

/** Subset of the storage service's HTTP management API used by the harness. */
export interface ControlPlaneClient {
  timelineDetail(tenantId: string, timelineId: string): Promise<TimelineDetail>;
  timelineCheckpoint(tenantId: string, timelineId: string): Promise<void>;
  timelineDelete(tenantId: string, timelineId: string): Promise<void>;
  timelineCreate(tenantId: string, timelineId: string): Promise<TimelineDetail>;
}

export interface ControlPlaneEndpoint {
  host: string;
  port: number;
  authToken?: string;
}

export type ControlPlaneFactory = (endpoint: ControlPlaneEndpoint) => ControlPlaneClient;

// ─── Compute Tools ───────────────────────────────────────────────────────────

export interface PgTools {
  dumpAll(connstr: string, outputFile: string): Promise<void>;
  bench(connstr: string, args: string[]): Promise<void>;
  /** Runs a query and returns its unaligned, tuples-only output. */
  query(connstr: string, sql: string): Promise<string>;
}

export interface Workload {
  readonly name: string;
  initialize(connection: ComputeConnection): Promise<void>;
  run(connection: ComputeConnection): Promise<void>;
}
