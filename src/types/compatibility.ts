// ─── Directions & Waivers ────────────────────────────────────────────────────

export type CompatibilityDirection = 'backward' | 'forward';

export interface BreakageWaiver {
  direction: CompatibilityDirection;
  /** Environment variable the flag was read from. */
  envKey: string;
  active: boolean;
}

// ─── Snapshots ───────────────────────────────────────────────────────────────

/**
 * Capture metadata persisted as `snapshot.json` next to `repo/` and `dump.sql`.
 */
export interface SnapshotMetadata {
  metadataVersion: 1;
  tenantId: string;
  timelineId: string;
  /** Flush LSN reached by the workload, in `X/Y` form. */
  lsn: string;
  /** Absolute repo path at capture time. Must not survive preparation. */
  captureRepoDir: string;
  pgVersion: string;
  capturedAt: string;
}

export interface Snapshot {
  rootDir: string;
  repoDir: string;
  dumpPath: string;
  metadataPath: string;
  metadata: SnapshotMetadata;
}

// ─── Ports ───────────────────────────────────────────────────────────────────

export type EndpointValue = number | string;

export interface PortMapping {
  originalPort: number;
  allocatedPort: number;
}

export interface PortAllocator {
  allocate(): Promise<number>;
}

// ─── Working Copies ──────────────────────────────────────────────────────────

export interface WorkingCopy {
  rootDir: string;
  repoDir: string;
  baselineDumpPath: string;
  /** Capture-time repo path that was rebased onto `repoDir`. */
  captureRepoDir: string;
  metadata: SnapshotMetadata | null;
  portMappings: PortMapping[];
  rewrittenDocuments: string[];
}

export interface PrepareSnapshotOptions {
  snapshotSource: string;
  destination: string;
  portAllocator: PortAllocator;
  overrideDistribDir?: string;
  /**
   * Literal searched for after sanitization when the snapshot carries no
   * metadata and the capture repo path cannot be inferred from its config.
   */
  captureMarker?: string;
}

// ─── Binaries & Compute ──────────────────────────────────────────────────────

export interface ServiceBinaries {
  /** Directory holding the service CLI and daemons. */
  binDir: string;
  /** Postgres installation root containing `v<version>/bin`. */
  distribDir: string;
  pgVersion: string;
}

export interface ComputeConnection {
  branchName: string;
  host: string;
  port: number;
  user: string;
  dbname: string;
  connstr: string;
}

// ─── Dumps ───────────────────────────────────────────────────────────────────

export interface DiffVerdict {
  differs: boolean;
  diffPath: string;
}

export interface DumpComparison {
  differs: boolean;
  patch: string;
}

export interface DumpComparatorLike {
  differs(first: string, second: string, output: string): Promise<DiffVerdict>;
}

// ─── Recovery ────────────────────────────────────────────────────────────────

export interface ProbeResult {
  query: string;
  before: string;
  after: string;
  matches: boolean;
}

export interface RecoveryReport {
  initialDiffers: boolean;
  recoveryDiffers: boolean;
  initialDiff: DiffVerdict;
  recoveryDiff: DiffVerdict;
  dumpPath: string;
  recoveredDumpPath: string;
  probes: ProbeResult[];
  tenantId: string;
  timelineId: string;
}

// ─── Gate ────────────────────────────────────────────────────────────────────

export type ValidationOutcome = 'passed' | 'failed';

export type GateVerdict = 'passed' | 'failed' | 'expected-failure' | 'waiver-unused';

export interface GateReport<T> {
  verdict: GateVerdict;
  outcome: ValidationOutcome;
  waiver: BreakageWaiver;
  value?: T;
  error?: unknown;
  summary: string;
}

// ─── Suite ───────────────────────────────────────────────────────────────────

export interface CompatibilityRunReport {
  reportVersion: 1;
  direction: CompatibilityDirection;
  snapshotDir: string;
  workingCopyDir: string;
  startedAt: string;
  completedAt: string;
  verdict: GateVerdict;
  summary: string;
  recovery: RecoveryReport | null;
  diagnostics: string[];
  reportPath: string;
}
