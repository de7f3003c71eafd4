/**
 * Registry of every environment key the compatibility harness reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional' | 'conditional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `condition`   Run kind that makes a conditional key applicable.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'binaries' | 'snapshot' | 'waiver' | 'runtime';

/** Run kinds used by `condition`. Format: `<run>:<direction>`. */
export type ConfigCondition = 'run:backward' | 'run:forward';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  /** Applies only when class === 'conditional'. */
  condition?: ConfigCondition;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Current build ───────────────────────────────────────────────────────────
  {
    key: 'NEON_BIN',
    type: 'env',
    class: 'required',
    scope: 'binaries',
    description: 'Directory holding the service binaries under test (neon_local, pageserver, safekeeper).',
    remediation: 'Set NEON_BIN to the directory of the freshly built service binaries, e.g. NEON_BIN=./target/release.',
  },
  {
    key: 'POSTGRES_DISTRIB_DIR',
    type: 'env',
    class: 'required',
    scope: 'binaries',
    description: 'Root of the compute distribution, containing v<version>/bin and v<version>/lib.',
    remediation: 'Set POSTGRES_DISTRIB_DIR to the compute install root, e.g. POSTGRES_DISTRIB_DIR=./pg_install.',
  },
  {
    key: 'DEFAULT_PG_VERSION',
    type: 'env',
    class: 'optional',
    scope: 'binaries',
    description: 'Compute major version used for new clusters (default: 14).',
    remediation: 'Set DEFAULT_PG_VERSION to a supported major version, e.g. DEFAULT_PG_VERSION=15.',
  },

  // ── Snapshot locators ───────────────────────────────────────────────────────
  {
    key: 'COMPATIBILITY_SNAPSHOT_DIR',
    type: 'env',
    class: 'conditional',
    condition: 'run:backward',
    scope: 'snapshot',
    description: 'Snapshot captured by the previous release, replayed by the current binaries.',
    remediation: 'Set COMPATIBILITY_SNAPSHOT_DIR to the unpacked snapshot from the previous release.',
  },
  {
    key: 'COMPATIBILITY_NEON_BIN',
    type: 'env',
    class: 'conditional',
    condition: 'run:forward',
    scope: 'snapshot',
    description: 'Service binaries of the previous release, used to replay a snapshot from the current build.',
    remediation: 'Set COMPATIBILITY_NEON_BIN to the previous release binary directory.',
  },
  {
    key: 'COMPATIBILITY_POSTGRES_DISTRIB_DIR',
    type: 'env',
    class: 'conditional',
    condition: 'run:forward',
    scope: 'snapshot',
    description: 'Compute distribution of the previous release. Also overrides the snapshot pg_distrib_dir.',
    remediation: 'Set COMPATIBILITY_POSTGRES_DISTRIB_DIR to the previous release compute install root.',
  },

  // ── Waivers ─────────────────────────────────────────────────────────────────
  {
    key: 'ALLOW_BACKWARD_COMPATIBILITY_BREAKAGE',
    type: 'env',
    class: 'optional',
    scope: 'waiver',
    description: "Accept a backward compatibility break when set to 'true'. The run must then actually break.",
    remediation: 'Unset ALLOW_BACKWARD_COMPATIBILITY_BREAKAGE once the breaking change has been released.',
  },
  {
    key: 'ALLOW_FORWARD_COMPATIBILITY_BREAKAGE',
    type: 'env',
    class: 'optional',
    scope: 'waiver',
    description: "Accept a forward compatibility break when set to 'true'. The run must then actually break.",
    remediation: 'Unset ALLOW_FORWARD_COMPATIBILITY_BREAKAGE once the breaking change has been released.',
  },

  // ── Harness runtime ─────────────────────────────────────────────────────────
  {
    key: 'COMPAT_LOG_DIR',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Directory for the daily harness log (default: ./memory/logs).',
    remediation: 'Set COMPAT_LOG_DIR to a writable directory.',
  },
  {
    key: 'COMPAT_PORT_BASE',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'First port of the range handed to worker 0 (default: 15000).',
    remediation: 'Set COMPAT_PORT_BASE to an integer in range 1024-65535.',
  },
  {
    key: 'COMPAT_PORT_COUNT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Number of ports in each worker range (default: 1000).',
    remediation: 'Set COMPAT_PORT_COUNT to a positive integer.',
  },
  {
    key: 'COMPAT_WORKER_INDEX',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Pins this run to one port range. When unset, a free range is claimed from the lock directory.',
    remediation: 'Set COMPAT_WORKER_INDEX to a distinct non-negative integer per parallel run, or leave it unset.',
  },
  {
    key: 'COMPAT_PORT_LOCK_DIR',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Directory holding one lock file per claimed port range (default: <tmpdir>/storage-compat-ports).',
    remediation: 'Set COMPAT_PORT_LOCK_DIR to a directory shared by every run on this host.',
  },
  {
    key: 'COMPAT_DURABILITY_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Upper bound for LSN ingestion and upload polling (default: 120000).',
    remediation: 'Set COMPAT_DURABILITY_TIMEOUT_MS to a positive integer number of milliseconds.',
  },
] as const;

export const CONFIG_SCHEMA_MAP: ReadonlyMap<string, ConfigKeySpec> = new Map(
  CONFIG_SCHEMA.map((spec) => [spec.key, spec]),
);

/** Keys that must be present for a given run kind. */
export function requiredKeysFor(condition: ConfigCondition): ConfigKeySpec[] {
  return CONFIG_SCHEMA.filter(
    (spec) => spec.class === 'required' || (spec.class === 'conditional' && spec.condition === condition),
  );
}
