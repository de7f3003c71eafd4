import path from 'node:path';
import type { BreakageWaiver, CompatibilityDirection, ServiceBinaries } from '../types/compatibility.js';
import { ConfigurationError } from '../services/compat-errors.js';
import { getConfigValue } from './config-loader.js';
import { CONFIG_SCHEMA_MAP, type ConfigCondition, requiredKeysFor } from './env-schema.js';

const DEFAULT_PG_VERSION = '14';

export const WAIVER_KEYS: Record<CompatibilityDirection, string> = {
  backward: 'ALLOW_BACKWARD_COMPATIBILITY_BREAKAGE',
  forward: 'ALLOW_FORWARD_COMPATIBILITY_BREAKAGE',
};

function requireValue(key: string, env: NodeJS.ProcessEnv): string {
  const value = getConfigValue(key, env);
  if (value === undefined) {
    const remediation = CONFIG_SCHEMA_MAP.get(key)?.remediation ?? `Set ${key}.`;
    throw new ConfigurationError(`${key} is not set.`, remediation);
  }
  return value;
}

/** Only the literal `true`, in any case, activates a waiver. */
export function readBreakageWaiver(
  direction: CompatibilityDirection,
  env: NodeJS.ProcessEnv = process.env,
): BreakageWaiver {
  const envKey = WAIVER_KEYS[direction];
  return {
    direction,
    envKey,
    active: getConfigValue(envKey, env)?.toLowerCase() === 'true',
  };
}

/** Binaries of the build under test. */
export function readCurrentBinaries(env: NodeJS.ProcessEnv = process.env): ServiceBinaries {
  return {
    binDir: path.resolve(requireValue('NEON_BIN', env)),
    distribDir: path.resolve(requireValue('POSTGRES_DISTRIB_DIR', env)),
    pgVersion: getConfigValue('DEFAULT_PG_VERSION', env) ?? DEFAULT_PG_VERSION,
  };
}

/** Snapshot from the previous release, for the backward direction. */
export function readBackwardSnapshotDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(requireValue('COMPATIBILITY_SNAPSHOT_DIR', env));
}

/** Previous-release binaries, for the forward direction. */
export function readForwardBinaries(env: NodeJS.ProcessEnv = process.env): ServiceBinaries {
  return {
    binDir: path.resolve(requireValue('COMPATIBILITY_NEON_BIN', env)),
    distribDir: path.resolve(requireValue('COMPATIBILITY_POSTGRES_DISTRIB_DIR', env)),
    pgVersion: getConfigValue('DEFAULT_PG_VERSION', env) ?? DEFAULT_PG_VERSION,
  };
}

/** Keys a run kind needs that are currently absent. */
export function missingKeysFor(condition: ConfigCondition, env: NodeJS.ProcessEnv = process.env): string[] {
  return requiredKeysFor(condition)
    .filter((spec) => getConfigValue(spec.key, env) === undefined)
    .map((spec) => spec.key);
}

/**
 * Fail before any work starts when a run kind is missing keys. Keys in
 * `supplied` were given another way (a CLI flag) and are not required.
 */
export function assertRunConfigured(
  condition: ConfigCondition,
  env: NodeJS.ProcessEnv = process.env,
  supplied: readonly string[] = [],
): void {
  const missing = missingKeysFor(condition, env).filter((key) => !supplied.includes(key));
  if (missing.length === 0) {
    return;
  }
  const remediation = missing
    .map((key) => CONFIG_SCHEMA_MAP.get(key)?.remediation ?? `Set ${key}.`)
    .join(' ');
  const subject = missing.length === 1 ? `${missing[0]} is` : `${missing.join(', ')} are`;
  throw new ConfigurationError(`${subject} not set.`, remediation);
}
