import { config as loadDotenv } from 'dotenv';
import path from 'node:path';

let envLoaded = false;

/**
 * Load `.env` from the working directory once. Values already present in
 * `process.env` win over the file.
 */
export function ensureEnvLoaded(envPath?: string): void {
  if (envLoaded) {
    return;
  }
  envLoaded = true;
  loadDotenv({ path: envPath ?? path.resolve('.env') });
}

/** Returns the trimmed value of a config key, or undefined when unset or blank. */
export function getConfigValue(key: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (env === process.env) {
    ensureEnvLoaded();
  }
  const raw = env[key];
  if (typeof raw !== 'string') {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function getConfigNumber(
  key: string,
  fallback: number,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const raw = getConfigValue(key, env);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}
