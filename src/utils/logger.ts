import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { getConfigValue } from '../config/config-loader.js';

const DEFAULT_LOG_DIR = path.join('memory', 'logs');
const REDACTED = '[REDACTED]';
const SENSITIVE_ENV_PATTERN = /(SECRET|TOKEN|PASSWORD|API_KEY)/i;

const INLINE_PATTERNS: RegExp[] = [
  /(Bearer\s+)[A-Za-z0-9._~+/=-]+/gi,
  /(auth_token\s*=\s*["']?)[^"'\s]+/gi,
  /(password=)[^\s&]+/gi,
];

function resolveLogDir(): string {
  return path.resolve(getConfigValue('COMPAT_LOG_DIR') ?? DEFAULT_LOG_DIR);
}

function dailyLogPath(now: Date): string {
  const day = now.toISOString().slice(0, 10);
  return path.join(resolveLogDir(), `compat-${day}.md`);
}

/**
 * Replace credentials in free text before it is printed or persisted.
 * Covers bearer tokens, `auth_token = ...` pairs, connection-string passwords,
 * and the raw values of secret-looking environment variables.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text;
  for (const pattern of INLINE_PATTERNS) {
    scrubbed = scrubbed.replace(pattern, `$1${REDACTED}`);
  }
  for (const [key, value] of Object.entries(process.env)) {
    if (!value || value.length < 8 || !SENSITIVE_ENV_PATTERN.test(key)) {
      continue;
    }
    scrubbed = scrubbed.split(value).join(REDACTED);
  }
  return scrubbed;
}

async function appendEntry(entry: string): Promise<void> {
  const now = new Date();
  const target = dailyLogPath(now);
  try {
    await mkdir(path.dirname(target), { recursive: true });
    await appendFile(target, `- ${now.toISOString()} ${entry}\n`, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Logger] Failed to append to ${target}: ${message}`);
  }
}

/** Record a harness-level observation on the console and in the daily log. */
export async function logThought(message: string): Promise<void> {
  const scrubbed = scrubSensitiveText(message);
  console.log(scrubbed);
  await appendEntry(scrubbed);
}

/** Record an external command and its outcome. Output is truncated to the last lines. */
export async function logCommand(
  command: string,
  outcome: { ok: boolean; exitCode: number; durationMs: number; output: string },
): Promise<void> {
  const tail = outcome.output.trim().split('\n').slice(-5).join('\n');
  const status = outcome.ok ? 'ok' : `exit ${outcome.exitCode}`;
  const entry = scrubSensitiveText(
    `[Command] ${command} -> ${status} (${outcome.durationMs}ms)${tail ? `\n${tail}` : ''}`,
  );
  console.log(entry);
  await appendEntry(entry.replace(/\n/g, '\n    '));
}
