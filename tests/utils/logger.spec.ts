import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { logCommand, logThought, scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  const envName = 'PAGESERVER_AUTH_TOKEN';
  let previousEnvValue: string | undefined;

  beforeEach(() => {
    previousEnvValue = process.env[envName];
    process.env[envName] = 'test-secret-token-value';
  });

  afterEach(() => {
    if (previousEnvValue === undefined) {
      delete process.env[envName];
    } else {
      process.env[envName] = previousEnvValue;
    }
  });

  it('redacts raw sensitive values even when they appear outside key=value patterns', () => {
    expect(scrubSensitiveText('diagnostic trace => test-secret-token-value <= should be hidden')).toBe(
      'diagnostic trace => [REDACTED] <= should be hidden',
    );
  });

  it('redacts bearer tokens, auth_token entries and connection passwords', () => {
    expect(scrubSensitiveText('authorization: Bearer abc.def')).toBe('authorization: Bearer [REDACTED]');
    expect(scrubSensitiveText("auth_token = 'placeholder'")).toBe("auth_token = '[REDACTED]'");
    expect(scrubSensitiveText('host=127.0.0.1 password=placeholder user=cloud_admin')).toBe(
      'host=127.0.0.1 password=[REDACTED] user=cloud_admin',
    );
  });
});

describe('daily log', () => {
  const previousLogDir = process.env.COMPAT_LOG_DIR;
  let logDir = '';

  beforeEach(async () => {
    logDir = await mkdtemp(path.join(os.tmpdir(), 'compat-logs-'));
    process.env.COMPAT_LOG_DIR = logDir;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (previousLogDir === undefined) {
      delete process.env.COMPAT_LOG_DIR;
    } else {
      process.env.COMPAT_LOG_DIR = previousLogDir;
    }
    await rm(logDir, { recursive: true, force: true });
  });

  it('appends thoughts and commands to the file of the day', async () => {
    await logThought('[Test] first entry');
    await logCommand('neon_local start', { ok: false, exitCode: 2, durationMs: 7, output: 'a\nb' });

    const day = new Date().toISOString().slice(0, 10);
    const content = await readFile(path.join(logDir, `compat-${day}.md`), 'utf8');
    expect(content).toContain(' [Test] first entry\n');
    expect(content).toContain(' [Command] neon_local start -> exit 2 (7ms)\n    a\n    b\n');
  });
});
