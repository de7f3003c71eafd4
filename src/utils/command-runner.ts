import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { CommandExecutionResult, CommandRequest } from '../types/collaborators.js';
import { logCommand } from './logger.js';

const execFileAsync = promisify(execFile);
const MAX_BUFFER_BYTES = 32 * 1024 * 1024;

function isExecError(
  error: unknown,
): error is Error & { code?: number | string | null; stdout?: string; stderr?: string } {
  return error instanceof Error;
}

export function formatCommand(request: CommandRequest): string {
  return [request.file, ...request.args].join(' ');
}

export function summarizeOutput(output: string): string {
  const trimmed = output.trim();
  if (!trimmed) {
    return 'No command output captured.';
  }
  return trimmed.split('\n').slice(-5).join('\n');
}

/**
 * Run an executable without a shell. A non-zero exit is reported through the
 * result, never thrown.
 */
export async function defaultCommandRunner(request: CommandRequest): Promise<CommandExecutionResult> {
  const startedAt = Date.now();
  let result: CommandExecutionResult;
  try {
    const { stdout, stderr } = await execFileAsync(request.file, request.args, {
      cwd: request.cwd,
      env: { ...process.env, ...request.env },
      windowsHide: true,
      maxBuffer: MAX_BUFFER_BYTES,
      timeout: request.timeoutMs,
    });
    result = {
      ok: true,
      exitCode: 0,
      output: [stdout, stderr].filter(Boolean).join('\n').trim(),
      durationMs: Date.now() - startedAt,
    };
  } catch (error: unknown) {
    if (!isExecError(error)) {
      throw error;
    }
    const output = [error.stdout, error.stderr, error.message]
      .filter((part): part is string => typeof part === 'string' && part.length > 0)
      .join('\n')
      .trim();
    result = {
      ok: false,
      exitCode: typeof error.code === 'number' ? error.code : 1,
      output,
      durationMs: Date.now() - startedAt,
    };
  }
  await logCommand(formatCommand(request), result);
  return result;
}
