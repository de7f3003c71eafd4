#!/usr/bin/env node
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { claimPortRange } from '../services/port-distributor.js';
import { CompatibilitySuite } from '../services/compatibility-suite.js';
import { DumpComparator } from '../services/dump-comparator.js';
import { prepareSnapshot } from '../services/snapshot-preparer.js';
import { describeError } from '../services/compat-errors.js';

const DEFAULT_OUTPUT_ROOT = 'test_output';

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  snapshotDir?: string;
  outputRoot?: string;
  destination?: string;
  distribDir?: string;
  diffOutput?: string;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const parsed: ParsedArgs = { command, positionals: [] };

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index];
    const next = rest[index + 1];
    if (token === '--snapshot' && next) {
      parsed.snapshotDir = next;
      index += 1;
      continue;
    }
    if (token === '--output' && next) {
      parsed.outputRoot = next;
      index += 1;
      continue;
    }
    if (token === '--destination' && next) {
      parsed.destination = next;
      index += 1;
      continue;
    }
    if (token === '--distrib-dir' && next) {
      parsed.distribDir = next;
      index += 1;
      continue;
    }
    if (token === '--diff-output' && next) {
      parsed.diffOutput = next;
      index += 1;
      continue;
    }
    if (!token.startsWith('--')) {
      parsed.positionals.push(token);
    }
  }

  return parsed;
}

function printUsage(): void {
  console.error(
    [
      'Usage:',
      '  tsx src/compat/cli.ts create-snapshot [--snapshot <dir>] [--output <dir>]',
      '  tsx src/compat/cli.ts prepare --snapshot <dir> --destination <dir> [--distrib-dir <dir>]',
      '  tsx src/compat/cli.ts backward [--snapshot <dir>] [--output <dir>]',
      '  tsx src/compat/cli.ts forward [--snapshot <dir>] [--output <dir>]',
      '  tsx src/compat/cli.ts diff <first.sql> <second.sql> [--diff-output <file>]',
    ].join('\n'),
  );
}

function printJson(payload: unknown): void {
  console.log(JSON.stringify(payload, null, 2));
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.command) {
    printUsage();
    return 1;
  }

  const suite = new CompatibilitySuite({ outputRoot: parsed.outputRoot ?? DEFAULT_OUTPUT_ROOT });

  if (parsed.command === 'create-snapshot') {
    printJson(await suite.createSnapshot({ snapshotDir: parsed.snapshotDir }));
    return 0;
  }

  if (parsed.command === 'prepare') {
    if (!parsed.snapshotDir || !parsed.destination) {
      printUsage();
      return 1;
    }
    const ports = await claimPortRange();
    try {
      const workingCopy = await prepareSnapshot({
        snapshotSource: parsed.snapshotDir,
        destination: parsed.destination,
        portAllocator: ports.distributor,
        overrideDistribDir: parsed.distribDir,
      });
      printJson(workingCopy);
      return 0;
    } finally {
      await ports.release();
    }
  }

  if (parsed.command === 'backward' || parsed.command === 'forward') {
    const run = parsed.command === 'backward' ? suite.runBackward.bind(suite) : suite.runForward.bind(suite);
    const report = await run({ snapshotDir: parsed.snapshotDir });
    printJson(report);
    return report.verdict === 'passed' || report.verdict === 'expected-failure' ? 0 : 1;
  }

  if (parsed.command === 'diff') {
    const [first, second] = parsed.positionals;
    if (!first || !second) {
      printUsage();
      return 1;
    }
    const verdict = await new DumpComparator().differs(
      first,
      second,
      parsed.diffOutput ?? path.join(path.dirname(second), `${path.basename(second)}.filediff`),
    );
    printJson(verdict);
    return verdict.differs ? 1 : 0;
  }

  printUsage();
  return 1;
}

async function main(): Promise<void> {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error: unknown) {
    console.error(`[compat] ${describeError(error)}`);
    process.exitCode = 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(path.resolve(process.argv[1])).href) {
  void main();
}
