import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logCommand: vi.fn(async () => undefined),
}));

import { CompatibilityGate, decideVerdict } from '../../src/services/compatibility-gate.js';
import {
  CompatibilityError,
  LifecycleError,
  PreconditionError,
  WaiverUnusedError,
} from '../../src/services/compat-errors.js';
import type { BreakageWaiver } from '../../src/types/compatibility.js';

const KEY = 'ALLOW_BACKWARD_COMPATIBILITY_BREAKAGE';

function waiver(active: boolean): BreakageWaiver {
  return { direction: 'backward', envKey: KEY, active };
}

describe('decideVerdict', () => {
  it.each([
    [false, 'passed', 'passed'],
    [false, 'failed', 'failed'],
    [true, 'passed', 'waiver-unused'],
    [true, 'failed', 'expected-failure'],
  ] as const)('waiver=%s outcome=%s -> %s', (active, outcome, verdict) => {
    expect(decideVerdict(waiver(active), outcome)).toBe(verdict);
  });
});

describe('CompatibilityGate', () => {
  const gate = new CompatibilityGate();

  it('passes through a successful validation', async () => {
    const report = await gate.run(async () => 42, waiver(false));

    expect(report.verdict).toBe('passed');
    expect(report.value).toBe(42);
    expect(report.summary).toBe('backward compatibility verified.');
    expect(gate.enforce(report)).toBe(report);
  });

  it('reports a compatibility failure and rethrows it on enforce', async () => {
    const failure = new CompatibilityError('dump from WAL differs');
    const report = await gate.run(async () => {
      throw failure;
    }, waiver(false));

    expect(report.verdict).toBe('failed');
    expect(report.summary).toBe('backward compatibility broken: dump from WAL differs');
    expect(() => gate.enforce(report)).toThrow(failure);
  });

  it('turns an expected compatibility failure into success', async () => {
    const report = await gate.run(async () => {
      throw new CompatibilityError('initial dump differs');
    }, waiver(true));

    expect(report.verdict).toBe('expected-failure');
    expect(report.summary).toBe(`Breaking changes are allowed by ${KEY}: initial dump differs`);
    expect(gate.enforce(report).verdict).toBe('expected-failure');
  });

  it('fails a waived run that did not break', async () => {
    const report = await gate.run(async () => 'ok', waiver(true));

    expect(report.verdict).toBe('waiver-unused');
    expect(() => gate.enforce(report)).toThrow(WaiverUnusedError);
    expect(() => gate.enforce(report)).toThrow(
      `Breaking changes are allowed by ${KEY}, but the run has passed without any breakage. Unset ${KEY}.`,
    );
  });

  it('never waives lifecycle or precondition errors', async () => {
    await expect(
      gate.run(async () => {
        throw new LifecycleError('pageserver did not start');
      }, waiver(true)),
    ).rejects.toBeInstanceOf(LifecycleError);
    await expect(
      gate.run(async () => {
        throw new PreconditionError('no repo directory');
      }, waiver(true)),
    ).rejects.toBeInstanceOf(PreconditionError);
  });
});
