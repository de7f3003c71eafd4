import type {
  BreakageWaiver,
  GateReport,
  GateVerdict,
  ValidationOutcome,
} from '../types/compatibility.js';
import { logThought } from '../utils/logger.js';
import { WaiverUnusedError, describeError, isWaivableFailure } from './compat-errors.js';

type WaiverState = 'active' | 'inactive';

// ─── Decision Table ───────────────────────────────────────────────────────────

export const GATE_DECISIONS: Record<WaiverState, Record<ValidationOutcome, GateVerdict>> = {
  inactive: { passed: 'passed', failed: 'failed' },
  active: { passed: 'waiver-unused', failed: 'expected-failure' },
};

export function decideVerdict(waiver: BreakageWaiver, outcome: ValidationOutcome): GateVerdict {
  return GATE_DECISIONS[waiver.active ? 'active' : 'inactive'][outcome];
}

function buildSummary(verdict: GateVerdict, waiver: BreakageWaiver, error: unknown): string {
  switch (verdict) {
    case 'passed':
      return `${waiver.direction} compatibility verified.`;
    case 'failed':
      return `${waiver.direction} compatibility broken: ${describeError(error)}`;
    case 'expected-failure':
      return `Breaking changes are allowed by ${waiver.envKey}: ${describeError(error)}`;
    case 'waiver-unused':
      return `Breaking changes are allowed by ${waiver.envKey}, but the run has passed without any breakage.`;
  }
}

// ─── Gate ─────────────────────────────────────────────────────────────────────

/**
 * Applies a breakage waiver to one validation run.
 *
 * Only compatibility failures feed the decision table. Precondition,
 * sanitization and lifecycle errors escape `run` untouched, whatever the
 * waiver says.
 */
export class CompatibilityGate {
  async run<T>(validation: () => Promise<T>, waiver: BreakageWaiver): Promise<GateReport<T>> {
    let outcome: ValidationOutcome;
    let value: T | undefined;
    let failure: unknown;

    try {
      value = await validation();
      outcome = 'passed';
    } catch (error: unknown) {
      if (!isWaivableFailure(error)) {
        throw error;
      }
      outcome = 'failed';
      failure = error;
    }

    const verdict = decideVerdict(waiver, outcome);
    const report: GateReport<T> = {
      verdict,
      outcome,
      waiver,
      value,
      error: failure,
      summary: buildSummary(verdict, waiver, failure),
    };
    await logThought(`[CompatibilityGate] ${waiver.direction}: ${verdict}. ${report.summary}`);
    return report;
  }

  /**
   * Turn a report into control flow: `failed` rethrows the validation error,
   * `waiver-unused` throws `WaiverUnusedError`.
   */
  enforce<T>(report: GateReport<T>): GateReport<T> {
    if (report.verdict === 'failed') {
      throw report.error;
    }
    if (report.verdict === 'waiver-unused') {
      throw new WaiverUnusedError(report.waiver.envKey);
    }
    return report;
  }
}
