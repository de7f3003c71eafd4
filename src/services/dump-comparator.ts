import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createTwoFilesPatch } from 'diff';
import type { DiffVerdict, DumpComparatorLike, DumpComparison } from '../types/compatibility.js';
import { logThought } from '../utils/logger.js';

const COMMENT_LINE = /^--/;
const DIFF_CONTEXT_LINES = 3;

/** Drop comment lines (`--` prefix) and blank lines; they carry no data. */
export function significantLines(dump: string): string[] {
  return dump
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0 && !COMMENT_LINE.test(line));
}

/**
 * Pure comparison of two dumps. `patch` is a unified diff of the significant
 * lines, headed by the two labels.
 */
export function compareDumpText(
  first: string,
  second: string,
  labels: { first: string; second: string } = { first: 'a', second: 'b' },
): DumpComparison {
  const left = significantLines(first);
  const right = significantLines(second);
  const differs = left.length !== right.length || left.some((line, index) => line !== right[index]);
  const patch = createTwoFilesPatch(
    labels.first,
    labels.second,
    left.length > 0 ? `${left.join('\n')}\n` : '',
    right.length > 0 ? `${right.join('\n')}\n` : '',
    undefined,
    undefined,
    { context: DIFF_CONTEXT_LINES },
  );
  return { differs, patch };
}

export class DumpComparator implements DumpComparatorLike {
  /**
   * Compare two dump files and write the diff to `output`. The artifact is
   * written whether or not the dumps differ.
   */
  async differs(first: string, second: string, output: string): Promise<DiffVerdict> {
    const [firstText, secondText] = await Promise.all([
      readFile(first, 'utf8'),
      readFile(second, 'utf8'),
    ]);
    const comparison = compareDumpText(firstText, secondText, { first, second });

    await mkdir(path.dirname(output), { recursive: true });
    await writeFile(output, comparison.patch, 'utf8');
    await logThought(
      `[DumpComparator] ${path.basename(first)} vs ${path.basename(second)}: ${comparison.differs ? 'DIFFERENT' : 'equal'} (diff at ${output}).`,
    );
    return { differs: comparison.differs, diffPath: output };
  }
}
