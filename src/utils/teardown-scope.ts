import { logThought } from './logger.js';

type TeardownStep = {
  label: string;
  release: () => Promise<void>;
};

export interface TeardownFailure {
  label: string;
  message: string;
}

/**
 * Releases acquired resources in reverse order of acquisition. A failing
 * release does not stop the remaining ones.
 */
export class TeardownScope {
  readonly #steps: TeardownStep[] = [];
  #closed = false;

  defer(label: string, release: () => Promise<void>): void {
    if (this.#closed) {
      throw new Error(`Cannot register teardown '${label}' on a closed scope.`);
    }
    this.#steps.push({ label, release });
  }

  async close(): Promise<TeardownFailure[]> {
    this.#closed = true;
    const failures: TeardownFailure[] = [];
    while (this.#steps.length > 0) {
      const step = this.#steps.pop();
      if (!step) {
        break;
      }
      try {
        await step.release();
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ label: step.label, message });
        await logThought(`[Teardown] '${step.label}' failed: ${message}`);
      }
    }
    return failures;
  }
}

/**
 * Run `body` with a fresh scope and always close it. When the body succeeds
 * but a release fails, the failures are raised through `onReleaseFailure`.
 * When the body throws, its error wins and release failures are only logged.
 */
export async function withTeardown<T>(
  body: (scope: TeardownScope) => Promise<T>,
  onReleaseFailure: (failures: TeardownFailure[]) => Error,
): Promise<T> {
  const scope = new TeardownScope();
  let result: T;
  try {
    result = await body(scope);
  } catch (error: unknown) {
    await scope.close();
    throw error;
  }
  const failures = await scope.close();
  if (failures.length > 0) {
    throw onReleaseFailure(failures);
  }
  return result;
}
