export type CompatErrorCategory =
  | 'configuration'
  | 'precondition'
  | 'sanitization'
  | 'lifecycle'
  | 'compatibility'
  | 'waiver-misuse';

export abstract class CompatError extends Error {
  abstract readonly category: CompatErrorCategory;

  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/** A required environment value is missing or malformed. */
export class ConfigurationError extends CompatError {
  readonly category = 'configuration';

  constructor(message: string, public remediation: string) {
    super(`${message} ${remediation}`.trim());
  }
}

/** The snapshot handed to the harness is incomplete or malformed. */
export class PreconditionError extends CompatError {
  readonly category = 'precondition';
}

export class SanitizationError extends CompatError {
  readonly category = 'sanitization';

  constructor(public needle: string, public offendingFiles: string[]) {
    super(
      `Files still reference '${needle}' after sanitization:\n${offendingFiles.join('\n')}`,
    );
  }
}

export class LifecycleError extends CompatError {
  readonly category = 'lifecycle';

  constructor(message: string, public logs: string = '', cause?: unknown) {
    super(logs ? `${message}\n--- captured logs ---\n${logs}` : message, cause);
  }
}

/** Raised when the driver is asked to start a cluster that is already live. */
export class ClusterUsageError extends LifecycleError {}

export class CompatibilityError extends CompatError {
  readonly category = 'compatibility';

  constructor(message: string, public artifacts: string[] = [], cause?: unknown) {
    super(artifacts.length > 0 ? `${message} (artifacts: ${artifacts.join(', ')})` : message, cause);
  }
}

export class WaiverUnusedError extends CompatError {
  readonly category = 'waiver-misuse';

  constructor(public envKey: string) {
    super(
      `Breaking changes are allowed by ${envKey}, but the run has passed without any breakage. Unset ${envKey}.`,
    );
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isWaivableFailure(error: unknown): error is CompatibilityError {
  return error instanceof CompatibilityError;
}
