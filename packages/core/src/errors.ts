/** Raised by regression runners when a suite exceeds its time budget. */
export class RegressionTimeoutError extends Error {
  readonly name = 'RegressionTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Regression tests timed out after ${Math.round(timeoutMs / 1000)}s`);
  }
}

/** Raised when the runner could not be started or produced no usable output. */
export class RegressionRunError extends Error {
  readonly name = 'RegressionRunError';

  constructor(message: string, readonly output = '') {
    super(message);
  }
}

/** Raised by proposal generators. Carries any cost already incurred. */
export class ProposalGenerationError extends Error {
  readonly name = 'ProposalGenerationError';

  constructor(message: string, readonly costUsd = 0) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
