/** Pass/fail snapshot of one regression suite run. Never mutated after creation. */
export interface RegressionSnapshot {
  readonly passed: number;
  readonly failed: number;
  readonly total: number;
  readonly errors: readonly string[];
  readonly rawOutput: string;
  readonly timedOut: boolean;
}

export interface Comparison {
  newFailures: number;
  improved: boolean;
  baselinePassed: number;
  baselineFailed: number;
  afterPassed: number;
  afterFailed: number;
}

export interface SnapshotCounts {
  passed: number;
  failed: number;
  total: number;
}
