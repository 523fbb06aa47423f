import type { Comparison, SnapshotCounts } from '@mender/core';

/**
 * Compare two regression runs by failure count.
 *
 * Only counts are compared: a run where a different test fails, but the same
 * number fail, reports zero new failures.
 */
export function compareSnapshots(baseline: SnapshotCounts, after: SnapshotCounts): Comparison {
  return {
    newFailures: Math.max(0, after.failed - baseline.failed),
    improved: after.failed < baseline.failed,
    baselinePassed: baseline.passed,
    baselineFailed: baseline.failed,
    afterPassed: after.passed,
    afterFailed: after.failed,
  };
}
