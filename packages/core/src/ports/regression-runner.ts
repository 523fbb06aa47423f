import type { RegressionSnapshot } from '../models/regression.js';

/**
 * Runs a fixed list of test files and reports counts.
 * Rejects with RegressionTimeoutError when the run exceeds its time budget.
 */
export interface IRegressionRunner {
  run(suite: readonly string[]): Promise<RegressionSnapshot>;
}
