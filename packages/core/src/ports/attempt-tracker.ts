import type { AttemptRecord } from '../models/fix-task.js';

export interface IAttemptTracker {
  /** Returns the 1-indexed attempt number for this call */
  increment(taskId: string, testPath: string): Promise<number>;
  get(taskId: string): Promise<number>;
  history(taskId: string): Promise<AttemptRecord[]>;
}
