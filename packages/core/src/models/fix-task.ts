export interface FixTask {
  taskId: string;
  /** Path of the failing test file, relative to the project directory */
  testPath: string;
  errorMessage: string;
  feature?: string;
  /** Owned by the attempt tracker; never written elsewhere */
  attemptCount: number;
}

export interface AttemptRecord {
  attempt: number;
  timestamp: string;
  testPath: string;
}
