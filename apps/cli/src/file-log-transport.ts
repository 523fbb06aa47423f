import { appendFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { LogEntry, LogTransport } from '@mender/core';

export const MAIN_LOG_FILE = 'mender.log';

const SAFE_TASK_ID = /^[\w.-]+$/;

/**
 * JSONL transport. Every entry goes to `<logsDir>/mender.log`; entries
 * carrying a taskId are also appended to `<logsDir>/<taskId>.log`, which is
 * the file escalations point reviewers at.
 */
export function createFileLogTransport(logsDir: string): LogTransport {
  mkdirSync(logsDir, { recursive: true });
  const mainPath = join(logsDir, MAIN_LOG_FILE);

  return (entry: LogEntry) => {
    const line = `${JSON.stringify(entry)}\n`;
    appendFileSync(mainPath, line);
    if (entry.taskId && SAFE_TASK_ID.test(entry.taskId)) {
      appendFileSync(join(logsDir, `${entry.taskId}.log`), line);
    }
  };
}
