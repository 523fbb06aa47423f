import { spawn } from 'node:child_process';
import type { IRegressionRunner, RegressionSnapshot } from '@mender/core';
import {
  DEFAULT_REGRESSION_TIMEOUT_MS,
  RegressionRunError,
  RegressionTimeoutError,
  createLogger,
} from '@mender/core';
import treeKill from 'tree-kill';
import { buildCleanEnv, stripAnsi } from './utils.js';

const log = createLogger('PlaywrightRunner');

const MAX_RAW_OUTPUT = 2000;
const MAX_OUTPUT = 10 * 1024 * 1024;

export interface PlaywrightRunnerOptions {
  /** Working directory of the test run */
  projectDir: string;
  timeoutMs?: number;
  /** Defaults to `npx playwright test` */
  command?: string;
  args?: string[];
  env?: Record<string, string>;
}

/** Counts come from the reporter summary (`N passed`, `N failed`); `Error:` lines are kept only when something failed. */
export function parsePlaywrightOutput(output: string): RegressionSnapshot {
  const passed = Number(/(\d+)\s+passed/.exec(output)?.[1] ?? 0);
  const failed = Number(/(\d+)\s+failed/.exec(output)?.[1] ?? 0);

  const errors: string[] = [];
  if (failed > 0) {
    for (const match of output.matchAll(/Error:\s*(.+)/g)) {
      errors.push(match[1].trim());
    }
  }

  return {
    passed,
    failed,
    total: passed + failed,
    errors,
    rawOutput: output.slice(0, MAX_RAW_OUTPUT),
    timedOut: false,
  };
}

/**
 * Runs the regression suite through the Playwright CLI.
 * A non-zero exit with a parsed summary is a normal result (tests failed);
 * a run with no summary, a spawn error or a timeout is a rejection.
 */
export class PlaywrightRegressionRunner implements IRegressionRunner {
  private readonly timeoutMs: number;
  private readonly command: string;
  private readonly args: string[];

  constructor(private readonly options: PlaywrightRunnerOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REGRESSION_TIMEOUT_MS;
    this.command = options.command ?? 'npx';
    this.args = options.args ?? ['playwright', 'test'];
  }

  run(suite: readonly string[]): Promise<RegressionSnapshot> {
    const args = [...this.args, ...suite];
    log.info(`Running: ${this.command} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.command, args, {
        cwd: this.options.projectDir,
        env: buildCleanEnv({ CI: '1', FORCE_COLOR: '0', ...this.options.env }),
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        log.warn(`Regression run exceeded ${this.timeoutMs}ms, killing process tree`);
        if (child.pid) {
          treeKill(child.pid, 'SIGKILL', (err) => {
            if (err) log.warn(`tree-kill failed for PID ${child.pid}: ${err.message}`);
          });
        }
        reject(new RegressionTimeoutError(this.timeoutMs));
      }, this.timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => {
        if (stdout.length < MAX_OUTPUT) stdout += chunk.toString();
      });
      child.stderr.on('data', (chunk: Buffer) => {
        if (stderr.length < MAX_OUTPUT) stderr += chunk.toString();
      });

      child.on('error', (err) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(new RegressionRunError(`Failed to run regression tests: ${err.message}`));
      });

      child.on('close', (code) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;

        const snapshot = parsePlaywrightOutput(stripAnsi(stdout));
        if (code !== 0 && snapshot.total === 0) {
          const detail = stripAnsi(stderr).trim().slice(0, 500) || `exit code ${code}`;
          reject(new RegressionRunError(`Regression run produced no results: ${detail}`, snapshot.rawOutput));
          return;
        }

        log.info(`Regression run finished: ${snapshot.passed} passed, ${snapshot.failed} failed`);
        resolve(snapshot);
      });
    });
  }
}
