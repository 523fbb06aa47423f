import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Comparison, FixArtifacts, RegressionSnapshot, SnapshotCounts } from '@mender/core';
import { createLogger } from '@mender/core';

const log = createLogger('ArtifactWriter');

const MAX_SCREENSHOTS = 5;
const MAX_NAME_ATTEMPTS = 100;

export interface RegressionReport {
  timestamp: string;
  testPath: string;
  diagnosis: string;
  baseline: SnapshotCounts;
  afterFix: SnapshotCounts;
  comparison: Comparison;
  fixApplied: boolean;
  invariantHonored: boolean;
}

export interface ArtifactInput {
  taskId: string;
  testPath: string;
  diagnosis: string;
  diff: string;
  baseline: RegressionSnapshot;
  afterFix: RegressionSnapshot;
  comparison: Comparison;
  /** False when the fix was rolled back */
  fixApplied: boolean;
}

/** `YYYYMMDD_HHMMSS` in UTC */
export function artifactStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function fileSafe(taskId: string): string {
  return taskId.replace(/[^\w.-]/g, '_');
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function counts(snapshot: RegressionSnapshot): SnapshotCounts {
  return { passed: snapshot.passed, failed: snapshot.failed, total: snapshot.total };
}

/** Diff and regression report for every compared pass, plus screenshot lookup for escalations. */
export class ArtifactWriter {
  constructor(
    private readonly artifactsDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Files are named `fix_<stamp>_<taskId>.diff` and
   * `regression_report_<stamp>_<taskId>.json` and never replace an existing
   * file; a name already taken gets a `-2`, `-3`... suffix.
   */
  async write(input: ArtifactInput): Promise<FixArtifacts> {
    const date = this.now();
    const base = `${artifactStamp(date)}_${fileSafe(input.taskId)}`;
    await mkdir(this.artifactsDir, { recursive: true });

    const report: RegressionReport = {
      timestamp: date.toISOString(),
      testPath: input.testPath,
      diagnosis: input.diagnosis,
      baseline: counts(input.baseline),
      afterFix: counts(input.afterFix),
      comparison: input.comparison,
      fixApplied: input.fixApplied,
      invariantHonored: input.comparison.newFailures === 0,
    };

    for (let attempt = 1; ; attempt++) {
      const name = attempt === 1 ? base : `${base}-${attempt}`;
      const diffPath = join(this.artifactsDir, `fix_${name}.diff`);
      try {
        await writeFile(diffPath, input.diff, { encoding: 'utf-8', flag: 'wx' });
      } catch (error) {
        if (isAlreadyExists(error) && attempt < MAX_NAME_ATTEMPTS) continue;
        throw error;
      }

      const reportPath = join(this.artifactsDir, `regression_report_${name}.json`);
      await writeFile(reportPath, JSON.stringify(report, null, 2), { encoding: 'utf-8', flag: 'wx' });

      log.debug(`Wrote ${diffPath} and ${reportPath}`, undefined, input.taskId);
      return { diffPath, reportPath };
    }
  }

  /** Up to five `.png` files whose name contains the test file stem; [] when none or unreadable */
  async findScreenshots(stem: string): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.artifactsDir);
    } catch (error) {
      log.debug(`No screenshots: ${String(error)}`);
      return [];
    }
    return names
      .filter((name) => name.endsWith('.png') && name.includes(stem))
      .sort()
      .slice(0, MAX_SCREENSHOTS)
      .map((name) => join(this.artifactsDir, name));
  }
}
