import { readdir, readFile } from 'node:fs/promises';
import { join, relative, resolve, sep } from 'node:path';
import type { ProposalContext } from '@mender/core';
import { createLogger, errorMessage } from '@mender/core';

const log = createLogger('ContextGatherer');

/** Selectors outside this alphabet are never searched for */
export const SELECTOR_PATTERN = /^[a-zA-Z0-9_:-]+$/;

const SELECTOR_IN_ERROR = /data-testid=["']?([^"'\s\])]+)/;
const TEST_FILE = /\.(spec|test)\.[cm]?[jt]sx?$/;
const MAX_SELECTOR_MATCHES = 5;

export interface ContextGathererOptions {
  projectDir: string;
  /** Relative to projectDir */
  testsDir?: string;
}

/** Pull the `data-testid` selector out of an error message, if it names a valid one */
export function extractSelector(errorMessage: string): string | null {
  const match = SELECTOR_IN_ERROR.exec(errorMessage);
  if (!match) return null;
  const selector = match[1];
  return SELECTOR_PATTERN.test(selector) ? selector : null;
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Best-effort hints for the proposal generator: where the failing selector is
 * used across the test tree, and which other test files exist. Never throws.
 */
export class ContextGatherer {
  private readonly projectDir: string;
  private readonly testsDir: string;

  constructor(options: ContextGathererOptions) {
    this.projectDir = resolve(options.projectDir);
    this.testsDir = options.testsDir ?? 'tests';
  }

  async gather(testPath: string, errorText: string): Promise<ProposalContext> {
    try {
      const files = await this.listTestTree();
      const failing = toPosix(testPath);
      const relatedTests = files.filter((file) => TEST_FILE.test(file) && file !== failing);

      const selector = extractSelector(errorText);
      const selectorUsage = selector ? await this.findSelectorUsage(selector, files) : [];

      return { selectorUsage, relatedTests };
    } catch (error) {
      log.warn(`Context gathering failed: ${errorMessage(error)}`);
      return { selectorUsage: [], relatedTests: [] };
    }
  }

  /** Project-relative posix paths of every file under the tests directory */
  private async listTestTree(): Promise<string[]> {
    const files: string[] = [];
    await this.walk(join(this.projectDir, this.testsDir), files);
    return files.sort();
  }

  private async walk(dir: string, files: string[]): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name !== 'node_modules') await this.walk(full, files);
      } else if (entry.isFile()) {
        files.push(toPosix(relative(this.projectDir, full)));
      }
    }
  }

  private async findSelectorUsage(selector: string, files: string[]): Promise<string[]> {
    const needle = `data-testid="${selector}"`;
    const matches: string[] = [];

    for (const file of files) {
      let content: string;
      try {
        content = await readFile(join(this.projectDir, file), 'utf-8');
      } catch (error) {
        log.debug(`Skipping unreadable file ${file}: ${errorMessage(error)}`);
        continue;
      }

      const lines = content.split('\n');
      for (let i = 0; i < lines.length; i++) {
        if (!lines[i].includes(needle)) continue;
        matches.push(`${file}:${i + 1}:${lines[i].trim()}`);
        if (matches.length >= MAX_SELECTOR_MATCHES) return matches;
      }
    }
    return matches;
  }
}
