import { createTwoFilesPatch } from 'diff';

/**
 * Unified diff between two versions of one file, with `a/<path>` and
 * `b/<path>` headers. Returns '' when the contents are identical.
 */
export function unifiedDiff(path: string, before: string, after: string): string {
  if (before === after) return '';
  const patch = createTwoFilesPatch(`a/${path}`, `b/${path}`, before, after);
  const start = patch.indexOf('--- ');
  return start === -1 ? patch : patch.slice(start);
}
