import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Annotation } from '@mender/core';
import { setLogLevel } from '@mender/core';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
  mkdir: vi.fn(),
  appendFile: vi.fn(),
}));

const { FileLearningStore, similarity } = await import('../stores/file-learning-store.js');
const { readFile, mkdir, appendFile } = await import('node:fs/promises');

const mockedReadFile = vi.mocked(readFile);
const mockedMkdir = vi.mocked(mkdir);
const mockedAppendFile = vi.mocked(appendFile);

setLogLevel('error');

const annotation: Annotation = {
  rootCauseCategory: 'selector_drift',
  fixStrategy: 'update data-testid',
  severity: 'medium',
  humanNotes: 'Button was renamed',
};

function line(id: string, description: string): string {
  return JSON.stringify({ id, description, annotation, storedAt: '2025-06-01T00:00:00.000Z' });
}

describe('similarity', () => {
  it('is 1 for identical token sets regardless of case and punctuation', () => {
    expect(similarity('User Login', 'user-login')).toBe(1);
  });

  it('is the Jaccard ratio of shared tokens', () => {
    // {user, login, flow} vs {login, page}: 1 shared of 4 distinct
    expect(similarity('user login flow', 'login page')).toBe(0.25);
  });

  it('is 0 when either side has no tokens', () => {
    expect(similarity('', 'login')).toBe(0);
  });
});

describe('FileLearningStore', () => {
  let store: InstanceType<typeof FileLearningStore>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockedMkdir.mockResolvedValue(undefined);
    mockedAppendFile.mockResolvedValue(undefined);
    store = new FileLearningStore('/tmp/mender');
  });

  describe('storeAnnotation', () => {
    it('appends one JSON line per annotation', async () => {
      const ok = await store.storeAnnotation('hitl_t-1_1700000000', 'checkout flow', annotation);

      expect(ok).toBe(true);
      expect(mockedMkdir).toHaveBeenCalledWith('/tmp/mender/learning', { recursive: true });
      const [path, body] = mockedAppendFile.mock.calls[0];
      expect(path).toBe('/tmp/mender/learning/annotations.jsonl');
      expect(String(body).endsWith('\n')).toBe(true);
      expect(JSON.parse(String(body))).toMatchObject({
        id: 'hitl_t-1_1700000000',
        description: 'checkout flow',
        annotation,
      });
    });

    it('returns false when the write fails', async () => {
      mockedAppendFile.mockRejectedValueOnce(new Error('EACCES'));
      expect(await store.storeAnnotation('id', 'desc', annotation)).toBe(false);
    });
  });

  describe('searchAnnotations', () => {
    it('ranks by similarity and drops unrelated records', async () => {
      mockedReadFile.mockResolvedValueOnce([
        line('a', 'user login page'),
        line('b', 'billing export csv'),
        line('c', 'login'),
      ].join('\n') + '\n');

      const results = await store.searchAnnotations('login');

      expect(results.map((r) => r.id)).toEqual(['c', 'a']);
    });

    it('honours the limit', async () => {
      mockedReadFile.mockResolvedValueOnce([line('a', 'login one'), line('b', 'login two')].join('\n'));
      const results = await store.searchAnnotations('login', 1);
      expect(results).toHaveLength(1);
    });

    it('skips corrupt lines', async () => {
      mockedReadFile.mockResolvedValueOnce(`not json\n${line('a', 'login')}\n`);
      const results = await store.searchAnnotations('login');
      expect(results.map((r) => r.id)).toEqual(['a']);
    });

    it('skips records with missing or mistyped fields', async () => {
      const noDescription = JSON.stringify({ id: 'x', annotation, storedAt: '2025-06-01T00:00:00.000Z' });
      const badSeverity = JSON.stringify({
        id: 'y',
        description: 'login',
        annotation: { ...annotation, severity: 'urgent' },
        storedAt: '2025-06-01T00:00:00.000Z',
      });
      mockedReadFile.mockResolvedValueOnce([noDescription, badSeverity, line('a', 'login form')].join('\n'));

      const results = await store.searchAnnotations('login');

      expect(results.map((r) => r.id)).toEqual(['a']);
    });

    it('returns nothing when the file does not exist', async () => {
      mockedReadFile.mockRejectedValueOnce(new Error('ENOENT'));
      expect(await store.searchAnnotations('login')).toEqual([]);
    });
  });
});
