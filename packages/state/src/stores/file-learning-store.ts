import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Annotation, ILearningStore, StoredAnnotation } from '@mender/core';
import { createLogger } from '@mender/core';

const log = createLogger('FileLearningStore');

const SEVERITIES: ReadonlySet<unknown> = new Set(['low', 'medium', 'high', 'critical']);

function isAnnotation(value: unknown): value is Annotation {
  if (typeof value !== 'object' || value === null) return false;
  return 'rootCauseCategory' in value && typeof value.rootCauseCategory === 'string'
    && 'fixStrategy' in value && typeof value.fixStrategy === 'string'
    && 'humanNotes' in value && typeof value.humanNotes === 'string'
    && 'severity' in value && SEVERITIES.has(value.severity);
}

function isStoredAnnotation(value: unknown): value is StoredAnnotation {
  if (typeof value !== 'object' || value === null) return false;
  return 'id' in value && typeof value.id === 'string'
    && 'description' in value && typeof value.description === 'string'
    && 'storedAt' in value && typeof value.storedAt === 'string'
    && 'annotation' in value && isAnnotation(value.annotation);
}

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[a-z0-9]+/g) ?? []);
}

/** Jaccard overlap of the two token sets, 0 when either is empty */
export function similarity(a: string, b: string): number {
  const ta = tokenize(a);
  const tb = tokenize(b);
  if (ta.size === 0 || tb.size === 0) return 0;
  let shared = 0;
  for (const token of ta) {
    if (tb.has(token)) shared++;
  }
  return shared / (ta.size + tb.size - shared);
}

/**
 * Append-only store of resolved-escalation annotations (annotations.jsonl),
 * searchable by similarity of the originating feature description.
 */
export class FileLearningStore implements ILearningStore {
  private readonly filePath: string;

  constructor(baseDir: string) {
    this.filePath = join(baseDir, 'learning', 'annotations.jsonl');
  }

  async storeAnnotation(id: string, description: string, annotation: Annotation): Promise<boolean> {
    const record: StoredAnnotation = {
      id,
      description,
      annotation,
      storedAt: new Date().toISOString(),
    };
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, `${JSON.stringify(record)}\n`, 'utf-8');
      return true;
    } catch (error) {
      log.error(`Failed to store annotation ${id}: ${String(error)}`);
      return false;
    }
  }

  async searchAnnotations(query: string, limit = 5): Promise<StoredAnnotation[]> {
    const records = await this.readAll();
    return records
      .map((record) => ({ record, score: similarity(query, record.description) }))
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ record }) => record);
  }

  private async readAll(): Promise<StoredAnnotation[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch {
      return [];
    }

    const records: StoredAnnotation[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        log.warn('Skipping corrupt annotation line');
        continue;
      }
      if (isStoredAnnotation(parsed)) {
        records.push(parsed);
      } else {
        log.warn('Skipping annotation line with missing fields');
      }
    }
    return records;
  }
}
