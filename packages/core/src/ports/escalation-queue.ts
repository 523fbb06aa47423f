import type {
  Annotation,
  EscalationItem,
  NewEscalationItem,
  QueueListOptions,
  QueueStats,
} from '../models/escalation.js';

/** Human-review queue. The review dashboard consumes list/get/resolve/stats. */
export interface IEscalationQueue {
  add(item: NewEscalationItem): Promise<boolean>;
  list(options?: QueueListOptions): Promise<EscalationItem[]>;
  get(taskId: string): Promise<EscalationItem | null>;
  resolve(taskId: string, annotation: Annotation): Promise<boolean>;
  stats(): Promise<QueueStats>;
}
