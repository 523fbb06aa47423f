import type { AttemptRecord } from './fix-task.js';
import type { Comparison, RegressionSnapshot } from './regression.js';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export type EscalationReason =
  | 'max_retries_exceeded'
  | 'low_confidence'
  | 'regression_detected';

export interface Annotation {
  rootCauseCategory: string;
  fixStrategy: string;
  severity: Severity;
  humanNotes: string;
  patchDiff?: string;
}

export interface EscalationArtifacts {
  diff?: string;
  proposedFix?: string;
  baseline?: RegressionSnapshot;
  afterFix?: RegressionSnapshot;
  comparison?: Comparison;
}

export interface EscalationItem {
  taskId: string;
  feature: string;
  codePath: string;
  logsPath?: string;
  screenshots: string[];
  attempts: number;
  lastError: string;
  /** Always within [0, 1] once stored */
  priority: number;
  severity: Severity;
  escalationReason: EscalationReason;
  aiDiagnosis?: string;
  aiConfidence?: number;
  attemptHistory: AttemptRecord[];
  artifacts: EscalationArtifacts;
  createdAt: string;
  resolved: boolean;
  resolvedAt?: string;
  annotation?: Annotation;
  // Annotation fields are merged onto the item when it is resolved
  rootCauseCategory?: string;
  fixStrategy?: string;
  humanNotes?: string;
  patchDiff?: string;
}

/** What callers hand to the queue; the queue fills in the rest. */
export type NewEscalationItem =
  Omit<EscalationItem, 'priority' | 'createdAt' | 'resolved' | 'screenshots' | 'attemptHistory' | 'artifacts'> & {
    priority?: number;
    createdAt?: string;
    resolved?: boolean;
    screenshots?: string[];
    attemptHistory?: AttemptRecord[];
    artifacts?: EscalationArtifacts;
  };

export interface QueueListOptions {
  includeResolved?: boolean;
  limit?: number;
}

export interface QueueStats {
  totalCount: number;
  activeCount: number;
  resolvedCount: number;
  avgPriority: number;
  highPriorityCount: number;
}

export interface StoredAnnotation {
  id: string;
  description: string;
  annotation: Annotation;
  storedAt: string;
}
