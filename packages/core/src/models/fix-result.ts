import type { Comparison } from './regression.js';
import type { EscalationItem, EscalationReason, Severity } from './escalation.js';

export type FixOutcome = 'success' | 'escalated' | 'aborted';

export type AbortReason =
  | 'store_unavailable'
  | 'baseline_capture_failed'
  | 'test_read_failed'
  | 'proposal_generation_failed'
  | 'proposal_parse_failed'
  | 'post_fix_regression_failed'
  | 'unexpected_error'
  // Escalation-worthy conditions when escalation is disabled by policy
  | 'max_retries_exceeded'
  | 'regression_detected';

export interface FixArtifacts {
  diffPath: string;
  reportPath: string;
}

export interface EscalationSummary {
  reason: EscalationReason;
  severity: Severity;
  priority: number;
  /** False when the queue rejected the item; the outcome is still `escalated` */
  queued: boolean;
  item: EscalationItem;
}

export interface FixAttemptInput {
  testPath: string;
  errorMessage: string;
  taskId?: string;
  feature?: string;
}

export interface FixResult {
  outcome: FixOutcome;
  taskId: string;
  testPath: string;
  /** Human-readable explanation of the outcome */
  reason: string;
  attempts: number;
  diagnosis?: string;
  confidence?: number;
  comparison?: Comparison;
  artifacts?: FixArtifacts;
  escalation?: EscalationSummary;
  abortReason?: AbortReason;
  fixRolledBack?: boolean;
  /** Generation cost, attributed on every path */
  costUsd: number;
  executionTimeMs: number;
}
