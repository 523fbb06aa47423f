import type { Comparison } from '../models/regression.js';
import type { Annotation, EscalationItem } from '../models/escalation.js';
import type { AbortReason, FixArtifacts, FixResult } from '../models/fix-result.js';

// Fix attempt events
export interface FixAppliedEvent {
  taskId: string;
  testPath: string;
  diagnosis: string;
  comparison: Comparison;
  artifacts?: FixArtifacts;
}

export interface FixEscalatedEvent {
  taskId: string;
  testPath: string;
  item: EscalationItem;
  fixRolledBack: boolean;
}

export interface FixAbortedEvent {
  taskId: string;
  testPath: string;
  reason: AbortReason;
  message: string;
}

export interface FixCompletedEvent {
  result: FixResult;
}

// Escalation queue events
export interface EscalationAddedEvent {
  item: EscalationItem;
}

export interface EscalationResolvedEvent {
  item: EscalationItem;
  annotation: Annotation;
}

export const Events = {
  FIX_APPLIED: 'fix:applied',
  FIX_ESCALATED: 'fix:escalated',
  FIX_ABORTED: 'fix:aborted',
  FIX_COMPLETED: 'fix:completed',
  ESCALATION_ADDED: 'escalation:added',
  ESCALATION_RESOLVED: 'escalation:resolved',
} as const;

export type EventName = (typeof Events)[keyof typeof Events];
