import type { Severity } from './models/escalation.js';

/** Attempts beyond this count go straight to human review */
export const MAX_RETRIES = 3;

/** Proposals below this confidence are not applied unattended */
export const CONFIDENCE_THRESHOLD = 0.7;

export const DEFAULT_REGRESSION_TIMEOUT_MS = 120_000;

/** Attempt counters, attempt history and queue records all live for a day */
export const DAY_SECONDS = 86_400;

/** Critical-path tests every fix is checked against */
export const DEFAULT_REGRESSION_SUITE: readonly string[] = [
  'tests/auth.spec.ts',
  'tests/core_nav.spec.ts',
];

export const CRITICAL_FEATURE_KEYWORDS: readonly string[] = [
  'auth',
  'login',
  'payment',
  'checkout',
];

export const SEVERITY_BASE_PRIORITY: Record<Severity, number> = {
  low: 0.1,
  medium: 0.3,
  high: 0.5,
  critical: 0.7,
};

export const HIGH_PRIORITY_THRESHOLD = 0.7;

export const StoreKeys = {
  attempts: (taskId: string) => `mender:attempts:${taskId}`,
  history: (taskId: string) => `mender:history:${taskId}`,
  escalation: (taskId: string) => `hitl:task:${taskId}`,
  escalationIndex: 'hitl:queue',
  resolvedIndex: 'hitl:resolved',
} as const;
