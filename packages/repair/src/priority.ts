import type { Severity } from '@mender/core';
import { CRITICAL_FEATURE_KEYWORDS, SEVERITY_BASE_PRIORITY } from '@mender/core';

export interface PriorityInput {
  /** When present, severity drives the score; otherwise feature and age do */
  severity?: Severity;
  attempts: number;
  feature?: string;
  /** ISO timestamp the item entered the queue */
  createdAt?: string;
  now?: Date;
}

/** Clamp into [0, 1]; NaN becomes 0 */
export function clampPriority(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function isCriticalFeature(feature: string | undefined): boolean {
  if (!feature) return false;
  const lowered = feature.toLowerCase();
  return CRITICAL_FEATURE_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

function hoursSince(createdAt: string | undefined, now: Date): number {
  if (!createdAt) return 0;
  const created = Date.parse(createdAt);
  if (Number.isNaN(created)) return 0;
  return Math.max(0, (now.getTime() - created) / 3_600_000);
}

/**
 * Urgency of an escalation item, in [0, 1].
 *
 * With a severity (items raised by the fix controller):
 *   base(severity) + min(attempts / 10, 0.3)
 * Without one (items added to the queue directly):
 *   min(attempts / 10, 0.4) + 0.3 for critical-path features + min(hours queued / 24, 0.3)
 */
export function computePriority(input: PriorityInput): number {
  const attempts = Math.max(0, input.attempts);

  if (input.severity) {
    return clampPriority(SEVERITY_BASE_PRIORITY[input.severity] + Math.min(attempts / 10, 0.3));
  }

  let score = Math.min(attempts / 10, 0.4);
  if (isCriticalFeature(input.feature)) score += 0.3;
  score += Math.min(hoursSince(input.createdAt, input.now ?? new Date()) / 24, 0.3);
  return clampPriority(score);
}
