import type { EscalationItem, FixResult, QueueStats, StoredAnnotation } from '@mender/core';

export function formatFixResult(result: FixResult): string {
  const lines = [
    `Outcome:    ${result.outcome}`,
    `Task:       ${result.taskId}`,
    `Test:       ${result.testPath}`,
    `Attempts:   ${result.attempts}`,
    `Reason:     ${result.reason}`,
  ];
  if (result.diagnosis) lines.push(`Diagnosis:  ${result.diagnosis}`);
  if (result.confidence !== undefined) lines.push(`Confidence: ${result.confidence.toFixed(2)}`);
  if (result.comparison) {
    const c = result.comparison;
    lines.push(
      `Regression: ${c.baselinePassed} passed / ${c.baselineFailed} failed -> ` +
        `${c.afterPassed} passed / ${c.afterFailed} failed (new failures: ${c.newFailures})`,
    );
  }
  if (result.artifacts) {
    lines.push(`Diff:       ${result.artifacts.diffPath}`);
    lines.push(`Report:     ${result.artifacts.reportPath}`);
  }
  if (result.escalation) {
    const e = result.escalation;
    const queued = e.queued ? '' : ' (not queued)';
    lines.push(`Escalated:  ${e.reason}, ${e.severity}, priority ${e.priority.toFixed(2)}${queued}`);
  }
  if (result.abortReason) lines.push(`Aborted:    ${result.abortReason}`);
  if (result.fixRolledBack) lines.push('Rolled back: yes');
  lines.push(`Cost:       $${result.costUsd.toFixed(4)}`);
  lines.push(`Time:       ${result.executionTimeMs}ms`);
  return lines.join('\n');
}

/** One line per item: priority, severity, id, feature, reason */
export function formatQueueItem(item: EscalationItem): string {
  const status = item.resolved ? ' [resolved]' : '';
  return `${item.priority.toFixed(2)}  ${item.severity.padEnd(8)}  ${item.taskId}  ${item.feature}  ${item.escalationReason}${status}`;
}

export function formatQueueStats(stats: QueueStats): string {
  return [
    `Total:         ${stats.totalCount}`,
    `Active:        ${stats.activeCount}`,
    `Resolved:      ${stats.resolvedCount}`,
    `Avg priority:  ${stats.avgPriority.toFixed(2)}`,
    `High priority: ${stats.highPriorityCount}`,
  ].join('\n');
}

export function formatAnnotation(stored: StoredAnnotation): string {
  const a = stored.annotation;
  return `${stored.id}  [${a.severity}] ${a.rootCauseCategory}: ${a.fixStrategy}  (${stored.description})`;
}
