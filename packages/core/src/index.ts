// Models
export type { FixTask, AttemptRecord } from './models/fix-task.js';
export type { RegressionSnapshot, Comparison, SnapshotCounts } from './models/regression.js';
export type { FixProposal, ProposalContext, ProposalRequest, ProposalResponse } from './models/proposal.js';
export type {
  Severity,
  EscalationReason,
  Annotation,
  EscalationArtifacts,
  EscalationItem,
  NewEscalationItem,
  QueueListOptions,
  QueueStats,
  StoredAnnotation,
} from './models/escalation.js';
export type {
  FixOutcome,
  AbortReason,
  FixArtifacts,
  EscalationSummary,
  FixAttemptInput,
  FixResult,
} from './models/fix-result.js';

// Ports
export type { IKeyValueStore } from './ports/key-value-store.js';
export type { IRegressionRunner } from './ports/regression-runner.js';
export type { IProposalGenerator } from './ports/proposal-generator.js';
export type { ILearningStore } from './ports/learning-store.js';
export type { IAttemptTracker } from './ports/attempt-tracker.js';
export type { IEscalationQueue } from './ports/escalation-queue.js';
export type { IEventBus, EventHandler } from './ports/event-bus.js';

// Events
export { Events } from './events/index.js';
export type {
  EventName,
  FixAppliedEvent,
  FixEscalatedEvent,
  FixAbortedEvent,
  FixCompletedEvent,
  EscalationAddedEvent,
  EscalationResolvedEvent,
} from './events/index.js';

// Errors
export { RegressionTimeoutError, RegressionRunError, ProposalGenerationError, errorMessage } from './errors.js';

// Constants
export {
  MAX_RETRIES,
  CONFIDENCE_THRESHOLD,
  DEFAULT_REGRESSION_TIMEOUT_MS,
  DAY_SECONDS,
  DEFAULT_REGRESSION_SUITE,
  CRITICAL_FEATURE_KEYWORDS,
  SEVERITY_BASE_PRIORITY,
  HIGH_PRIORITY_THRESHOLD,
  StoreKeys,
} from './constants.js';

// Logger
export {
  createLogger,
  addLogTransport,
  setLogLevel,
  consoleTransport,
  formatLogLine,
  redactSecrets,
  isLogLevel,
} from './logger.js';
export type { Logger, LogLevel, LogEntry, LogTransport } from './logger.js';
