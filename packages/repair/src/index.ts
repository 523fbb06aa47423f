export { AttemptTracker } from './attempt-tracker.js';
export { compareSnapshots } from './regression-comparator.js';
export { computePriority, clampPriority, isCriticalFeature } from './priority.js';
export type { PriorityInput } from './priority.js';
export { EscalationQueue } from './escalation-queue.js';
export type { EscalationQueueOptions } from './escalation-queue.js';
export { parseProposal, DEFAULT_MISSING_CONFIDENCE } from './proposal-parser.js';
export type { ParseOptions, ParseResult } from './proposal-parser.js';
export { ContextGatherer, extractSelector, SELECTOR_PATTERN } from './context-gatherer.js';
export type { ContextGathererOptions } from './context-gatherer.js';
export { unifiedDiff } from './unified-diff.js';
export { ArtifactWriter, artifactStamp } from './artifact-writer.js';
export type { ArtifactInput, RegressionReport } from './artifact-writer.js';
export { FixAttemptController } from './fix-controller.js';
export type { EscalationPolicy, FixControllerDeps, FixControllerOptions } from './fix-controller.js';
