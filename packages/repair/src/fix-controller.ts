import { access, readFile, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import type {
  AbortReason,
  AttemptRecord,
  Comparison,
  EscalationArtifacts,
  EscalationItem,
  EscalationReason,
  FixArtifacts,
  FixAttemptInput,
  FixResult,
  IAttemptTracker,
  IEscalationQueue,
  IEventBus,
  IProposalGenerator,
  IRegressionRunner,
  RegressionSnapshot,
  Severity,
  FixAbortedEvent,
  FixAppliedEvent,
  FixCompletedEvent,
  FixEscalatedEvent,
} from '@mender/core';
import {
  CONFIDENCE_THRESHOLD,
  DEFAULT_REGRESSION_SUITE,
  Events,
  MAX_RETRIES,
  ProposalGenerationError,
  createLogger,
  errorMessage,
} from '@mender/core';
import type { ArtifactWriter } from './artifact-writer.js';
import type { ContextGatherer } from './context-gatherer.js';
import { parseProposal, DEFAULT_MISSING_CONFIDENCE } from './proposal-parser.js';
import { computePriority } from './priority.js';
import { compareSnapshots } from './regression-comparator.js';
import { unifiedDiff } from './unified-diff.js';

const log = createLogger('FixController');

const MAX_ESCALATION_DIFF = 2000;
const MAX_ESCALATION_PROPOSAL = 500;
const MAX_LOGGED_RESPONSE = 1000;

export interface EscalationPolicy {
  enabled: boolean;
}

export interface FixControllerDeps {
  attemptTracker: IAttemptTracker;
  escalationQueue: IEscalationQueue;
  regressionRunner: IRegressionRunner;
  proposalGenerator: IProposalGenerator;
  artifactWriter: ArtifactWriter;
  contextGatherer: ContextGatherer;
  eventBus: IEventBus;
}

export interface FixControllerOptions {
  /** Test paths are resolved against this directory */
  projectDir: string;
  /** When the directory exists, escalations point at `<logsDir>/<taskId>.log` */
  logsDir?: string;
  regressionSuite?: readonly string[];
  maxRetries?: number;
  confidenceThreshold?: number;
  missingConfidenceDefault?: number;
  escalationPolicy?: EscalationPolicy;
  now?: () => Date;
}

/** Mutable bookkeeping for one pass */
interface Pass {
  taskId: string;
  testPath: string;
  absolutePath: string;
  stem: string;
  errorMessage: string;
  feature?: string;
  startedAt: number;
  attempts: number;
  costUsd: number;
  diagnosis?: string;
  confidence?: number;
  /** Exact bytes read before the fix was written */
  original?: Buffer;
  modified: boolean;
}

type Terminal = Partial<Omit<FixResult, 'outcome' | 'reason'>>;

function fileStem(testPath: string): string {
  const name = basename(testPath);
  return basename(name, extname(name));
}

/**
 * Runs one bounded fix pass for a failing test:
 * attempt check, baseline, proposal, confidence gate, apply, post-fix run, compare.
 *
 * Every path ends in a FixResult; nothing thrown inside a pass escapes, and a
 * file modified by the pass is restored byte-for-byte unless the fix succeeded.
 */
export class FixAttemptController {
  private readonly projectDir: string;
  private readonly logsDir?: string;
  private readonly regressionSuite: readonly string[];
  private readonly maxRetries: number;
  private readonly confidenceThreshold: number;
  private readonly missingConfidenceDefault: number;
  private readonly escalationPolicy: EscalationPolicy;
  private readonly now: () => Date;

  constructor(
    private readonly deps: FixControllerDeps,
    options: FixControllerOptions,
  ) {
    this.projectDir = resolve(options.projectDir);
    this.logsDir = options.logsDir;
    this.regressionSuite = options.regressionSuite ?? DEFAULT_REGRESSION_SUITE;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.confidenceThreshold = options.confidenceThreshold ?? CONFIDENCE_THRESHOLD;
    this.missingConfidenceDefault = options.missingConfidenceDefault ?? DEFAULT_MISSING_CONFIDENCE;
    this.escalationPolicy = options.escalationPolicy ?? { enabled: true };
    this.now = options.now ?? (() => new Date());
  }

  async attemptFix(input: FixAttemptInput): Promise<FixResult> {
    const stem = fileStem(input.testPath);
    const pass: Pass = {
      taskId: input.taskId ?? `fix_${Math.floor(this.now().getTime() / 1000)}_${stem}`,
      testPath: input.testPath,
      absolutePath: resolve(this.projectDir, input.testPath),
      stem,
      errorMessage: input.errorMessage,
      feature: input.feature,
      startedAt: Date.now(),
      attempts: 0,
      costUsd: 0,
      modified: false,
    };

    try {
      return await this.runPass(pass);
    } catch (error) {
      log.error(`Unexpected failure: ${errorMessage(error)}`, undefined, pass.taskId);
      const rolledBack = pass.modified ? await this.restore(pass) : false;
      return this.abort(pass, 'unexpected_error', `Unexpected error: ${errorMessage(error)}`, {
        fixRolledBack: rolledBack,
      });
    }
  }

  private async runPass(pass: Pass): Promise<FixResult> {
    const { taskId } = pass;

    // Attempt check
    try {
      pass.attempts = await this.deps.attemptTracker.increment(taskId, pass.testPath);
    } catch (error) {
      return this.abort(pass, 'store_unavailable', `Attempt store unavailable: ${errorMessage(error)}`);
    }
    log.info(`Attempt ${pass.attempts}/${this.maxRetries} for ${pass.testPath}`, undefined, taskId);

    if (pass.attempts > this.maxRetries) {
      const reason = `Exceeded ${this.maxRetries} fix attempts`;
      if (!this.escalationPolicy.enabled) {
        return this.abort(pass, 'max_retries_exceeded', reason);
      }
      return this.escalate(pass, 'max_retries_exceeded', 'medium', reason, {});
    }

    // Baseline
    let baseline: RegressionSnapshot;
    try {
      baseline = await this.runSuite();
    } catch (error) {
      return this.abort(pass, 'baseline_capture_failed', `Baseline capture failed: ${errorMessage(error)}`);
    }
    log.info(`Baseline: ${baseline.passed} passed, ${baseline.failed} failed`, undefined, taskId);

    // Current test content
    let original: Buffer;
    try {
      original = await readFile(pass.absolutePath);
    } catch (error) {
      return this.abort(pass, 'test_read_failed', `Could not read ${pass.testPath}: ${errorMessage(error)}`);
    }
    const testContent = original.toString('utf-8');

    const context = await this.deps.contextGatherer.gather(pass.testPath, pass.errorMessage);

    // Proposal
    let rawText: string;
    try {
      const response = await this.deps.proposalGenerator.propose({
        testPath: pass.testPath,
        testContent,
        errorMessage: pass.errorMessage,
        context,
      });
      pass.costUsd += response.costUsd;
      rawText = response.rawText;
    } catch (error) {
      if (error instanceof ProposalGenerationError) {
        pass.costUsd += error.costUsd;
      }
      return this.abort(pass, 'proposal_generation_failed', `Proposal generation failed: ${errorMessage(error)}`);
    }
    log.debug('Proposal response', { response: rawText.slice(0, MAX_LOGGED_RESPONSE) }, taskId);

    const parsed = parseProposal(rawText, { missingConfidenceDefault: this.missingConfidenceDefault });
    if (!parsed.ok) {
      return this.abort(pass, 'proposal_parse_failed', parsed.error);
    }
    const { proposal } = parsed;
    pass.diagnosis = proposal.diagnosis;
    pass.confidence = proposal.confidence;
    if (!parsed.confidenceFound) {
      log.warn(`No confidence in response, assuming ${proposal.confidence}`, undefined, taskId);
    }

    // Confidence gate
    if (proposal.confidence < this.confidenceThreshold) {
      const reason = `Confidence ${proposal.confidence.toFixed(2)} below threshold ${this.confidenceThreshold}`;
      if (this.escalationPolicy.enabled) {
        return this.escalate(pass, 'low_confidence', 'medium', reason, {
          proposedFix: proposal.fixedContent.slice(0, MAX_ESCALATION_PROPOSAL),
        });
      }
      log.warn(`${reason}; escalation disabled, applying anyway`, undefined, taskId);
    }

    // Apply
    const nextContent = `${proposal.fixedContent}\n`;
    const diff = unifiedDiff(pass.testPath, testContent, nextContent);
    pass.original = original;
    pass.modified = true;
    await writeFile(pass.absolutePath, nextContent, 'utf-8');
    log.info(`Applied fix to ${pass.testPath}`, undefined, taskId);

    // Post-fix regression
    let afterFix: RegressionSnapshot;
    try {
      afterFix = await this.runSuite();
    } catch (error) {
      const rolledBack = await this.restore(pass);
      return this.abort(
        pass,
        'post_fix_regression_failed',
        `Post-fix regression run failed: ${errorMessage(error)}`,
        { fixRolledBack: rolledBack },
      );
    }

    const comparison = compareSnapshots(baseline, afterFix);
    const regressed = comparison.newFailures > 0;
    if (regressed) {
      log.warn(`Fix introduced ${comparison.newFailures} new failure(s), rolling back`, undefined, taskId);
      await this.restoreOrThrow(pass);
    }

    const artifacts = await this.writeArtifacts(pass, {
      diff,
      baseline,
      afterFix,
      comparison,
      fixApplied: !regressed,
    });

    if (regressed) {
      const reason = `Fix introduced ${comparison.newFailures} new failure(s); original restored`;
      if (!this.escalationPolicy.enabled) {
        return this.abort(pass, 'regression_detected', reason, { comparison, artifacts, fixRolledBack: true });
      }
      return this.escalate(
        pass,
        'regression_detected',
        'high',
        reason,
        {
          diff: diff.slice(0, MAX_ESCALATION_DIFF),
          proposedFix: proposal.fixedContent.slice(0, MAX_ESCALATION_PROPOSAL),
          baseline,
          afterFix,
          comparison,
        },
        { comparison, artifacts, fixRolledBack: true },
      );
    }

    pass.modified = false;
    this.deps.eventBus.emit(Events.FIX_APPLIED, {
      taskId,
      testPath: pass.testPath,
      diagnosis: proposal.diagnosis,
      comparison,
      artifacts,
    } satisfies FixAppliedEvent);

    const reason = comparison.improved
      ? `Fix applied; failures down from ${comparison.baselineFailed} to ${comparison.afterFailed}`
      : 'Fix applied with no new regression failures';
    return this.finish(pass, 'success', reason, { comparison, artifacts, fixRolledBack: false });
  }

  private async runSuite(): Promise<RegressionSnapshot> {
    const snapshot = await this.deps.regressionRunner.run(this.regressionSuite);
    if (snapshot.timedOut) {
      throw new Error('Regression run timed out');
    }
    return snapshot;
  }

  /** Put the original bytes back. Returns false when the write failed. */
  private async restore(pass: Pass): Promise<boolean> {
    try {
      await this.restoreOrThrow(pass);
      return true;
    } catch (error) {
      log.error(`Failed to restore ${pass.testPath}: ${errorMessage(error)}`, undefined, pass.taskId);
      return false;
    }
  }

  private async restoreOrThrow(pass: Pass): Promise<void> {
    if (!pass.original) return;
    await writeFile(pass.absolutePath, pass.original);
    pass.modified = false;
    log.info(`Restored original ${pass.testPath}`, undefined, pass.taskId);
  }

  private async writeArtifacts(
    pass: Pass,
    input: {
      diff: string;
      baseline: RegressionSnapshot;
      afterFix: RegressionSnapshot;
      comparison: Comparison;
      fixApplied: boolean;
    },
  ): Promise<FixArtifacts | undefined> {
    try {
      return await this.deps.artifactWriter.write({
        taskId: pass.taskId,
        testPath: pass.testPath,
        diagnosis: pass.diagnosis ?? '',
        ...input,
      });
    } catch (error) {
      log.error(`Failed to write artifacts: ${errorMessage(error)}`, undefined, pass.taskId);
      return undefined;
    }
  }

  private async escalate(
    pass: Pass,
    escalationReason: EscalationReason,
    severity: Severity,
    reason: string,
    itemArtifacts: EscalationArtifacts,
    extra: Terminal = {},
  ): Promise<FixResult> {
    const priority = computePriority({ severity, attempts: pass.attempts });
    const item: EscalationItem = {
      taskId: pass.taskId,
      feature: pass.feature ?? pass.stem,
      codePath: pass.testPath,
      logsPath: await this.findLogsPath(pass.taskId),
      screenshots: await this.deps.artifactWriter.findScreenshots(pass.stem),
      attempts: pass.attempts,
      lastError: pass.errorMessage,
      priority,
      severity,
      escalationReason,
      aiDiagnosis: pass.diagnosis,
      aiConfidence: pass.confidence,
      attemptHistory: await this.attemptHistory(pass),
      artifacts: itemArtifacts,
      createdAt: this.now().toISOString(),
      resolved: false,
    };

    let queued = false;
    try {
      queued = await this.deps.escalationQueue.add(item);
    } catch (error) {
      log.error(`Failed to queue escalation: ${errorMessage(error)}`, undefined, pass.taskId);
    }

    log.warn(`Escalated (${escalationReason}): ${reason}`, { priority, queued }, pass.taskId);
    this.deps.eventBus.emit(Events.FIX_ESCALATED, {
      taskId: pass.taskId,
      testPath: pass.testPath,
      item,
      fixRolledBack: extra.fixRolledBack ?? false,
    } satisfies FixEscalatedEvent);

    return this.finish(pass, 'escalated', reason, {
      ...extra,
      escalation: { reason: escalationReason, severity, priority, queued, item },
    });
  }

  private async attemptHistory(pass: Pass): Promise<AttemptRecord[]> {
    try {
      return await this.deps.attemptTracker.history(pass.taskId);
    } catch (error) {
      log.warn(`Attempt history unavailable: ${errorMessage(error)}`, undefined, pass.taskId);
      return [];
    }
  }

  private async findLogsPath(taskId: string): Promise<string | undefined> {
    if (!this.logsDir) return undefined;
    const dir = resolve(this.projectDir, this.logsDir);
    try {
      await access(dir);
      return join(dir, `${taskId}.log`);
    } catch {
      return undefined;
    }
  }

  private abort(pass: Pass, abortReason: AbortReason, reason: string, extra: Terminal = {}): FixResult {
    log.error(`Aborted (${abortReason}): ${reason}`, undefined, pass.taskId);
    this.deps.eventBus.emit(Events.FIX_ABORTED, {
      taskId: pass.taskId,
      testPath: pass.testPath,
      reason: abortReason,
      message: reason,
    } satisfies FixAbortedEvent);
    return this.finish(pass, 'aborted', reason, { ...extra, abortReason });
  }

  private finish(pass: Pass, outcome: FixResult['outcome'], reason: string, extra: Terminal): FixResult {
    const result: FixResult = {
      outcome,
      taskId: pass.taskId,
      testPath: pass.testPath,
      reason,
      attempts: pass.attempts,
      diagnosis: pass.diagnosis,
      confidence: pass.confidence,
      ...extra,
      costUsd: pass.costUsd,
      executionTimeMs: Date.now() - pass.startedAt,
    };
    this.deps.eventBus.emit(Events.FIX_COMPLETED, { result } satisfies FixCompletedEvent);
    return result;
  }
}
