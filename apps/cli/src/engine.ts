import { resolve } from 'node:path';
import type { IEventBus, IProposalGenerator, IRegressionRunner } from '@mender/core';
import { Events, createLogger } from '@mender/core';
import { EventBus } from '@mender/eventbus';
import {
  ArtifactWriter,
  AttemptTracker,
  ContextGatherer,
  EscalationQueue,
  FixAttemptController,
} from '@mender/repair';
import { ClaudeProposalGenerator, PlaywrightRegressionRunner } from '@mender/runtime';
import { FileKeyValueStore, FileLearningStore } from '@mender/state';
import type { MenderConfig } from './config.js';

const log = createLogger('Engine');

/** Replacements for the process-spawning adapters */
export interface EngineOverrides {
  regressionRunner?: IRegressionRunner;
  proposalGenerator?: IProposalGenerator;
  now?: () => Date;
}

/**
 * Wires the stores, queue, adapters and controller for one CLI invocation.
 * Call shutdown() before exit so queued writes reach disk.
 */
export class Engine {
  readonly eventBus: IEventBus;
  readonly store: FileKeyValueStore;
  readonly learningStore: FileLearningStore;
  readonly attemptTracker: AttemptTracker;
  readonly escalationQueue: EscalationQueue;
  readonly controller: FixAttemptController;

  constructor(readonly config: MenderConfig, overrides: EngineOverrides = {}) {
    const projectDir = config.projectDir;
    const stateDir = resolve(projectDir, config.stateDir);
    const now = overrides.now;

    this.eventBus = new EventBus();
    this.store = new FileKeyValueStore(stateDir, now ? { now: () => now().getTime() } : {});
    this.learningStore = new FileLearningStore(stateDir);
    this.attemptTracker = new AttemptTracker(this.store);
    this.escalationQueue = new EscalationQueue(this.store, this.learningStore, this.eventBus, now ? { now } : {});

    const regressionRunner = overrides.regressionRunner ?? new PlaywrightRegressionRunner({
      projectDir,
      timeoutMs: config.regressionTimeoutMs,
    });
    const proposalGenerator = overrides.proposalGenerator ?? new ClaudeProposalGenerator({
      cwd: projectDir,
      model: config.proposal.model || undefined,
      timeoutMs: config.proposal.timeoutMs || undefined,
      appContextPath: config.proposal.appContextPath
        ? resolve(projectDir, config.proposal.appContextPath)
        : undefined,
    });

    this.controller = new FixAttemptController(
      {
        attemptTracker: this.attemptTracker,
        escalationQueue: this.escalationQueue,
        regressionRunner,
        proposalGenerator,
        artifactWriter: new ArtifactWriter(resolve(projectDir, config.artifactsDir), now),
        contextGatherer: new ContextGatherer({ projectDir, testsDir: config.testsDir }),
        eventBus: this.eventBus,
      },
      {
        projectDir,
        logsDir: config.logsDir,
        regressionSuite: config.regressionSuite,
        maxRetries: config.maxRetries,
        confidenceThreshold: config.confidenceThreshold,
        missingConfidenceDefault: config.missingConfidenceDefault,
        escalationPolicy: config.escalation,
        now,
      },
    );

    this.eventBus.on(Events.ESCALATION_ADDED, (payload) => {
      log.debug('Escalation queued', payload);
    });
  }

  async shutdown(): Promise<void> {
    await this.escalationQueue.drain();
    await this.store.flush();
    this.eventBus.removeAllListeners();
  }
}
