import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type {
  Annotation,
  IAttemptTracker,
  IEscalationQueue,
  ILearningStore,
  IProposalGenerator,
  IRegressionRunner,
  ProposalRequest,
  ProposalResponse,
  RegressionSnapshot,
} from '@mender/core';
import {
  Events,
  ProposalGenerationError,
  RegressionTimeoutError,
  setLogLevel,
} from '@mender/core';
import { EventBus } from '@mender/eventbus';
import { MemoryKeyValueStore } from '@mender/state';
import { ArtifactWriter } from '../artifact-writer.js';
import { AttemptTracker } from '../attempt-tracker.js';
import { ContextGatherer } from '../context-gatherer.js';
import { EscalationQueue } from '../escalation-queue.js';
import { FixAttemptController } from '../fix-controller.js';
import type { FixControllerOptions } from '../fix-controller.js';

setLogLevel('error');

const TEST_PATH = 'tests/login.spec.ts';
const FIXED = "test('login', async ({ page }) => {\n  await page.getByTestId('login-submit').click();\n});";
// BOM, CRLF line endings and no trailing newline: restore must reproduce these exactly
const ORIGINAL = Buffer.concat([
  Buffer.from([0xef, 0xbb, 0xbf]),
  Buffer.from("test('login', async ({ page }) => {\r\n  await page.click('[data-testid=\"submit\"]');\r\n});"),
]);
const NOW = new Date('2025-06-01T12:00:00Z');

function snapshot(passed: number, failed: number): RegressionSnapshot {
  return { passed, failed, total: passed + failed, errors: [], rawOutput: '', timedOut: false };
}

function reply(confidence: string | null, code = FIXED): string {
  return [
    'DIAGNOSIS: The submit button test id was renamed to login-submit.',
    '',
    ...(confidence === null ? [] : [`CONFIDENCE: ${confidence}`, '']),
    'FIX:',
    '```typescript',
    code,
    '```',
  ].join('\n');
}

class FakeRunner implements IRegressionRunner {
  calls = 0;
  suites: Array<readonly string[]> = [];
  /** File content observed during each run */
  seen: string[] = [];

  constructor(
    private readonly results: Array<RegressionSnapshot | Error>,
    private readonly watchPath: string,
  ) {}

  async run(suite: readonly string[]): Promise<RegressionSnapshot> {
    this.suites.push(suite);
    this.seen.push(readFileSync(this.watchPath, 'utf-8'));
    const next = this.results[this.calls++];
    if (next === undefined) throw new Error('unexpected regression run');
    if (next instanceof Error) throw next;
    return next;
  }
}

class FakeGenerator implements IProposalGenerator {
  requests: ProposalRequest[] = [];

  constructor(private readonly response: ProposalResponse | Error) {}

  async propose(request: ProposalRequest): Promise<ProposalResponse> {
    this.requests.push(request);
    if (this.response instanceof Error) throw this.response;
    return this.response;
  }
}

describe('FixAttemptController', () => {
  let root: string;
  let testFile: string;
  let store: MemoryKeyValueStore;
  let tracker: AttemptTracker;
  let bus: EventBus;
  let learning: ILearningStore & { storeAnnotation: ReturnType<typeof vi.fn> };
  let queue: EscalationQueue;
  let emitted: Array<{ event: string; payload: unknown }>;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'mender-fix-'));
    mkdirSync(join(root, 'tests'), { recursive: true });
    testFile = join(root, TEST_PATH);
    writeFileSync(testFile, ORIGINAL);

    store = new MemoryKeyValueStore();
    tracker = new AttemptTracker(store);
    bus = new EventBus();
    learning = {
      storeAnnotation: vi.fn().mockResolvedValue(true),
      searchAnnotations: vi.fn().mockResolvedValue([]),
    };
    queue = new EscalationQueue(store, learning, bus);

    emitted = [];
    for (const event of Object.values(Events)) {
      bus.on(event, (payload) => emitted.push({ event, payload }));
    }
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function build(
    runs: Array<RegressionSnapshot | Error>,
    response: ProposalResponse | Error,
    overrides: {
      options?: Partial<FixControllerOptions>;
      attemptTracker?: IAttemptTracker;
      escalationQueue?: IEscalationQueue;
    } = {},
  ) {
    const runner = new FakeRunner(runs, testFile);
    const generator = new FakeGenerator(response);
    const controller = new FixAttemptController(
      {
        attemptTracker: overrides.attemptTracker ?? tracker,
        escalationQueue: overrides.escalationQueue ?? queue,
        regressionRunner: runner,
        proposalGenerator: generator,
        artifactWriter: new ArtifactWriter(join(root, 'artifacts'), () => NOW),
        contextGatherer: new ContextGatherer({ projectDir: root }),
        eventBus: bus,
      },
      { projectDir: root, now: () => NOW, ...overrides.options },
    );
    return { controller, runner, generator };
  }

  function eventNames(): string[] {
    return emitted.map(({ event }) => event);
  }

  describe('successful fix', () => {
    it('applies a confident fix that keeps the suite green', async () => {
      const { controller, runner, generator } = build(
        [snapshot(2, 0), snapshot(2, 0)],
        { rawText: reply('0.85'), costUsd: 0.02 },
      );

      const result = await controller.attemptFix({
        testPath: TEST_PATH,
        errorMessage: 'locator [data-testid="submit"] not found',
        taskId: 'task-a',
      });

      expect(result).toMatchObject({
        outcome: 'success',
        taskId: 'task-a',
        attempts: 1,
        confidence: 0.85,
        diagnosis: 'The submit button test id was renamed to login-submit.',
        comparison: { newFailures: 0, improved: false },
        fixRolledBack: false,
        costUsd: 0.02,
      });
      expect(result.executionTimeMs).toBeGreaterThanOrEqual(0);
      expect(readFileSync(testFile, 'utf-8')).toBe(`${FIXED}\n`);
      expect(runner.calls).toBe(2);
      expect(runner.seen[1]).toBe(`${FIXED}\n`);
      expect(runner.suites[0]).toEqual(['tests/auth.spec.ts', 'tests/core_nav.spec.ts']);

      expect(generator.requests[0].testContent).toBe(ORIGINAL.toString('utf-8'));
      expect(generator.requests[0].context.selectorUsage).toEqual([
        `${TEST_PATH}:2:await page.click('[data-testid="submit"]');`,
      ]);

      expect(result.artifacts).toEqual({
        diffPath: join(root, 'artifacts', 'fix_20250601_120000_task-a.diff'),
        reportPath: join(root, 'artifacts', 'regression_report_20250601_120000_task-a.json'),
      });
      const diff = readFileSync(join(root, 'artifacts', 'fix_20250601_120000_task-a.diff'), 'utf-8');
      expect(diff.startsWith(`--- a/${TEST_PATH}\n+++ b/${TEST_PATH}\n`)).toBe(true);

      expect(eventNames()).toEqual([Events.FIX_APPLIED, Events.FIX_COMPLETED]);
    });

    it('reports an improvement when failures drop', async () => {
      const { controller } = build([snapshot(1, 1), snapshot(2, 0)], { rawText: reply('0.9'), costUsd: 0 });
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result.outcome).toBe('success');
      expect(result.comparison?.improved).toBe(true);
      expect(result.reason).toBe('Fix applied; failures down from 1 to 0');
    });

    it('derives a task id from the clock and the file stem', async () => {
      const { controller } = build([snapshot(2, 0), snapshot(2, 0)], { rawText: reply('0.9'), costUsd: 0 });
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom' });
      expect(result.taskId).toBe('fix_1748779200_login.spec');
    });
  });

  describe('low confidence', () => {
    it('escalates without touching the file', async () => {
      const { controller, runner } = build([snapshot(2, 0)], { rawText: reply('0.35'), costUsd: 0.01 });

      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 'task-b' });

      expect(result.outcome).toBe('escalated');
      expect(result.escalation).toMatchObject({
        reason: 'low_confidence',
        severity: 'medium',
        queued: true,
      });
      expect(result.escalation?.priority).toBeCloseTo(0.4);
      expect(result.costUsd).toBe(0.01);
      expect(readFileSync(testFile).equals(ORIGINAL)).toBe(true);
      expect(runner.calls).toBe(1);

      const item = await queue.get('task-b');
      expect(item).toMatchObject({
        escalationReason: 'low_confidence',
        aiConfidence: 0.35,
        aiDiagnosis: 'The submit button test id was renamed to login-submit.',
        codePath: TEST_PATH,
        feature: 'login.spec',
        lastError: 'boom',
        artifacts: { proposedFix: FIXED },
      });
      expect(item?.attemptHistory.map((record) => record.attempt)).toEqual([1]);
    });

    it('treats a missing confidence as low', async () => {
      const { controller } = build([snapshot(2, 0)], { rawText: reply(null), costUsd: 0 });
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result.outcome).toBe('escalated');
      expect(result.confidence).toBe(0.5);
    });

    it('applies anyway when escalation is disabled', async () => {
      const { controller } = build(
        [snapshot(2, 0), snapshot(2, 0)],
        { rawText: reply('0.35'), costUsd: 0 },
        { options: { escalationPolicy: { enabled: false } } },
      );
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result.outcome).toBe('success');
      expect(await queue.list()).toEqual([]);
    });
  });

  describe('retry budget', () => {
    it('escalates the fourth attempt without running anything', async () => {
      for (let i = 0; i < 3; i++) await tracker.increment('task-c', TEST_PATH);
      const { controller, runner, generator } = build([], { rawText: reply('0.9'), costUsd: 0 });

      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 'task-c' });

      expect(result).toMatchObject({
        outcome: 'escalated',
        attempts: 4,
        reason: 'Exceeded 3 fix attempts',
        escalation: { reason: 'max_retries_exceeded', severity: 'medium', queued: true },
      });
      expect(result.escalation?.priority).toBeCloseTo(0.6);
      expect(runner.calls).toBe(0);
      expect(generator.requests).toHaveLength(0);
      expect((await queue.get('task-c'))?.attemptHistory).toHaveLength(4);
    });

    it('aborts instead when escalation is disabled', async () => {
      for (let i = 0; i < 3; i++) await tracker.increment('task-c', TEST_PATH);
      const { controller } = build([], { rawText: reply('0.9'), costUsd: 0 }, {
        options: { escalationPolicy: { enabled: false } },
      });

      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 'task-c' });

      expect(result).toMatchObject({ outcome: 'aborted', abortReason: 'max_retries_exceeded' });
      expect(await queue.get('task-c')).toBeNull();
    });

    it('honours a custom retry limit', async () => {
      await tracker.increment('task-c', TEST_PATH);
      const { controller } = build([], { rawText: reply('0.9'), costUsd: 0 }, { options: { maxRetries: 1 } });
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 'task-c' });
      expect(result.escalation?.reason).toBe('max_retries_exceeded');
    });
  });

  describe('regression detected', () => {
    it('restores the original bytes and escalates with severity high', async () => {
      const { controller, runner } = build(
        [snapshot(2, 0), snapshot(1, 1)],
        { rawText: reply('0.9'), costUsd: 0.03 },
      );

      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 'task-d' });

      expect(result).toMatchObject({
        outcome: 'escalated',
        fixRolledBack: true,
        comparison: { newFailures: 1 },
        escalation: { reason: 'regression_detected', severity: 'high', queued: true },
      });
      expect(result.escalation?.priority).toBeCloseTo(0.6);
      expect(runner.seen[1]).toBe(`${FIXED}\n`);
      expect(readFileSync(testFile).equals(ORIGINAL)).toBe(true);

      const report = JSON.parse(readFileSync(join(root, 'artifacts', 'regression_report_20250601_120000_task-d.json'), 'utf-8'));
      expect(report).toMatchObject({ fixApplied: false, invariantHonored: false });

      const item = await queue.get('task-d');
      expect(item?.artifacts.diff?.startsWith(`--- a/${TEST_PATH}`)).toBe(true);
      expect(item?.artifacts.baseline?.passed).toBe(2);
      expect(item?.artifacts.afterFix?.failed).toBe(1);
      expect(item?.artifacts.comparison?.newFailures).toBe(1);

      expect(eventNames()).toEqual([Events.ESCALATION_ADDED, Events.FIX_ESCALATED, Events.FIX_COMPLETED]);
    });

    it('restores and aborts when escalation is disabled', async () => {
      const { controller } = build(
        [snapshot(2, 0), snapshot(0, 2)],
        { rawText: reply('0.9'), costUsd: 0 },
        { options: { escalationPolicy: { enabled: false } } },
      );
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result).toMatchObject({ outcome: 'aborted', abortReason: 'regression_detected', fixRolledBack: true });
      expect(readFileSync(testFile).equals(ORIGINAL)).toBe(true);
    });

    it('attaches screenshots and the log path when they exist', async () => {
      mkdirSync(join(root, 'artifacts'), { recursive: true });
      writeFileSync(join(root, 'artifacts', 'login.spec-failed-1.png'), '');
      writeFileSync(join(root, 'artifacts', 'cart.spec-failed-1.png'), '');
      mkdirSync(join(root, 'logs'));

      const { controller } = build(
        [snapshot(2, 0), snapshot(1, 1)],
        { rawText: reply('0.9'), costUsd: 0 },
        { options: { logsDir: 'logs' } },
      );
      await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 'task-d' });

      const item = await queue.get('task-d');
      expect(item?.screenshots).toEqual([join(root, 'artifacts', 'login.spec-failed-1.png')]);
      expect(item?.logsPath).toBe(join(root, 'logs', 'task-d.log'));
    });
  });

  describe('aborts', () => {
    it('aborts when the baseline cannot be captured', async () => {
      const { controller, generator } = build([new RegressionTimeoutError(120_000)], { rawText: reply('0.9'), costUsd: 0 });
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result).toMatchObject({
        outcome: 'aborted',
        abortReason: 'baseline_capture_failed',
        reason: 'Baseline capture failed: Regression tests timed out after 120s',
      });
      expect(generator.requests).toHaveLength(0);
      expect(eventNames()).toEqual([Events.FIX_ABORTED, Events.FIX_COMPLETED]);
    });

    it('treats a timed-out snapshot as a failed baseline', async () => {
      const { controller } = build([{ ...snapshot(0, 0), timedOut: true }], { rawText: reply('0.9'), costUsd: 0 });
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result.abortReason).toBe('baseline_capture_failed');
    });

    it('aborts when the test file cannot be read', async () => {
      const { controller } = build([snapshot(2, 0)], { rawText: reply('0.9'), costUsd: 0 });
      const result = await controller.attemptFix({ testPath: 'tests/missing.spec.ts', errorMessage: 'boom', taskId: 't' });
      expect(result.abortReason).toBe('test_read_failed');
    });

    it('keeps the cost of a failed generation', async () => {
      const { controller } = build([snapshot(2, 0)], new ProposalGenerationError('model unavailable', 0.004));
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result).toMatchObject({
        outcome: 'aborted',
        abortReason: 'proposal_generation_failed',
        reason: 'Proposal generation failed: model unavailable',
        costUsd: 0.004,
      });
    });

    it('aborts on an unparseable proposal and leaves the file alone', async () => {
      const { controller } = build([snapshot(2, 0)], { rawText: 'I could not find the problem.', costUsd: 0.02 });
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result).toMatchObject({
        outcome: 'aborted',
        abortReason: 'proposal_parse_failed',
        reason: 'Could not extract fixed code from response',
        costUsd: 0.02,
      });
      expect(readFileSync(testFile).equals(ORIGINAL)).toBe(true);
    });

    it('restores the file when the post-fix run fails', async () => {
      const { controller } = build(
        [snapshot(2, 0), new Error('browser crashed')],
        { rawText: reply('0.9'), costUsd: 0 },
      );
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result).toMatchObject({
        outcome: 'aborted',
        abortReason: 'post_fix_regression_failed',
        reason: 'Post-fix regression run failed: browser crashed',
        fixRolledBack: true,
      });
      expect(readFileSync(testFile).equals(ORIGINAL)).toBe(true);
    });

    it('aborts when the attempt store is unavailable', async () => {
      const broken: IAttemptTracker = {
        increment: vi.fn().mockRejectedValue(new Error('connection refused')),
        get: vi.fn().mockResolvedValue(0),
        history: vi.fn().mockResolvedValue([]),
      };
      const { controller, runner } = build([], { rawText: reply('0.9'), costUsd: 0 }, { attemptTracker: broken });
      const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
      expect(result).toMatchObject({
        outcome: 'aborted',
        abortReason: 'store_unavailable',
        reason: 'Attempt store unavailable: connection refused',
      });
      expect(runner.calls).toBe(0);
    });
  });

  it('still reports an escalation the queue rejected', async () => {
    const rejecting: IEscalationQueue = {
      add: vi.fn().mockRejectedValue(new Error('queue down')),
      list: vi.fn().mockResolvedValue([]),
      get: vi.fn().mockResolvedValue(null),
      resolve: vi.fn().mockResolvedValue(false),
      stats: vi.fn(),
    };
    const { controller } = build([snapshot(2, 0)], { rawText: reply('0.2'), costUsd: 0 }, { escalationQueue: rejecting });
    const result = await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 't' });
    expect(result.outcome).toBe('escalated');
    expect(result.escalation?.queued).toBe(false);
  });

  it('feeds a resolved escalation to the learning store exactly once', async () => {
    const { controller } = build([snapshot(2, 0)], { rawText: reply('0.35'), costUsd: 0 });
    await controller.attemptFix({ testPath: TEST_PATH, errorMessage: 'boom', taskId: 'task-e' });

    const annotation: Annotation = {
      rootCauseCategory: 'selector_drift',
      fixStrategy: 'use getByTestId',
      severity: 'low',
      humanNotes: 'renamed in the redesign',
    };
    expect(await queue.resolve('task-e', annotation)).toBe(true);
    await queue.drain();

    expect((await queue.get('task-e'))?.resolved).toBe(true);
    expect((await queue.list()).map((item) => item.taskId)).not.toContain('task-e');
    expect(learning.storeAnnotation).toHaveBeenCalledTimes(1);
  });
});
