import type {
  Annotation,
  EscalationItem,
  IEscalationQueue,
  IEventBus,
  IKeyValueStore,
  ILearningStore,
  NewEscalationItem,
  QueueListOptions,
  QueueStats,
} from '@mender/core';
import { DAY_SECONDS, Events, HIGH_PRIORITY_THRESHOLD, StoreKeys, createLogger } from '@mender/core';
import { clampPriority, computePriority } from './priority.js';

const log = createLogger('EscalationQueue');

export interface EscalationQueueOptions {
  /** Lifetime of each item record */
  ttlSeconds?: number;
  now?: () => Date;
}

/**
 * Priority-ordered human-review queue.
 *
 * Records live under `hitl:task:<id>`. The sorted index `hitl:queue` holds
 * unresolved ids only; resolving moves the id to `hitl:resolved` and keeps
 * the record readable through get() until its TTL lapses.
 */
export class EscalationQueue implements IEscalationQueue {
  private readonly ttlSeconds: number;
  private readonly now: () => Date;
  private readonly pendingForwards = new Set<Promise<void>>();

  constructor(
    private readonly store: IKeyValueStore,
    private readonly learningStore: ILearningStore,
    private readonly eventBus: IEventBus,
    options: EscalationQueueOptions = {},
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DAY_SECONDS;
    this.now = options.now ?? (() => new Date());
  }

  async add(input: NewEscalationItem): Promise<boolean> {
    if (!input.taskId) {
      throw new Error('taskId is required');
    }

    const createdAt = input.createdAt ?? this.now().toISOString();
    const priority = clampPriority(
      input.priority ??
        computePriority({
          attempts: input.attempts,
          feature: input.feature,
          createdAt,
          now: this.now(),
        }),
    );

    const item: EscalationItem = {
      ...input,
      screenshots: input.screenshots ?? [],
      attemptHistory: input.attemptHistory ?? [],
      artifacts: input.artifacts ?? {},
      createdAt,
      priority,
      resolved: input.resolved ?? false,
    };

    await this.store.set(StoreKeys.escalation(item.taskId), item, this.ttlSeconds);
    await this.store.zadd(StoreKeys.escalationIndex, priority, item.taskId);
    // A re-escalated task leaves the resolved set
    await this.store.zrem(StoreKeys.resolvedIndex, item.taskId);

    log.info(`Queued for review (priority ${priority.toFixed(2)})`, { reason: item.escalationReason }, item.taskId);
    this.eventBus.emit(Events.ESCALATION_ADDED, { item });
    return true;
  }

  async list(options: QueueListOptions = {}): Promise<EscalationItem[]> {
    const { includeResolved = false, limit } = options;
    if (limit !== undefined && limit <= 0) return [];

    if (!includeResolved) {
      // Expired ids are only pruned by load(), so the limit applies afterwards
      const ids = await this.store.zrevrange(StoreKeys.escalationIndex, 0, -1);
      const items = await this.load(StoreKeys.escalationIndex, ids);
      const active = items.filter((item) => !item.resolved);
      return limit !== undefined ? active.slice(0, limit) : active;
    }

    const active = await this.load(
      StoreKeys.escalationIndex,
      await this.store.zrevrange(StoreKeys.escalationIndex, 0, -1),
    );
    const resolved = await this.load(
      StoreKeys.resolvedIndex,
      await this.store.zrevrange(StoreKeys.resolvedIndex, 0, -1),
    );
    const merged = [...active, ...resolved].sort((a, b) => b.priority - a.priority);
    return limit !== undefined ? merged.slice(0, limit) : merged;
  }

  async get(taskId: string): Promise<EscalationItem | null> {
    return this.store.get<EscalationItem>(StoreKeys.escalation(taskId));
  }

  async resolve(taskId: string, annotation: Annotation): Promise<boolean> {
    const item = await this.get(taskId);
    if (!item) return false;

    const now = this.now();
    const resolved: EscalationItem = {
      ...item,
      ...annotation,
      annotation,
      resolved: true,
      resolvedAt: now.toISOString(),
    };

    await this.store.set(StoreKeys.escalation(taskId), resolved, this.ttlSeconds);
    await this.store.zrem(StoreKeys.escalationIndex, taskId);
    await this.store.zadd(StoreKeys.resolvedIndex, resolved.priority, taskId);

    const annotationId = `hitl_${taskId}_${Math.floor(now.getTime() / 1000)}`;
    this.trackForward(this.forwardAnnotation(annotationId, resolved.feature, annotation, taskId));

    log.info('Resolved', { rootCause: annotation.rootCauseCategory }, taskId);
    this.eventBus.emit(Events.ESCALATION_RESOLVED, { item: resolved, annotation });
    return true;
  }

  async stats(): Promise<QueueStats> {
    const all = await this.list({ includeResolved: true });
    const active = all.filter((item) => !item.resolved);
    const resolvedCount = all.length - active.length;

    return {
      totalCount: all.length,
      activeCount: active.length,
      resolvedCount,
      avgPriority: active.length > 0
        ? active.reduce((sum, item) => sum + item.priority, 0) / active.length
        : 0,
      highPriorityCount: active.filter((item) => item.priority > HIGH_PRIORITY_THRESHOLD).length,
    };
  }

  /** Wait for in-flight learning-store writes (call before shutdown). */
  async drain(): Promise<void> {
    await Promise.all([...this.pendingForwards]);
  }

  /** Load records for index members, pruning members whose record expired */
  private async load(indexKey: string, ids: string[]): Promise<EscalationItem[]> {
    const items: EscalationItem[] = [];
    for (const taskId of ids) {
      const item = await this.get(taskId);
      if (item) {
        items.push(item);
      } else {
        await this.store.zrem(indexKey, taskId);
      }
    }
    return items;
  }

  private trackForward(forward: Promise<void>): void {
    this.pendingForwards.add(forward);
    // forwardAnnotation never rejects
    void forward.finally(() => this.pendingForwards.delete(forward));
  }

  private async forwardAnnotation(
    annotationId: string,
    description: string,
    annotation: Annotation,
    taskId: string,
  ): Promise<void> {
    try {
      const stored = await this.learningStore.storeAnnotation(annotationId, description, annotation);
      if (!stored) {
        log.warn(`Learning store rejected annotation ${annotationId}`, undefined, taskId);
      }
    } catch (error) {
      log.error(`Failed to forward annotation ${annotationId}: ${String(error)}`, undefined, taskId);
    }
  }
}
