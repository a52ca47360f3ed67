import { ActionExecutor } from '../actions/actionExecutor';
import { HookNotFoundError, HookValidationError, InvalidDelayError } from '../errors';
import { logger } from '../logger';
import { actionRetries, scheduledActionsFinished } from '../metrics';
import { HookRegistry } from '../registry/hookRegistry';
import {
  actionKindSchema,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_SECONDS,
  NO_SUBJECT,
  nowSeconds,
  ScheduledAction,
  ScheduleRequest,
} from '../types';
import { DeferredTaskQueue } from './deferredTaskQueue';

export interface RetrySchedulerOptions {
  defaultMaxRetries?: number;
  defaultRetryDelaySeconds?: number;
  /** Let the process exit while actions are still pending. */
  unrefTimers?: boolean;
}

export type ScheduledActionStatus = 'completed' | 'failed';

const DAY_SECONDS = 86_400;

export class RetryScheduler {
  private readonly actions = new Map<string, ScheduledAction>();
  private readonly queue: DeferredTaskQueue;
  private readonly defaultMaxRetries: number;
  private readonly defaultRetryDelaySeconds: number;
  private counter = 0;

  constructor(
    private readonly registry: HookRegistry,
    private readonly executor: ActionExecutor,
    options: RetrySchedulerOptions = {},
  ) {
    this.defaultMaxRetries = options.defaultMaxRetries ?? DEFAULT_MAX_RETRIES;
    this.defaultRetryDelaySeconds = options.defaultRetryDelaySeconds ?? DEFAULT_RETRY_DELAY_SECONDS;
    this.queue = new DeferredTaskQueue({ unref: options.unrefTimers });
  }

  schedule(request: ScheduleRequest): string {
    const { hookId, actionKind, subjectId, args, delaySeconds } = request;
    if (!this.registry.get(hookId)) {
      throw new HookNotFoundError(hookId);
    }
    if (!actionKindSchema.safeParse(actionKind).success) {
      throw new HookValidationError(`Unknown action kind ${String(actionKind)}`);
    }
    if (typeof subjectId !== 'string' || subjectId === '' || subjectId === NO_SUBJECT) {
      throw new HookValidationError('Subject ID is invalid');
    }
    if (!Array.isArray(args)) {
      throw new HookValidationError('Args must be an array');
    }
    if (typeof delaySeconds !== 'number' || !Number.isFinite(delaySeconds) || delaySeconds <= 0) {
      throw new InvalidDelayError(delaySeconds);
    }
    const maxRetries = request.maxRetries ?? this.defaultMaxRetries;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new HookValidationError('maxRetries must be a non-negative integer');
    }

    const now = nowSeconds();
    const action: ScheduledAction = {
      id: this.nextId(now),
      hookId,
      actionKind,
      subjectId,
      args: [...args],
      executeAt: now + delaySeconds,
      retries: 0,
      maxRetries,
      retryDelay: this.defaultRetryDelaySeconds,
      created: now,
    };

    this.actions.set(action.id, action);
    this.arm(action);
    logger.info(
      { actionId: action.id, hookId, actionKind, subjectId, delay: delaySeconds },
      'Action scheduled',
    );
    return action.id;
  }

  /** Runs one attempt of a scheduled action and decides what happens next. */
  async process(actionId: string): Promise<void> {
    const action = this.actions.get(actionId);
    if (!action) {
      return;
    }

    const hook = this.registry.get(action.hookId);
    if (!hook) {
      logger.error({ actionId, hookId: action.hookId }, 'Hook not found for scheduled action');
      this.finish(action, 'failed');
      return;
    }

    const { result } = await this.executor.execute(hook, action.actionKind, action.subjectId, action.args, true);

    if (this.actions.get(actionId) !== action) {
      logger.info({ actionId }, 'Scheduled action changed while executing, dropping attempt outcome');
      return;
    }

    if (!result.success && result.retry && action.retries < action.maxRetries) {
      const delay = result.retryDelay ?? action.retryDelay;
      const next: ScheduledAction = {
        ...action,
        retries: action.retries + 1,
        executeAt: nowSeconds() + delay,
      };
      this.actions.set(actionId, next);
      this.arm(next);
      actionRetries.inc({ action_kind: action.actionKind });
      logger.info({ actionId, retries: next.retries, delay }, 'Action retry scheduled');
      return;
    }

    this.finish(action, result.success ? 'completed' : 'failed');
  }

  cancel(actionId: string): boolean {
    const action = this.actions.get(actionId);
    if (!action) {
      logger.warn({ actionId }, 'Scheduled action not found');
      return false;
    }
    this.actions.delete(actionId);
    this.queue.cancel(actionId);
    logger.info(
      { actionId, hookId: action.hookId, actionKind: action.actionKind },
      'Scheduled action cancelled',
    );
    return true;
  }

  get(actionId: string): ScheduledAction | undefined {
    return this.actions.get(actionId);
  }

  getAll(): Record<string, ScheduledAction> {
    return Object.fromEntries(this.actions);
  }

  get size(): number {
    return this.actions.size;
  }

  /** Drops every record older than `maxAgeSeconds`, whatever its state. */
  cleanup(maxAgeSeconds = DAY_SECONDS): number {
    const now = nowSeconds();
    let removed = 0;
    for (const [id, action] of this.actions) {
      if (now - action.created > maxAgeSeconds) {
        this.actions.delete(id);
        this.queue.cancel(id);
        removed += 1;
      }
    }
    logger.info({ actionsRemoved: removed, remainingActions: this.actions.size }, 'Cleanup performed');
    return removed;
  }

  stop(): void {
    this.queue.stop();
  }

  private arm(action: ScheduledAction): void {
    this.queue.schedule(action.id, action.executeAt * 1000, () => this.process(action.id));
  }

  private finish(action: ScheduledAction, status: ScheduledActionStatus): void {
    this.actions.delete(action.id);
    this.queue.cancel(action.id);
    scheduledActionsFinished.inc({ status });
    logger.info({ actionId: action.id, status, retries: action.retries }, 'Scheduled action finished');
  }

  private nextId(now: number): string {
    this.counter += 1;
    return `hook_action_${Math.floor(now)}_${this.counter}`;
  }
}
