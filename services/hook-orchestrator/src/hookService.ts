import { ActionExecutor } from './actions/actionExecutor';
import { ActionLogSink, LoggerActionLog } from './actions/actionLog';
import { OrchestratorConfig } from './config';
import { logger } from './logger';
import { HookRegistry } from './registry/hookRegistry';
import { RetryScheduler } from './scheduler/retryScheduler';
import { collectStats, HookStats } from './stats';
import {
  ActionKind,
  ActionResult,
  ExecutionOutcome,
  Hook,
  HookDefinition,
  ScheduledAction,
  ScheduleRequest,
} from './types';

export type HookServiceOptions = Partial<
  Pick<
    OrchestratorConfig,
    'defaultMaxRetries' | 'defaultRetryDelaySeconds' | 'handlerTimeoutMs' | 'cleanupMaxAgeSeconds'
  >
> & {
  actionLog?: ActionLogSink;
  unrefTimers?: boolean;
};

/**
 * Owns the hook registry and the scheduled action table and wires the
 * executor and scheduler to them.
 */
export class HookService {
  readonly registry: HookRegistry;
  readonly executor: ActionExecutor;
  readonly scheduler: RetryScheduler;
  private readonly cleanupMaxAgeSeconds: number | undefined;

  constructor(options: HookServiceOptions = {}) {
    this.registry = new HookRegistry();
    this.executor = new ActionExecutor(options.actionLog ?? new LoggerActionLog(), {
      handlerTimeoutMs: options.handlerTimeoutMs,
    });
    this.scheduler = new RetryScheduler(this.registry, this.executor, {
      defaultMaxRetries: options.defaultMaxRetries,
      defaultRetryDelaySeconds: options.defaultRetryDelaySeconds,
      unrefTimers: options.unrefTimers,
    });
    this.cleanupMaxAgeSeconds = options.cleanupMaxAgeSeconds;
  }

  initialize(): void {
    logger.info({ hooks: this.registry.size }, 'Hook orchestrator initialized');
  }

  registerHook(definition: HookDefinition): Hook {
    return this.registry.register(definition);
  }

  getHook(id: string): Hook | undefined {
    return this.registry.get(id);
  }

  getAllHooks(): Record<string, Hook> {
    return this.registry.getAll();
  }

  removeHook(id: string): boolean {
    return this.registry.remove(id);
  }

  async executeAction(
    hookId: string,
    actionKind: ActionKind,
    subjectId: string,
    args: readonly string[] = [],
  ): Promise<ActionResult> {
    const { result } = await this.execute(hookId, actionKind, subjectId, args);
    return result;
  }

  /** Like {@link executeAction} but keeps the error string. */
  execute(
    hookId: string,
    actionKind: ActionKind,
    subjectId: string,
    args: readonly string[] = [],
  ): Promise<ExecutionOutcome> {
    return this.executor.execute(this.registry.get(hookId), actionKind, subjectId, args, false);
  }

  scheduleAction(request: ScheduleRequest): string {
    return this.scheduler.schedule(request);
  }

  getScheduledActions(): Record<string, ScheduledAction> {
    return this.scheduler.getAll();
  }

  getScheduledAction(actionId: string): ScheduledAction | undefined {
    return this.scheduler.get(actionId);
  }

  cancelScheduledAction(actionId: string): boolean {
    return this.scheduler.cancel(actionId);
  }

  getStats(): HookStats {
    return collectStats(this.registry, this.scheduler);
  }

  cleanup(maxAgeSeconds = this.cleanupMaxAgeSeconds): number {
    return this.scheduler.cleanup(maxAgeSeconds);
  }

  stop(): void {
    this.scheduler.stop();
    logger.info({ pending: this.scheduler.size }, 'Hook orchestrator stopped');
  }
}
