import { HookRegistry } from './registry/hookRegistry';
import { RetryScheduler } from './scheduler/retryScheduler';
import { ActionKind, ScheduledAction } from './types';

export interface HookScheduleCount {
  label: string;
  scheduledCount: number;
}

export interface HookStats {
  totalHooks: number;
  scheduledActionCount: number;
  perHookScheduledCount: Record<string, HookScheduleCount>;
  perActionKindCount: Partial<Record<ActionKind, number>>;
  oldestScheduledAction?: ScheduledAction;
  newestScheduledAction?: ScheduledAction;
}

export const collectStats = (registry: HookRegistry, scheduler: RetryScheduler): HookStats => {
  const stats: HookStats = {
    totalHooks: 0,
    scheduledActionCount: 0,
    perHookScheduledCount: {},
    perActionKindCount: {},
  };

  for (const [hookId, hook] of Object.entries(registry.getAll())) {
    stats.totalHooks += 1;
    stats.perHookScheduledCount[hookId] = { label: hook.label, scheduledCount: 0 };
  }

  for (const action of Object.values(scheduler.getAll())) {
    stats.scheduledActionCount += 1;

    // actions whose hook was removed still count towards the totals
    const perHook = stats.perHookScheduledCount[action.hookId];
    if (perHook) {
      perHook.scheduledCount += 1;
    }

    stats.perActionKindCount[action.actionKind] = (stats.perActionKindCount[action.actionKind] ?? 0) + 1;

    if (!stats.oldestScheduledAction || action.created < stats.oldestScheduledAction.created) {
      stats.oldestScheduledAction = action;
    }
    if (!stats.newestScheduledAction || action.created > stats.newestScheduledAction.created) {
      stats.newestScheduledAction = action;
    }
  }

  return stats;
};
