export { ActionExecutor } from './actions/actionExecutor';
export type { ActionExecutorOptions } from './actions/actionExecutor';
export { LoggerActionLog } from './actions/actionLog';
export type { ActionLogEntry, ActionLogSink } from './actions/actionLog';
export { normalizeResult } from './actions/normalizeResult';
export { attachConsole, CommandSurface } from './commands/commandSurface';
export type { ConsoleHandle } from './commands/commandSurface';
export { loadConfig } from './config';
export type { OrchestratorConfig } from './config';
export * from './errors';
export { registry as metricsRegistry, startMetricsServer } from './metrics';
export type { MetricsServerHandle, MetricsServerOptions } from './metrics';
export { loadHookModules } from './hookModules';
export type { HookModule, HookModuleImporter, HookModuleLoadReport } from './hookModules';
export { HookService } from './hookService';
export type { HookServiceOptions } from './hookService';
export { HookRegistry } from './registry/hookRegistry';
export { DeferredTaskQueue } from './scheduler/deferredTaskQueue';
export { RetryScheduler } from './scheduler/retryScheduler';
export type { RetrySchedulerOptions, ScheduledActionStatus } from './scheduler/retryScheduler';
export { collectStats } from './stats';
export type { HookStats, HookScheduleCount } from './stats';
export * from './types';
