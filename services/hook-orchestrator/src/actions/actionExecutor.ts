import { describeError, HandlerTimeoutError } from '../errors';
import { logger } from '../logger';
import { actionAttempts, actionFailures, actionLatency } from '../metrics';
import {
  ActionKind,
  actionKindSchema,
  ActionResult,
  ExecutionOutcome,
  HANDLER_BY_KIND,
  Hook,
  HookHandler,
  NO_SUBJECT,
  nowSeconds,
  resolveHandler,
} from '../types';
import { ActionLogSink, LoggerActionLog } from './actionLog';
import { normalizeResult } from './normalizeResult';

export interface ActionExecutorOptions {
  /** Upper bound for a single handler call. 0 waits forever. */
  handlerTimeoutMs?: number;
}

type Validation = { ok: true; hook: Hook; handler: HookHandler } | { ok: false; error: string };

const validationFailure: ActionResult = {
  success: false,
  message: 'Handler validation failed',
  retry: false,
};

const validate = (
  hook: Hook | undefined,
  actionKind: ActionKind,
  subjectId: string,
  args: readonly string[],
): Validation => {
  if (!hook) {
    return { ok: false, error: 'Hook is not defined' };
  }
  if (typeof hook.id !== 'string' || hook.id === '') {
    return { ok: false, error: 'Hook ID is missing or empty' };
  }
  if (!actionKindSchema.safeParse(actionKind).success) {
    return { ok: false, error: `Unknown action kind ${String(actionKind)}` };
  }
  if (typeof subjectId !== 'string' || subjectId === '' || subjectId === NO_SUBJECT) {
    return { ok: false, error: 'Subject ID is invalid' };
  }
  if (!Array.isArray(args)) {
    return { ok: false, error: 'Args must be an array' };
  }
  const handler = resolveHandler(hook, actionKind);
  if (typeof handler !== 'function') {
    return { ok: false, error: `Handler ${HANDLER_BY_KIND[actionKind]} not found in hook ${hook.id}` };
  }
  return { ok: true, hook, handler };
};

const withTimeout = async <T>(work: Promise<T>, timeoutMs: number): Promise<T> => {
  if (timeoutMs <= 0) {
    return work;
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new HandlerTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export class ActionExecutor {
  private readonly handlerTimeoutMs: number;

  constructor(
    private readonly actionLog: ActionLogSink = new LoggerActionLog(),
    options: ActionExecutorOptions = {},
  ) {
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 30_000;
  }

  /**
   * Runs one handler of `hook` for `subjectId`. Never rejects: validation
   * problems, thrown errors and timeouts all come back as a failed result
   * with the reason in `error`.
   */
  async execute(
    hook: Hook | undefined,
    actionKind: ActionKind,
    subjectId: string,
    args: readonly string[],
    scheduled = false,
  ): Promise<ExecutionOutcome> {
    const validation = validate(hook, actionKind, subjectId, args);
    if (!validation.ok) {
      logger.error({ hookId: hook?.id, actionKind, subjectId, error: validation.error }, 'Handler validation failed');
      actionFailures.inc({ action_kind: String(actionKind), reason: 'validation' });
      this.report(hook?.id ?? '', actionKind, subjectId, args, scheduled, 0, validationFailure, validation.error);
      return { result: { ...validationFailure }, error: validation.error };
    }

    const { hook: target, handler } = validation;
    actionAttempts.inc({ action_kind: actionKind, scheduled: String(scheduled) });

    const start = process.hrtime.bigint();
    let raw: unknown;
    let fault: unknown;
    let faulted = false;
    try {
      const invocation = (async () => handler(target, subjectId, args))();
      raw = await withTimeout(invocation, this.handlerTimeoutMs);
    } catch (error) {
      fault = error;
      faulted = true;
    }
    const executionTimeMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    actionLatency.observe({ action_kind: actionKind }, executionTimeMs / 1000);

    if (faulted) {
      const error = describeError(fault);
      const timedOut = fault instanceof HandlerTimeoutError;
      const result: ActionResult = {
        success: false,
        message: timedOut ? 'Handler timed out' : 'Handler execution failed',
        retry: true,
        data: { error, executionTime: executionTimeMs },
      };
      actionFailures.inc({ action_kind: actionKind, reason: timedOut ? 'timeout' : 'fault' });
      logger.error(
        { hookId: target.id, actionKind, subjectId, scheduled, err: fault, executionTimeMs },
        'Hook handler failed',
      );
      this.report(target.id, actionKind, subjectId, args, scheduled, executionTimeMs, undefined, error);
      return { result, error };
    }

    const result = normalizeResult(raw);
    if (!result.success) {
      actionFailures.inc({ action_kind: actionKind, reason: result.retry ? 'retryable' : 'rejected' });
    }
    this.report(target.id, actionKind, subjectId, args, scheduled, executionTimeMs, result);
    return { result };
  }

  private report(
    hookId: string,
    actionKind: ActionKind,
    subjectId: string,
    args: readonly string[],
    scheduled: boolean,
    executionTimeMs: number,
    result: ActionResult | undefined,
    error?: string,
  ): void {
    try {
      this.actionLog.record({
        actionKind,
        hookId,
        subjectId,
        args,
        success: result?.success ?? false,
        timestampSeconds: nowSeconds(),
        scheduled,
        executionTimeMs,
        result: result && {
          message: result.message,
          data: result.data,
          retry: result.retry,
          retryDelay: result.retryDelay,
        },
        error,
      });
    } catch (sinkError) {
      logger.error({ err: sinkError, hookId, actionKind }, 'Action log sink failed');
    }
  }
}
