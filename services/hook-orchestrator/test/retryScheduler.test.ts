import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ActionExecutor } from '../src/actions/actionExecutor';
import { HookNotFoundError, HookValidationError, InvalidDelayError } from '../src/errors';
import { HookRegistry } from '../src/registry/hookRegistry';
import { RetryScheduler } from '../src/scheduler/retryScheduler';
import { ActionResultInput, HookHandler } from '../src/types';
import { advance, flush, MemoryActionLog, T0_SECONDS, useSchedulerClock } from './support';

describe('RetryScheduler', () => {
  let registry: HookRegistry;
  let actionLog: MemoryActionLog;
  let scheduler: RetryScheduler;

  const registerVip = (onPurchase: HookHandler) => registry.register({ id: 'vip', label: 'VIP', onPurchase });

  beforeEach(() => {
    useSchedulerClock();
    registry = new HookRegistry();
    actionLog = new MemoryActionLog();
    scheduler = new RetryScheduler(registry, new ActionExecutor(actionLog, { handlerTimeoutMs: 0 }));
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
  });

  it('stores a pending record for a valid request', () => {
    registerVip(vi.fn());

    const id = scheduler.schedule({
      hookId: 'vip',
      actionKind: 'purchase',
      subjectId: '42',
      args: ['gold'],
      delaySeconds: 10,
    });

    expect(id).toBe(`hook_action_${T0_SECONDS}_1`);
    expect(scheduler.get(id)).toEqual({
      id,
      hookId: 'vip',
      actionKind: 'purchase',
      subjectId: '42',
      args: ['gold'],
      executeAt: T0_SECONDS + 10,
      retries: 0,
      maxRetries: 3,
      retryDelay: 30,
      created: T0_SECONDS,
    });
  });

  it('refuses unknown hooks', () => {
    expect(() =>
      scheduler.schedule({ hookId: 'ghost', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 10 }),
    ).toThrow(HookNotFoundError);
  });

  it('refuses zero and negative delays alike', () => {
    registerVip(vi.fn());
    const request = { hookId: 'vip', actionKind: 'purchase' as const, subjectId: '123', args: [], maxRetries: 3 };

    expect(() => scheduler.schedule({ ...request, delaySeconds: 0 })).toThrow(InvalidDelayError);
    expect(() => scheduler.schedule({ ...request, delaySeconds: -5 })).toThrow(InvalidDelayError);
    expect(() => scheduler.schedule({ ...request, delaySeconds: Number.NaN })).toThrow('Delay must be a positive number');
    expect(scheduler.getAll()).toEqual({});
  });

  it('refuses placeholder subjects and fractional retry ceilings', () => {
    registerVip(vi.fn());
    const request = { hookId: 'vip', actionKind: 'purchase' as const, args: [], delaySeconds: 5 };

    expect(() => scheduler.schedule({ ...request, subjectId: '0' })).toThrow(HookValidationError);
    expect(() => scheduler.schedule({ ...request, subjectId: '42', maxRetries: 1.5 })).toThrow(
      'maxRetries must be a non-negative integer',
    );
  });

  it('executes the handler when the action falls due and drops the record on success', async () => {
    const onPurchase = vi.fn().mockReturnValue({ success: true, message: 'granted' });
    const hook = registerVip(onPurchase);
    const id = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: ['gold'], delaySeconds: 10 });

    await advance(9_999);
    expect(onPurchase).not.toHaveBeenCalled();

    await advance(1);
    expect(onPurchase).toHaveBeenCalledTimes(1);
    expect(onPurchase).toHaveBeenCalledWith(hook, '42', ['gold']);
    expect(scheduler.get(id)).toBeUndefined();
    expect(actionLog.entries).toHaveLength(1);
    expect(actionLog.entries[0]).toMatchObject({ scheduled: true, success: true, timestampSeconds: T0_SECONDS + 10 });
  });

  it('stops after the initial attempt plus maxRetries retries', async () => {
    const onPurchase = vi.fn().mockReturnValue({ success: false, retry: true, retryDelay: 1 });
    registerVip(onPurchase);
    const id = scheduler.schedule({
      hookId: 'vip',
      actionKind: 'purchase',
      subjectId: '42',
      args: [],
      delaySeconds: 1,
      maxRetries: 2,
    });

    await vi.runAllTimersAsync();
    await flush();

    expect(onPurchase).toHaveBeenCalledTimes(3);
    expect(scheduler.get(id)).toBeUndefined();
    expect(scheduler.size).toBe(0);
  });

  it('falls back to the record retry delay when the handler names none', async () => {
    const onPurchase = vi.fn().mockReturnValue({ success: false, retry: true });
    registerVip(onPurchase);
    const id = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 5 });

    await advance(5_000);
    expect(onPurchase).toHaveBeenCalledTimes(1);
    expect(scheduler.get(id)).toMatchObject({ retries: 1, executeAt: T0_SECONDS + 5 + 30 });

    await advance(29_999);
    expect(onPurchase).toHaveBeenCalledTimes(1);

    await advance(1);
    expect(onPurchase).toHaveBeenCalledTimes(2);
    expect(scheduler.get(id)).toMatchObject({ retries: 2 });
  });

  it('prefers the retry delay returned by the handler', async () => {
    const results: ActionResultInput[] = [{ success: false, retry: true, retryDelay: 5 }, { success: true }];
    const onPurchase = vi.fn(() => results.shift());
    registerVip(onPurchase);
    const id = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 10 });

    await advance(10_000);
    expect(scheduler.get(id)).toMatchObject({ retries: 1, executeAt: T0_SECONDS + 15, retryDelay: 30 });

    await advance(5_000);
    expect(onPurchase).toHaveBeenCalledTimes(2);
    expect(scheduler.get(id)).toBeUndefined();
  });

  it('does not retry failures that ask for no retry', async () => {
    const onPurchase = vi.fn().mockReturnValue({ success: false, message: 'banned account' });
    registerVip(onPurchase);
    const id = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 1 });

    await vi.runAllTimersAsync();
    await flush();

    expect(onPurchase).toHaveBeenCalledTimes(1);
    expect(scheduler.get(id)).toBeUndefined();
  });

  it('cancels once and never runs a cancelled action', async () => {
    const onPurchase = vi.fn();
    registerVip(onPurchase);
    const id = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 5 });

    expect(scheduler.cancel(id)).toBe(true);
    expect(scheduler.get(id)).toBeUndefined();
    expect(scheduler.cancel(id)).toBe(false);

    await advance(10_000);
    expect(onPurchase).not.toHaveBeenCalled();
  });

  it('does not let a faulty hook stop another hook from running', async () => {
    const healthy = vi.fn().mockReturnValue('delivered');
    registry.register({
      id: 'broken',
      label: 'Broken',
      onPurchase: () => {
        throw new Error('null reference');
      },
    });
    registry.register({ id: 'healthy', label: 'Healthy', onPurchase: healthy });

    const brokenId = scheduler.schedule({
      hookId: 'broken',
      actionKind: 'purchase',
      subjectId: '7',
      args: [],
      delaySeconds: 5,
      maxRetries: 0,
    });
    const healthyId = scheduler.schedule({
      hookId: 'healthy',
      actionKind: 'purchase',
      subjectId: '42',
      args: [],
      delaySeconds: 5,
    });

    await advance(5_000);

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(scheduler.get(brokenId)).toBeUndefined();
    expect(scheduler.get(healthyId)).toBeUndefined();
    expect(actionLog.entries.map((entry) => [entry.hookId, entry.success])).toEqual([
      ['broken', false],
      ['healthy', true],
    ]);
  });

  it('drops the action when its hook disappeared before it fell due', async () => {
    const onPurchase = vi.fn();
    registerVip(onPurchase);
    const id = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 5 });

    registry.remove('vip');
    await advance(5_000);

    expect(onPurchase).not.toHaveBeenCalled();
    expect(scheduler.get(id)).toBeUndefined();
  });

  it('does not reschedule an action cancelled while its attempt was running', async () => {
    let settle: (value: ActionResultInput) => void = () => undefined;
    const onPurchase = vi.fn(
      () =>
        new Promise<ActionResultInput>((resolve) => {
          settle = resolve;
        }),
    );
    registerVip(onPurchase);
    const id = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 1 });

    await advance(1_000);
    expect(onPurchase).toHaveBeenCalledTimes(1);

    expect(scheduler.cancel(id)).toBe(true);
    settle({ success: false, retry: true, retryDelay: 1 });
    await flush();
    await advance(60_000);

    expect(onPurchase).toHaveBeenCalledTimes(1);
    expect(scheduler.get(id)).toBeUndefined();
  });

  it('processes a record on demand and ignores unknown ids', async () => {
    const onPurchase = vi.fn();
    registerVip(onPurchase);
    const id = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 60 });

    await scheduler.process('missing');
    await scheduler.process(id);

    expect(onPurchase).toHaveBeenCalledTimes(1);
    expect(scheduler.get(id)).toBeUndefined();

    await advance(60_000);
    expect(onPurchase).toHaveBeenCalledTimes(1);
  });

  it('cleans up records older than the retention window', () => {
    registerVip(vi.fn());
    const stale = scheduler.schedule({ hookId: 'vip', actionKind: 'purchase', subjectId: '42', args: [], delaySeconds: 10 });

    vi.setSystemTime((T0_SECONDS + 86_401) * 1000);
    const fresh = scheduler.schedule({ hookId: 'vip', actionKind: 'renew', subjectId: '42', args: [], delaySeconds: 10 });

    expect(scheduler.cleanup()).toBe(1);
    expect(Object.keys(scheduler.getAll())).toEqual([fresh]);
    expect(scheduler.get(stale)).toBeUndefined();
  });

  it('gives each action a distinct id', () => {
    registerVip(vi.fn());
    const request = { hookId: 'vip', actionKind: 'purchase' as const, subjectId: '42', args: [], delaySeconds: 10 };

    const first = scheduler.schedule(request);
    const second = scheduler.schedule(request);

    expect(first).not.toBe(second);
    expect(second).toBe(`hook_action_${T0_SECONDS}_2`);
  });
});
