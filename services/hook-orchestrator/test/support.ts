import { vi } from 'vitest';

import { ActionLogEntry, ActionLogSink } from '../src/actions/actionLog';

export const T0 = new Date('2024-01-01T00:00:00.000Z');
export const T0_SECONDS = T0.getTime() / 1000;

export class MemoryActionLog implements ActionLogSink {
  readonly entries: ActionLogEntry[] = [];

  record(entry: ActionLogEntry): void {
    this.entries.push(entry);
  }
}

/** Fakes timers and the clock but keeps setImmediate real so {@link flush} works. */
export const useSchedulerClock = () => {
  vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
  vi.setSystemTime(T0);
};

export const flush = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

export const advance = async (ms: number): Promise<void> => {
  await vi.advanceTimersByTimeAsync(ms);
  await flush();
};
