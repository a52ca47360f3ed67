import { logger } from '../logger';

export type DeferredTask = () => Promise<void> | void;

interface QueueEntry {
  key: string;
  dueAtMs: number;
  sequence: number;
  task: DeferredTask;
}

// setTimeout overflows past this and fires immediately
const MAX_TIMER_DELAY_MS = 2_147_483_647;

// below this the heap is never rebuilt
const COMPACT_MIN_ENTRIES = 64;

const before = (a: QueueEntry, b: QueueEntry): boolean =>
  a.dueAtMs < b.dueAtMs || (a.dueAtMs === b.dueAtMs && a.sequence < b.sequence);

/**
 * Keyed min-heap of due times served by a single timer.
 *
 * Re-scheduling a key replaces its pending task. Due tasks run one after the
 * other and each runs to completion before the next one starts. Superseded
 * and cancelled entries stay in the heap and are skipped when popped; once
 * they outnumber the live ones the heap is rebuilt from the live entries.
 */
export class DeferredTaskQueue {
  private readonly heap: QueueEntry[] = [];
  private readonly live = new Map<string, QueueEntry>();
  private sequence = 0;
  private timer: NodeJS.Timeout | undefined;
  private armedFor: number | undefined;
  private draining = false;
  private stopped = false;

  constructor(private readonly options: { unref?: boolean } = {}) {}

  schedule(key: string, dueAtMs: number, task: DeferredTask): void {
    const entry: QueueEntry = { key, dueAtMs, sequence: this.sequence++, task };
    this.live.set(key, entry);
    this.push(entry);
    this.compact();
    this.stopped = false;
    this.arm();
  }

  cancel(key: string): boolean {
    const removed = this.live.delete(key);
    this.compact();
    return removed;
  }

  has(key: string): boolean {
    return this.live.has(key);
  }

  dueAt(key: string): number | undefined {
    return this.live.get(key)?.dueAtMs;
  }

  get size(): number {
    return this.live.size;
  }

  /** Heap entries, superseded and cancelled ones included. */
  get backlog(): number {
    return this.heap.length;
  }

  stop(): void {
    this.stopped = true;
    this.disarm();
  }

  private arm(): void {
    if (this.draining || this.stopped) {
      return;
    }
    const next = this.peekLive();
    if (!next) {
      this.disarm();
      return;
    }
    if (this.timer && this.armedFor === next.dueAtMs) {
      return;
    }
    this.disarm();
    const delay = Math.min(Math.max(next.dueAtMs - Date.now(), 0), MAX_TIMER_DELAY_MS);
    this.armedFor = next.dueAtMs;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.armedFor = undefined;
      this.drain().catch((error) => {
        logger.error({ err: error }, 'Deferred task queue drain failed');
      });
    }, delay);
    if (this.options.unref) {
      this.timer.unref();
    }
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = undefined;
    this.armedFor = undefined;
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      for (let entry = this.popDue(); entry; entry = this.popDue()) {
        try {
          await entry.task();
        } catch (error) {
          logger.error({ err: error, key: entry.key }, 'Deferred task failed');
        }
        if (this.stopped) {
          break;
        }
      }
    } finally {
      this.draining = false;
      this.arm();
    }
  }

  private popDue(): QueueEntry | undefined {
    const next = this.peekLive();
    if (!next || next.dueAtMs > Date.now()) {
      return undefined;
    }
    this.pop();
    this.live.delete(next.key);
    return next;
  }

  private peekLive(): QueueEntry | undefined {
    while (this.heap.length > 0) {
      const top = this.heap[0];
      if (this.live.get(top.key) === top) {
        return top;
      }
      this.pop();
    }
    return undefined;
  }

  private compact(): void {
    if (this.heap.length <= COMPACT_MIN_ENTRIES || this.heap.length <= this.live.size * 2) {
      return;
    }
    // a sorted array is a valid heap
    const entries = [...this.live.values()].sort((a, b) => (before(a, b) ? -1 : before(b, a) ? 1 : 0));
    this.heap.splice(0, this.heap.length, ...entries);
  }

  private push(entry: QueueEntry): void {
    const heap = this.heap;
    heap.push(entry);
    let index = heap.length - 1;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (!before(heap[index], heap[parent])) {
        break;
      }
      [heap[index], heap[parent]] = [heap[parent], heap[index]];
      index = parent;
    }
  }

  private pop(): void {
    const heap = this.heap;
    const last = heap.pop();
    if (!last || heap.length === 0) {
      return;
    }
    heap[0] = last;
    let index = 0;
    for (;;) {
      const left = index * 2 + 1;
      const right = left + 1;
      let smallest = index;
      if (left < heap.length && before(heap[left], heap[smallest])) {
        smallest = left;
      }
      if (right < heap.length && before(heap[right], heap[smallest])) {
        smallest = right;
      }
      if (smallest === index) {
        return;
      }
      [heap[index], heap[smallest]] = [heap[smallest], heap[index]];
      index = smallest;
    }
  }
}
