import { Logger, logger as rootLogger } from '../logger';
import { ActionKind, ActionResult } from '../types';

export interface ActionLogEntry {
  actionKind: ActionKind;
  hookId: string;
  subjectId: string;
  args: readonly string[];
  success: boolean;
  timestampSeconds: number;
  scheduled: boolean;
  executionTimeMs: number;
  result?: Pick<ActionResult, 'message' | 'data' | 'retry' | 'retryDelay'>;
  error?: string;
}

export interface ActionLogSink {
  record(entry: ActionLogEntry): void;
}

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export class LoggerActionLog implements ActionLogSink {
  constructor(private readonly log: Logger = rootLogger.child({ component: 'action-log' })) {}

  record(entry: ActionLogEntry): void {
    const message = `${capitalize(entry.actionKind)} - ${entry.hookId}${entry.scheduled ? ' (scheduled)' : ''}`;
    if (entry.success) {
      this.log.info(entry, message);
    } else {
      this.log.warn(entry, message);
    }
  }
}
