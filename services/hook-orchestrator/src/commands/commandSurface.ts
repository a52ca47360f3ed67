import readline from 'node:readline';
import { Readable, Writable } from 'node:stream';

import yargsParser from 'yargs-parser';
import { z } from 'zod';

import { describeError } from '../errors';
import { HookService } from '../hookService';
import { logger } from '../logger';
import { ACTION_KINDS, ActionKind, actionKindSchema, HANDLER_BY_KIND, nowSeconds } from '../types';

const PREFIX = '[hooks]';

const maxRetriesSchema = z
  .string({ invalid_type_error: '--max-retries must be given once' })
  .regex(/^\d+$/, '--max-retries must be a non-negative integer')
  .transform(Number)
  .optional();

// double-quoted, single-quoted or bare
const TOKEN = /"([^"]*)"|'([^']*)'|(\S+)/g;

/** Splits a console line into words, dropping the quotes around quoted words. */
export const splitCommandLine = (line: string): string[] =>
  Array.from(line.matchAll(TOKEN), (match) => match[1] ?? match[2] ?? match[3] ?? '');

interface ScheduleTokens {
  positionals: string[];
  maxRetries: unknown;
}

/**
 * Pulls `--max-retries` out of the schedule arguments. Every other token,
 * dashed or not, stays a positional in its original order, and everything
 * from a bare `--` on is passed through untouched.
 */
const parseScheduleTokens = (tokens: string[]): ScheduleTokens => {
  const endOfOptions = tokens.indexOf('--');
  const head = endOfOptions === -1 ? tokens : tokens.slice(0, endOfOptions);
  const tail = endOfOptions === -1 ? [] : tokens.slice(endOfOptions);
  const parsed = yargsParser(head, {
    string: ['max-retries'],
    configuration: {
      'parse-numbers': false,
      'parse-positional-numbers': false,
      'camel-case-expansion': false,
      'unknown-options-as-args': true,
    },
  });
  return {
    positionals: [...parsed._.map((token) => String(token)), ...tail],
    maxRetries: parsed['max-retries'],
  };
};

const USAGE = [
  `${PREFIX} Commands:`,
  '  run <hookId>.<kind> <subjectId> [...args]',
  '  schedule <hookId>.<kind> <subjectId> <delaySeconds> [...args] [--max-retries N]',
  '    (run never takes a delay; use schedule to defer an action)',
  '  cancel <actionId>',
  '  hooks | scheduled | stats | cleanup | help',
  `  <kind> is one of ${ACTION_KINDS.join(', ')}`,
].join('\n');

interface ActionTarget {
  hookId: string;
  actionKind: ActionKind;
}

const parseTarget = (token: string | undefined): ActionTarget | undefined => {
  if (!token) {
    return undefined;
  }
  const separator = token.lastIndexOf('.');
  if (separator <= 0) {
    return undefined;
  }
  const kind = actionKindSchema.safeParse(token.slice(separator + 1));
  if (!kind.success) {
    return undefined;
  }
  return { hookId: token.slice(0, separator), actionKind: kind.data };
};

/**
 * Console command front end for a {@link HookService}. Every command resolves
 * to printable text; failures are reported, never thrown.
 */
export class CommandSurface {
  constructor(private readonly service: HookService) {}

  async execute(line: string): Promise<string> {
    const [command, ...rest] = splitCommandLine(line);
    if (!command) {
      return '';
    }

    try {
      switch (command.toLowerCase()) {
        case 'run':
          return await this.run(rest);
        case 'schedule':
          return this.schedule(rest);
        case 'cancel':
          return this.cancel(rest[0]);
        case 'hooks':
          return this.listHooks();
        case 'scheduled':
          return this.listScheduled();
        case 'stats':
          return `${PREFIX} Stats: ${JSON.stringify(this.service.getStats(), null, 2)}`;
        case 'cleanup':
          return this.cleanup();
        case 'help':
          return USAGE;
        default:
          return `${PREFIX} Unknown command ${command}. Try "help".`;
      }
    } catch (error) {
      logger.error({ err: error, command }, 'Console command failed');
      return `${PREFIX} Command ${command} failed: ${describeError(error)}`;
    }
  }

  private async run(tokens: string[]): Promise<string> {
    const [targetToken, subjectId, ...args] = tokens;
    const target = parseTarget(targetToken);
    if (!target || !subjectId) {
      return `${PREFIX} Usage: run <hookId>.<kind> <subjectId> [...args]`;
    }

    const { result, error } = await this.service.execute(target.hookId, target.actionKind, subjectId, args);
    const label = `${target.actionKind} for hook ${target.hookId} (subject ${subjectId})`;
    if (result.success) {
      return `${PREFIX} Executed ${label}${result.message ? ` - ${result.message}` : ''}`;
    }
    return `${PREFIX} Failed to execute ${label}: ${error ?? result.message ?? 'Unknown error'}`;
  }

  private schedule(tokens: string[]): string {
    const { positionals, maxRetries: rawMaxRetries } = parseScheduleTokens(tokens);
    const [targetToken, subjectId, delayToken, ...args] = positionals;
    const target = parseTarget(targetToken);
    if (!target || !subjectId || delayToken === undefined) {
      return `${PREFIX} Usage: schedule <hookId>.<kind> <subjectId> <delaySeconds> [...args] [--max-retries N]`;
    }

    const label = `${target.actionKind} for hook ${target.hookId} (subject ${subjectId})`;
    const maxRetries = maxRetriesSchema.safeParse(rawMaxRetries);
    if (!maxRetries.success) {
      return `${PREFIX} Failed to schedule ${label}: ${maxRetries.error.issues[0]?.message ?? 'invalid --max-retries'}`;
    }

    const delaySeconds = Number(delayToken);
    try {
      const actionId = this.service.scheduleAction({
        hookId: target.hookId,
        actionKind: target.actionKind,
        subjectId,
        args,
        delaySeconds,
        maxRetries: maxRetries.data,
      });
      return `${PREFIX} Scheduled ${label} in ${delaySeconds} seconds (ID: ${actionId})`;
    } catch (error) {
      return `${PREFIX} Failed to schedule ${label}: ${describeError(error)}`;
    }
  }

  private cancel(actionId: string | undefined): string {
    if (!actionId) {
      return `${PREFIX} Usage: cancel <actionId>`;
    }
    return this.service.cancelScheduledAction(actionId)
      ? `${PREFIX} Cancelled scheduled action ${actionId}`
      : `${PREFIX} Scheduled action ${actionId} not found`;
  }

  private listHooks(): string {
    const hooks = Object.values(this.service.getAllHooks());
    const lines = hooks.map((hook) => {
      const kinds = ACTION_KINDS.filter((kind) => typeof hook[HANDLER_BY_KIND[kind]] === 'function');
      return `  ${hook.id} - ${hook.label} (${kinds.join(', ') || 'no handlers'})`;
    });
    return [`${PREFIX} ${hooks.length} hook(s) registered`, ...lines].join('\n');
  }

  private listScheduled(): string {
    const now = nowSeconds();
    const actions = Object.values(this.service.getScheduledActions()).sort((a, b) => a.executeAt - b.executeAt);
    const lines = actions.map((action) => {
      const dueIn = Math.max(0, Math.ceil(action.executeAt - now));
      return `  ${action.id} ${action.hookId}.${action.actionKind} subject ${action.subjectId} in ${dueIn}s (retries ${action.retries}/${action.maxRetries})`;
    });
    return [`${PREFIX} ${actions.length} scheduled action(s)`, ...lines].join('\n');
  }

  private cleanup(): string {
    const removed = this.service.cleanup();
    return `${PREFIX} Cleaned up ${removed} old scheduled actions`;
  }
}

export interface ConsoleHandle {
  close(): void;
  /** Resolves when the input ends or the console is closed. */
  closed: Promise<void>;
  /** Resolves once every line read so far has been answered. */
  idle(): Promise<void>;
}

/** Feeds `input` line by line into `surface` and writes each answer to `output`. */
export const attachConsole = (surface: CommandSurface, input: Readable, output: Writable): ConsoleHandle => {
  const rl = readline.createInterface({ input, terminal: false });
  let pending: Promise<void> = Promise.resolve();
  const closed = new Promise<void>((resolve) => {
    rl.once('close', () => resolve());
  });

  rl.on('line', (line) => {
    pending = pending
      .then(() => surface.execute(line))
      .then((text) => {
        if (text.length > 0) {
          output.write(`${text}\n`);
        }
      })
      .catch((error) => {
        logger.error({ err: error }, 'Failed to answer console command');
      });
  });

  return {
    close: () => rl.close(),
    closed,
    idle: () => pending,
  };
};
