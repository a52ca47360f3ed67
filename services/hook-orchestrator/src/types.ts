import { z } from 'zod';

export const ACTION_KINDS = ['purchase', 'remove', 'renew'] as const;

export const actionKindSchema = z.enum(ACTION_KINDS);

export type ActionKind = z.infer<typeof actionKindSchema>;

/** Subject id the storefront sends when no account is attached to a purchase. */
export const NO_SUBJECT = '0';

export const DEFAULT_RETRY_DELAY_SECONDS = 30;
export const DEFAULT_MAX_RETRIES = 3;

/** What a handler may hand back before normalisation. */
export interface ActionResultInput {
  success?: boolean;
  message?: string;
  data?: unknown;
  retry?: boolean;
  retryDelay?: number;
}

export type HandlerReturn = ActionResultInput | string | number | boolean | null | undefined | void;

export type HookHandler = (
  hook: Hook,
  subjectId: string,
  args: readonly string[],
) => HandlerReturn | Promise<HandlerReturn>;

export interface HookHandlers {
  onPurchase?: HookHandler;
  onRemove?: HookHandler;
  onRenew?: HookHandler;
}

export interface HookDefinition extends HookHandlers {
  id: string;
  label: string;
}

export type Hook = Readonly<HookDefinition>;

export const HANDLER_BY_KIND: Readonly<Record<ActionKind, keyof HookHandlers>> = {
  purchase: 'onPurchase',
  remove: 'onRemove',
  renew: 'onRenew',
};

export const resolveHandler = (hook: Hook, kind: ActionKind): HookHandler | undefined =>
  hook[HANDLER_BY_KIND[kind]];

export interface ActionResult {
  success: boolean;
  message?: string;
  data?: unknown;
  retry: boolean;
  retryDelay?: number;
}

export interface ExecutionOutcome {
  result: ActionResult;
  error?: string;
}

export interface ScheduledAction {
  readonly id: string;
  readonly hookId: string;
  readonly actionKind: ActionKind;
  readonly subjectId: string;
  readonly args: readonly string[];
  /** Epoch seconds. */
  readonly executeAt: number;
  readonly retries: number;
  readonly maxRetries: number;
  /** Seconds to wait after a retryable failure that names no delay of its own. */
  readonly retryDelay: number;
  readonly created: number;
}

export interface ScheduleRequest {
  hookId: string;
  actionKind: ActionKind;
  subjectId: string;
  args: readonly string[];
  delaySeconds: number;
  maxRetries?: number;
}

export const nowSeconds = (): number => Date.now() / 1000;
