import { z } from 'zod';

import { DuplicateHookError, HookValidationError } from '../errors';
import { logger } from '../logger';
import { Hook, HookDefinition, HookHandler } from '../types';

const handlerSchema = z
  .custom<HookHandler>((value) => typeof value === 'function', { message: 'Handler must be a function' })
  .optional();

const hookDefinitionSchema = z.object({
  id: z.string({ invalid_type_error: 'Hook ID must be a string' }).min(1, 'Hook ID is required'),
  label: z.string({ invalid_type_error: 'Hook label must be a string' }).min(1, 'Hook label is required'),
  onPurchase: handlerSchema,
  onRemove: handlerSchema,
  onRenew: handlerSchema,
});

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

export class HookRegistry {
  private readonly hooks = new Map<string, Hook>();

  register(definition: HookDefinition): Hook {
    const parsed = hookDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new HookValidationError(formatIssues(parsed.error));
    }
    if (this.hooks.has(parsed.data.id)) {
      throw new DuplicateHookError(parsed.data.id);
    }

    const hook: Hook = Object.freeze({ ...parsed.data });
    this.hooks.set(hook.id, hook);
    logger.info({ hookId: hook.id, label: hook.label }, 'Hook registered');
    return hook;
  }

  get(id: string): Hook | undefined {
    return this.hooks.get(id);
  }

  getAll(): Record<string, Hook> {
    return Object.fromEntries(this.hooks);
  }

  remove(id: string): boolean {
    const hook = this.hooks.get(id);
    if (!hook) {
      logger.warn({ hookId: id }, 'Attempted to remove unknown hook');
      return false;
    }
    this.hooks.delete(id);
    logger.info({ hookId: id, label: hook.label }, 'Hook removed');
    return true;
  }

  get size(): number {
    return this.hooks.size;
  }
}
