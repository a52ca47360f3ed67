import { z } from 'zod';

import { ActionResult, DEFAULT_RETRY_DELAY_SECONDS } from '../types';

const retryDelaySchema = z.number().finite().nonnegative();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Turns whatever a handler returned into an {@link ActionResult}.
 *
 * Nothing at all counts as success, a bare value becomes the message, and an
 * object keeps its fields with `success` defaulting to true. `retry` only
 * holds for a literal `true`; a `retryDelay` that is not a non-negative
 * number falls back to the default delay.
 */
export const normalizeResult = (raw: unknown): ActionResult => {
  if (raw === undefined || raw === null) {
    return { success: true, retry: false };
  }

  if (!isRecord(raw)) {
    return { success: true, retry: false, message: String(raw) };
  }

  const result: ActionResult = {
    success: raw.success === undefined ? true : Boolean(raw.success),
    retry: raw.retry === true,
  };

  if (raw.message !== undefined && raw.message !== null) {
    result.message = typeof raw.message === 'string' ? raw.message : String(raw.message);
  }
  if (raw.data !== undefined) {
    result.data = raw.data;
  }
  if (raw.retryDelay !== undefined && raw.retryDelay !== null) {
    const delay = retryDelaySchema.safeParse(raw.retryDelay);
    result.retryDelay = delay.success ? delay.data : DEFAULT_RETRY_DELAY_SECONDS;
  }

  return result;
};
