export class HookValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HookValidationError';
  }
}

export class DuplicateHookError extends Error {
  constructor(public readonly hookId: string) {
    super(`Hook with ID ${hookId} already exists`);
    this.name = 'DuplicateHookError';
  }
}

export class HookNotFoundError extends Error {
  constructor(public readonly hookId: string) {
    super(`Hook ${hookId} not found`);
    this.name = 'HookNotFoundError';
  }
}

export class InvalidDelayError extends HookValidationError {
  constructor(public readonly delay: unknown) {
    super('Delay must be a positive number');
    this.name = 'InvalidDelayError';
  }
}

export class HandlerTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Handler did not settle within ${timeoutMs}ms`);
    this.name = 'HandlerTimeoutError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
};
