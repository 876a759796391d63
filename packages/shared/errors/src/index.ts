export type ErrorScope = 'fatal' | 'region' | 'cluster' | 'metric';

export interface AppErrorOptions {
  readonly scope?: ErrorScope;
  readonly cause?: unknown;
  readonly context?: Record<string, unknown>;
}

export class AppError extends Error {
  readonly code: string;
  readonly scope: ErrorScope;
  readonly context: Record<string, unknown>;

  constructor(code: string, message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.scope = options.scope ?? 'fatal';
    this.context = options.context ?? {};
  }
}

export const isAppError = (value: unknown): value is AppError => value instanceof AppError;

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.name && error.name !== 'Error' ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
};
