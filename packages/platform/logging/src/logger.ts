import type { Brand } from '@shared/core';
import type { AppError } from '@shared/errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LoggerNamespace = Brand<string, 'LoggerNamespace'>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  region?: string;
  clusterArn?: string;
  metric?: string;
  [key: string]: unknown;
}

export interface LogEvent {
  level: LogLevel;
  namespace: LoggerNamespace;
  message: string;
  context?: LogContext;
  error?: Error;
  createdAt: string;
}

export interface LoggerSink {
  emit(event: LogEvent): void;
}

export class InMemorySink implements LoggerSink {
  private events: LogEvent[] = [];
  emit(event: LogEvent) {
    this.events.push(event);
  }
  read(): readonly LogEvent[] {
    return this.events;
  }
  messages(level?: LogLevel): string[] {
    return this.events.filter((event) => !level || event.level === level).map((event) => event.message);
  }
  clear() {
    this.events = [];
  }
}

export const asNamespace = (value: string): LoggerNamespace => value as LoggerNamespace;
export const defaultNamespace = asNamespace('msk-report');

export const levelRank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export class Logger {
  private readonly namespace: LoggerNamespace;
  private readonly sinks: readonly LoggerSink[];

  constructor(namespace: LoggerNamespace = defaultNamespace, sinks: readonly LoggerSink[] = [new InMemorySink()]) {
    this.namespace = namespace;
    this.sinks = sinks;
  }

  child(suffix: string): Logger {
    return new Logger(asNamespace(`${this.namespace}:${suffix}`), this.sinks);
  }

  debug(message: string, context?: LogContext): void { this.emit('debug', message, context); }
  info(message: string, context?: LogContext): void { this.emit('info', message, context); }
  warn(message: string, context?: LogContext): void { this.emit('warn', message, context); }
  error(message: string, error?: AppError | Error, context?: LogContext): void { this.emit('error', message, context, error); }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    const event: LogEvent = {
      level,
      namespace: this.namespace,
      message,
      context,
      error,
      createdAt: new Date().toISOString(),
    };
    for (const sink of this.sinks) sink.emit(event);
  }
}
