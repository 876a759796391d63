import { describeError } from '@shared/errors';
import { levelRank, type LogEvent, type LoggerSink, type LogLevel } from './logger';

export interface ConsoleSinkOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
}

const renderContext = (context: LogEvent['context']): string => {
  if (!context) return '';
  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return pairs.length ? ` ${pairs.join(' ')}` : '';
};

export const formatEvent = (event: LogEvent): string => {
  const base = `${event.createdAt} ${event.level.toUpperCase().padEnd(5)} [${event.namespace}] ${event.message}`;
  const error = event.error ? ` error="${describeError(event.error)}"` : '';
  return `${base}${renderContext(event.context)}${error}`;
};

export class ConsoleSink implements LoggerSink {
  private readonly minRank: number;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleSinkOptions = {}) {
    this.minRank = levelRank(options.minLevel ?? 'info');
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  emit(event: LogEvent): void {
    if (levelRank(event.level) < this.minRank) return;
    this.write(formatEvent(event));
  }
}
