import type { Logger, StagerEvent } from '@release-stager/shared';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger for tests: keeps events and messages in memory.
 */
export class MemoryLogger implements Logger {
  readonly events: StagerEvent[] = [];
  readonly entries: Array<{ level: LogLevel; message: string }> = [];

  log(event: StagerEvent): void {
    this.events.push(event);
  }

  trace(event: StagerEvent, message: string): void {
    this.events.push(event);
    this.entries.push({ level: 'trace', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(error: Error, message?: string): void {
    this.entries.push({ level: 'error', message: message ?? error.message });
  }

  child(): Logger {
    return this;
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  eventTypes(): Array<StagerEvent['type']> {
    return this.events.map((e) => e.type);
  }
}
