import * as fs from 'fs/promises';
import type { StagerEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import type { Logger } from './types';

/**
 * Appends structured events to a JSONL file and forwards messages to a console logger.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly output: Logger;

  constructor(filePath: string, output: Logger) {
    this.filePath = filePath;
    this.output = output;
  }

  async log(event: StagerEvent): Promise<void> {
    const redactedEvent = redactForLogs(event);
    const line = JSON.stringify(redactedEvent) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Best-effort: do not fail the run due to logging.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: StagerEvent, message: string): Promise<void> {
    await this.log(event);
    await this.output.info(message);
  }

  debug(message: string) {
    return this.output.debug(message);
  }

  info(message: string) {
    return this.output.info(message);
  }

  warn(message: string) {
    return this.output.warn(message);
  }

  error(error: Error, message?: string) {
    return this.output.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.output.child(bindings));
  }
}
