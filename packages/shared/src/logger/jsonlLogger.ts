import * as fs from 'fs/promises';
import { dirname } from 'path';
import type { BuildEvent } from '../types/events';
import { formatBindings } from './consoleLogger';
import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';

// Shared by a logger and all of its children so that every line goes through one queue.
export interface WriteQueue {
  pending: Promise<void>;
  dirReady: boolean;
}

/**
 * Appends structured events to a JSONL file and prints text messages to the console.
 * Writes are chained so lines from concurrent workers never interleave.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly level: LogLevel;
  private readonly queue: WriteQueue;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    level: LogLevel = 'info',
    queue: WriteQueue = { pending: Promise.resolve(), dirReady: false },
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.level = level;
    this.queue = queue;
  }

  get path(): string {
    return this.filePath;
  }

  log(event: BuildEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    this.queue.pending = this.queue.pending.then(() => this.append(line));
    return this.queue.pending;
  }

  async trace(event: BuildEvent, message: string): Promise<void> {
    this.debug(message);
    await this.log(event);
  }

  /** Resolves once every queued event has been written. */
  flush(): Promise<void> {
    return this.queue.pending;
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(
      this.filePath,
      { ...this.bindings, ...bindings },
      this.level,
      this.queue,
    );
  }

  private async append(line: string): Promise<void> {
    try {
      if (!this.queue.dirReady) {
        await fs.mkdir(dirname(this.filePath), { recursive: true });
        this.queue.dirReady = true;
      }
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A lost trace line must not fail the build.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }

  private withPrefix(message: string): string {
    return formatBindings(this.bindings, message);
  }
}
