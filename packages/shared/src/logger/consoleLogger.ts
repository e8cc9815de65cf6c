import type { BuildEvent } from '../types/events';
import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Defaults to `info`. */
  level?: LogLevel;
  /** Print structured events as JSON lines. Defaults to false. */
  printEvents?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly printEvents: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
    this.printEvents = options.printEvents ?? false;
  }

  log(event: BuildEvent): void {
    if (this.printEvents) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: BuildEvent, message: string): void {
    this.log(event);
    this.debug(message);
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(message);
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= this.threshold;
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: BuildEvent) {
    return this.base.log(event);
  }

  trace(event: BuildEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    return formatBindings(this.bindings, message);
  }
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
