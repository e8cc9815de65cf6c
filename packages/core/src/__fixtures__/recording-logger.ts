import type { BuildEvent, BuildEventType, Logger } from '@cyforge/shared';

/** Keeps every event and message in memory; children share the parent's lists. */
export class RecordingLogger implements Logger {
  readonly events: BuildEvent[] = [];
  readonly messages: string[] = [];
  readonly errors: Error[] = [];

  log(event: BuildEvent): void {
    this.events.push(event);
  }

  trace(event: BuildEvent, message: string): void {
    this.events.push(event);
    this.messages.push(message);
  }

  debug(message: string): void {
    this.messages.push(message);
  }

  info(message: string): void {
    this.messages.push(message);
  }

  warn(message: string): void {
    this.messages.push(message);
  }

  error(error: Error, message?: string): void {
    this.errors.push(error);
    if (message) this.messages.push(message);
  }

  child(): Logger {
    return this;
  }

  ofType<T extends BuildEventType>(type: T): Array<Extract<BuildEvent, { type: T }>> {
    return this.events.filter((e): e is Extract<BuildEvent, { type: T }> => e.type === type);
  }
}
