/**
 * Base interface for all build events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the build run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a build or clean run starts.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    mode: 'build' | 'clean';
    targetDir: string;
    outputDir?: string;
    concurrency?: number;
  };
}

/** Emitted on every lifecycle transition */
export interface StateChanged extends BaseEvent {
  type: 'StateChanged';
  payload: {
    from: string;
    to: string;
  };
}

/** Emitted when the scanner has produced the candidate set */
export interface ScanFinished extends BaseEvent {
  type: 'ScanFinished';
  payload: {
    unitCount: number;
    warnings: string[];
    durationMs: number;
  };
}

/** Emitted for a unit whose fingerprint is still valid */
export interface UnitSkipped extends BaseEvent {
  type: 'UnitSkipped';
  payload: {
    path: string;
  };
}

/** Emitted when the compiler accepted a unit */
export interface UnitCompiled extends BaseEvent {
  type: 'UnitCompiled';
  payload: {
    path: string;
    durationMs: number;
  };
}

/** Emitted when the compiler rejected a unit */
export interface UnitFailed extends BaseEvent {
  type: 'UnitFailed';
  payload: {
    path: string;
    exitCode?: number;
    message: string;
    missingModules?: string[];
  };
}

/** Emitted once per run when any unit failed on unresolved imports */
export interface MissingModulesDetected extends BaseEvent {
  type: 'MissingModulesDetected';
  payload: {
    modules: string[];
  };
}

/** Emitted when a build run reaches a terminal state */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    state: 'done' | 'failed';
    succeeded: number;
    failed: number;
    skipped: number;
    durationMs: number;
  };
}

/** Emitted when a clean run has removed its artifacts */
export interface CleanFinished extends BaseEvent {
  type: 'CleanFinished';
  payload: {
    removed: string[];
    kept: string[];
  };
}

export type BuildEvent =
  | RunStarted
  | StateChanged
  | ScanFinished
  | UnitSkipped
  | UnitCompiled
  | UnitFailed
  | MissingModulesDetected
  | RunFinished
  | CleanFinished;

export type BuildEventType = BuildEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/** The part of an event a caller supplies; the metadata is stamped on by {@link createEvent}. */
export type EventInit = BuildEvent extends infer E
  ? E extends BuildEvent
    ? Pick<E, 'type' | 'payload'>
    : never
  : never;

export function createEvent(runId: string, init: EventInit): BuildEvent {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
    ...init,
  };
}
