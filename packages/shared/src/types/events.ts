/**
 * Base interface for all run events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the inspect/export run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when traversal of a root begins. */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    root: string;
    exclude: string[];
  };
}

/** Emitted for every directory or entry the scanner could not read. */
export interface ScanWarningEvent extends BaseEvent {
  type: 'ScanWarning';
  payload: {
    path: string;
    message: string;
    code?: string;
  };
}

/** Emitted when a single file fails to copy. */
export interface CopyFailed extends BaseEvent {
  type: 'CopyFailed';
  payload: {
    sourcePath: string;
    category: string;
    reason: string;
    code?: string;
  };
}

/** Emitted when submission stops because of a fatal error or a cancel request. */
export interface ExportAborted extends BaseEvent {
  type: 'ExportAborted';
  payload: {
    reason: string;
    inFlight: number;
  };
}

export interface ArchiveFinished extends BaseEvent {
  type: 'ArchiveFinished';
  payload: {
    path: string;
    entries: number;
  };
}

export interface ArchiveFailed extends BaseEvent {
  type: 'ArchiveFailed';
  payload: {
    path: string;
    reason: string;
  };
}

/** Emitted once per run with the final counts. */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    mode: 'inspect' | 'export';
    status: 'success' | 'partial' | 'aborted';
    files: number;
    bytes: number;
    failed: number;
    elapsedMs: number;
  };
}

export type RunEvent =
  | ScanStarted
  | ScanWarningEvent
  | CopyFailed
  | ExportAborted
  | ArchiveFinished
  | ArchiveFailed
  | RunFinished;

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Builds an event with the common metadata filled in.
 */
export function createEvent<T extends RunEvent>(
  runId: string,
  type: T['type'],
  payload: T['payload'],
): { schemaVersion: number; timestamp: string; runId: string; type: T['type']; payload: T['payload'] } {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
    type,
    payload,
  };
}
