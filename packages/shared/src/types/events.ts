import type { CaseStatus, EscalationReason, Verdict } from './checklist';
import type { DiagnosisCategory, DiagnosisScope } from './diagnosis';
import type { PatchErrorKind, PatchKind } from './patch';

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Base interface for all events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a run starts or resumes */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    caseCount: number;
    resumed: boolean;
    workers: number;
  };
}

/** Emitted after a status change has been committed to the checklist */
export interface CaseTransitioned extends BaseEvent {
  type: 'CaseTransitioned';
  payload: {
    caseId: string;
    from: CaseStatus;
    to: CaseStatus;
    retryCount: number;
  };
}

/** Emitted when a sandbox run of a case returns */
export interface VerificationCompleted extends BaseEvent {
  type: 'VerificationCompleted';
  payload: {
    caseId: string;
    attempt: number;
    passed: boolean;
    timedOut: boolean;
    durationMs: number;
  };
}

/** Emitted when a failure has been classified */
export interface DiagnosisCompleted extends BaseEvent {
  type: 'DiagnosisCompleted';
  payload: {
    caseId: string;
    signature: string;
    category: DiagnosisCategory;
    scope: DiagnosisScope;
    confidence: number;
    recommendedPatchKind: PatchKind;
    ruleId?: string;
  };
}

/** Emitted when a patch has been written to the source tree */
export interface PatchApplied extends BaseEvent {
  type: 'PatchApplied';
  payload: {
    caseId: string;
    patchId: string;
    kind: PatchKind;
    targetFile: string;
    origin: 'auto' | 'manual';
  };
}

/** Emitted when a drafted patch fails validation */
export interface PatchRejected extends BaseEvent {
  type: 'PatchRejected';
  payload: {
    caseId: string;
    kind: PatchKind;
    targetFile: string;
    errorKind: PatchErrorKind;
    message: string;
  };
}

/** Emitted when a patch has been reverted to its snapshot */
export interface PatchRolledBack extends BaseEvent {
  type: 'PatchRolledBack';
  payload: {
    caseId: string;
    patchId: string;
    targetFile: string;
    reason: string;
  };
}

/** Emitted when a case is handed to a human */
export interface CaseEscalated extends BaseEvent {
  type: 'CaseEscalated';
  payload: {
    caseId: string;
    reason: EscalationReason;
    retryCount: number;
    signature?: string;
    category?: DiagnosisCategory;
  };
}

/** Emitted when a human verdict has been recorded */
export interface EscalationResolved extends BaseEvent {
  type: 'EscalationResolved';
  payload: {
    caseId: string;
    verdict: Verdict;
    status: CaseStatus;
    manualPatch: boolean;
  };
}

/** Emitted when a case is abandoned for the rest of the run after a fatal error */
export interface CaseFatal extends BaseEvent {
  type: 'CaseFatal';
  payload: {
    caseId: string;
    code: string;
    message: string;
  };
}

/** Emitted before a collaborator request goes to the provider */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/** Emitted once a provider request has succeeded or exhausted its retries */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    retries: number;
    error?: string;
  };
}

/** Emitted when the worker pool has drained */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    passed: number;
    failed: number;
    escalated: number;
    cancelled: boolean;
    durationMs: number;
  };
}

export type HealEvent =
  | RunStarted
  | CaseTransitioned
  | VerificationCompleted
  | DiagnosisCompleted
  | PatchApplied
  | PatchRejected
  | PatchRolledBack
  | CaseEscalated
  | EscalationResolved
  | CaseFatal
  | ProviderRequestStarted
  | ProviderRequestFinished
  | RunFinished;

export type HealEventType = HealEvent['type'];

/**
 * Interface for publishing events.
 * Implementations can write to logs, feed listeners, etc.
 */
export interface EventBus {
  /**
   * Emit an event to all registered listeners.
   * @param event - The event to emit
   */
  emit(event: HealEvent): Promise<void> | void;
}

/**
 * Interface for writing events to persistent storage.
 */
export interface EventWriter {
  /**
   * Write an event to storage.
   * @param event - The event to write
   */
  write(event: HealEvent): void;
  /**
   * Close the writer and flush any pending events.
   */
  close(): Promise<void>;
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event without its envelope fields. */
export type EventInit = DistributiveOmit<HealEvent, 'schemaVersion' | 'timestamp' | 'runId'>;

/**
 * Wraps an event body in the envelope with the current timestamp.
 */
export function makeEvent(runId: string, init: EventInit): HealEvent {
  return {
    ...init,
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
